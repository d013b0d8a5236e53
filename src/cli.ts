#!/usr/bin/env node

import { Command } from 'commander'
import pkg from '../package.json'
import { checkCommand, formatCommand, infoCommand } from './commands'
import { handleError } from './shared/utils/error-handler'

const program = new Command()

program
  .name('shebang-fmt')
  .description('Normalize the shebang line at the top of script files')
  .version(pkg.version)

program.addCommand(formatCommand)
program.addCommand(checkCommand)
program.addCommand(infoCommand)

program.parseAsync(process.argv).catch(handleError)

export { program }
