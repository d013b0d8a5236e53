import { Command } from 'commander'
import { ShebangPlugin } from '../plugin/shebang-plugin'
import { handleError } from '../shared/utils/error-handler'
import { formatOutput } from '../shared/utils/output'
import type { CommandOptions } from './helpers'

function infoAction(options: CommandOptions): void {
  try {
    const plugin = new ShebangPlugin()
    const { fileMatching } = plugin.resolveConfig()
    console.log(formatOutput({ ...plugin.pluginInfo(), fileMatching }, options.pretty))
  } catch (error) {
    handleError(error)
  }
}

export const infoCommand = new Command('info')
  .description('Show plugin name, version and the files it applies to')
  .option('--pretty', 'Pretty print JSON output')
  .action(infoAction)
