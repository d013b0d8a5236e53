import { Command } from 'commander'
import { handleError } from '../shared/utils/error-handler'
import { formatOutput } from '../shared/utils/output'
import { type CommandOptions, processFiles } from './helpers'

async function checkAction(files: string[], options: CommandOptions): Promise<void> {
  try {
    const output = await processFiles(files, { write: false })
    console.log(formatOutput(output, options.pretty))
    if (output.changed > 0 || output.failed > 0) {
      process.exitCode = 1
    }
  } catch (error) {
    handleError(error)
  }
}

export const checkCommand = new Command('check')
  .description('Report files whose shebang line is not normalized, without writing')
  .argument('<files...>', 'Files to check')
  .option('--pretty', 'Pretty print JSON output')
  .action(checkAction)
