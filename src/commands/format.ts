import { Command } from 'commander'
import { handleError } from '../shared/utils/error-handler'
import { formatOutput } from '../shared/utils/output'
import { type CommandOptions, processFiles } from './helpers'

async function formatAction(files: string[], options: CommandOptions): Promise<void> {
  try {
    const output = await processFiles(files, { write: true })
    console.log(formatOutput(output, options.pretty))
    if (output.failed > 0) {
      process.exitCode = 1
    }
  } catch (error) {
    handleError(error)
  }
}

export const formatCommand = new Command('format')
  .description('Normalize the shebang line of each file in place')
  .argument('<files...>', 'Files to format')
  .option('--pretty', 'Pretty print JSON output')
  .action(formatAction)
