import { readFile, writeFile } from 'node:fs/promises'
import { type FileMatchingInfo, matchesFile } from '../plugin/file-matching'
import { ShebangPlugin } from '../plugin/shebang-plugin'
import { errorMessage } from '../shared/utils/error-handler'

export type CommandOptions = { pretty?: boolean }

export type FileStatus = 'changed' | 'unchanged' | 'skipped' | 'failed'

export type FileResult = {
  file: string
  status: FileStatus
  error?: string
}

export type RunOutput = {
  results: FileResult[]
  total: number
  changed: number
  failed: number
}

// BOMs stay in the decoded text so a file is written back byte-for-byte.
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

export async function readFileText(file: string): Promise<string> {
  const bytes = await readFile(file)
  try {
    return utf8.decode(bytes)
  } catch (error) {
    throw new Error(`File is not valid UTF-8: ${file}`, { cause: error })
  }
}

async function processFile(
  plugin: ShebangPlugin,
  fileMatching: FileMatchingInfo,
  file: string,
  write: boolean,
): Promise<FileResult> {
  if (!matchesFile(file, fileMatching)) {
    return { file, status: 'skipped' }
  }

  try {
    const fileText = await readFileText(file)
    const formatted = plugin.format({ filePath: file, fileText })
    if (formatted === null) {
      return { file, status: 'unchanged' }
    }
    if (write) {
      await writeFile(file, formatted, 'utf8')
    }
    return { file, status: 'changed' }
  } catch (error) {
    return { file, status: 'failed', error: errorMessage(error) }
  }
}

export async function processFiles(files: string[], options: { write: boolean }): Promise<RunOutput> {
  const plugin = new ShebangPlugin()
  const { fileMatching } = plugin.resolveConfig()
  const results: FileResult[] = []
  for (const file of files) {
    results.push(await processFile(plugin, fileMatching, file, options.write))
  }

  return {
    results,
    total: results.length,
    changed: results.filter((result) => result.status === 'changed').length,
    failed: results.filter((result) => result.status === 'failed').length,
  }
}
