import { basename, extname } from 'node:path'
import defaults from './file-matching.json'

export type FileMatchingInfo = {
  fileExtensions: string[]
  fileNames: string[]
}

// Script types whose interpreters honour a `#!` line.
export function defaultFileMatching(): FileMatchingInfo {
  return {
    fileExtensions: [...defaults.fileExtensions],
    fileNames: [...defaults.fileNames],
  }
}

export function matchesFile(filePath: string, info: FileMatchingInfo): boolean {
  const name = basename(filePath)
  if (info.fileNames.includes(name)) {
    return true
  }

  const extension = extname(name).slice(1).toLowerCase()
  if (!extension) {
    return false
  }
  return info.fileExtensions.some((candidate) => candidate.toLowerCase() === extension)
}
