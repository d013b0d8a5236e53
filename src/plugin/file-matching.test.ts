import { describe, expect, test } from 'vitest'
import { defaultFileMatching, matchesFile } from './file-matching'

describe('matchesFile', () => {
  const info = defaultFileMatching()

  test('matches known script extensions', () => {
    expect(matchesFile('scripts/deploy.sh', info)).toBe(true)
    expect(matchesFile('/opt/tool/run.py', info)).toBe(true)
    expect(matchesFile('bin/cli.ts', info)).toBe(true)
  })

  test('compares extensions case-insensitively', () => {
    expect(matchesFile('pkg/foo.slackbuild', info)).toBe(true)
    expect(matchesFile('INSTALL.SH', info)).toBe(true)
  })

  test('matches well-known file names exactly', () => {
    expect(matchesFile('build/Makefile', info)).toBe(true)
    expect(matchesFile('GNUmakefile', info)).toBe(true)
    expect(matchesFile('makefile', info)).toBe(false)
  })

  test('rejects other files', () => {
    expect(matchesFile('README.md', info)).toBe(false)
    expect(matchesFile('bin/run', info)).toBe(false)
    expect(matchesFile('.bashrc', info)).toBe(false)
  })

  test('uses the given lists instead of the defaults', () => {
    const custom = { fileExtensions: ['nu'], fileNames: ['Justfile'] }
    expect(matchesFile('script.nu', custom)).toBe(true)
    expect(matchesFile('Justfile', custom)).toBe(true)
    expect(matchesFile('script.sh', custom)).toBe(false)
  })
})

describe('defaultFileMatching', () => {
  test('returns a fresh copy on every call', () => {
    const first = defaultFileMatching()
    first.fileExtensions.push('md')

    expect(defaultFileMatching().fileExtensions).not.toContain('md')
  })
})
