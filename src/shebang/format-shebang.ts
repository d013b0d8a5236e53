const SHEBANG_MARKER = '#!'
const LINE_TERMINATOR = /\r\n|\r|\n/
const BLANKS = /[ \t]+/

export type FirstLine = {
  line: string
  terminator: string
  rest: string
}

export type Shebang = {
  interpreter: string
  args: string[]
}

export function splitFirstLine(text: string): FirstLine {
  const match = LINE_TERMINATOR.exec(text)
  if (!match) {
    return { line: text, terminator: '', rest: '' }
  }

  return {
    line: text.slice(0, match.index),
    terminator: match[0],
    rest: text.slice(match.index + match[0].length),
  }
}

export function parseShebang(line: string): Shebang | null {
  if (!line.startsWith(SHEBANG_MARKER)) {
    return null
  }

  const tokens = line
    .slice(SHEBANG_MARKER.length)
    .split(BLANKS)
    .filter((token) => token.length > 0)
  if (tokens.length === 0) {
    return null
  }

  const [interpreter, ...args] = tokens
  return { interpreter, args }
}

export function printShebang(shebang: Shebang): string {
  return SHEBANG_MARKER + [shebang.interpreter, ...shebang.args].join(' ')
}

/**
 * Rewrites the shebang on the first line of `text` to its canonical form:
 * no blanks after `#!`, single spaces between words, nothing trailing.
 * Only spaces and tabs count as blanks. Text without a shebang, and a bare
 * `#!` with no interpreter, come back unchanged.
 */
export function formatShebang(text: string): string {
  if (!text.startsWith(SHEBANG_MARKER)) {
    return text
  }

  const { line, terminator, rest } = splitFirstLine(text)
  const shebang = parseShebang(line)
  if (!shebang) {
    return text
  }

  return printShebang(shebang) + terminator + rest
}
