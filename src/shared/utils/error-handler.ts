type ErrorOutput = {
  error: string
  code?: string
}

function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return undefined
  }
  return typeof error.code === 'string' ? error.code : undefined
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function handleError(error: unknown): never {
  const output: ErrorOutput = { error: errorMessage(error) }
  const code = errorCode(error)
  if (code) {
    output.code = code
  }

  console.error(JSON.stringify(output))
  process.exit(1)
}
