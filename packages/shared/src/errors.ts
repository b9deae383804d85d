export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Extract the HTTP status from an API error.
 * The Kubernetes client sets `code`, other clients set `statusCode`.
 */
export function statusCodeOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode
  }
  return null
}
