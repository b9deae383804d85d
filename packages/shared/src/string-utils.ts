/**
 * Sanitizes a string for use as a file or lock name.
 * Converts to lowercase and removes all characters except alphanumeric, dots and hyphens.
 */
export function sanitizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9.-]/g, '-')
}

/**
 * Checks a Kubernetes resource name against the DNS-1123 subdomain rules
 * (lowercase alphanumerics, '-' and '.', at most 253 characters)
 */
export function isValidResourceName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= 253 &&
    /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/.test(name)
  )
}

/**
 * Masks a secret for log output, keeping a short prefix and the length.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return `*** (length: ${secret.length})`
  }
  return `${secret.substring(0, 4)}*** (length: ${secret.length})`
}

/**
 * Shortens a response body or message for inclusion in an error.
 */
export function excerpt(text: string, maxLength: number = 200): string {
  const collapsed = text.replace(/\s+/g, ' ').trim()
  if (collapsed.length > maxLength) {
    return `${collapsed.substring(0, maxLength)}…`
  }
  return collapsed
}
