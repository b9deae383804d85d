// ANSI color codes for terminal output
export const ANSI_RED = '\x1b[1;31m'
export const ANSI_RESET = '\x1b[0m'

/**
 * Field manager and managed-by value written on every object we apply
 */
export const FIELD_MANAGER = 'kube-agent-cloud'
