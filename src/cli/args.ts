// Argument parsing for the backplan CLI

export type ParsedArgs = {
  command: string | undefined
  positionals: string[]
  debug: boolean
}

export function parseArgs(argv: string[]): ParsedArgs {
  const debug = argv.some((arg) => arg === '--debug' || arg === '-d')
  const rest = argv.filter((arg) => arg !== '--debug' && arg !== '-d')
  return { command: rest[0], positionals: rest.slice(1), debug }
}

/**
 * Read the 1-based line argument of `backplan new <file> [line]` and return
 * a zero-based index, or null when omitted.
 */
export function parseCursorLine(raw: string | undefined): number | null {
  if (raw === undefined) return null
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new Error(`Line must be a positive integer, got "${raw}"`)
  }
  return Number(raw) - 1
}
