/**
 * Exhaustiveness check helper for switch statements.
 * TypeScript will error at compile time if not all cases are handled.
 *
 * @example
 * switch (policy.kind) {
 *   case 'disabled': return undefined
 *   case 'custom': return policy.state
 *   default: return assertNever(policy)
 * }
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled discriminated union member: ${JSON.stringify(x)}`)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
