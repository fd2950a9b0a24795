import type { TodoPolicy } from './types.ts'
import { assertNever } from '../../utils/type-guards.ts'

/**
 * Read the persisted master-todo setting. `true` mirrors the subtask keyword,
 * a string is used verbatim, and everything else (including junk written by
 * hand into the settings file) leaves the project headline without a keyword.
 */
export function parseTodoPolicy(raw: unknown): TodoPolicy {
  if (raw === true) return { kind: 'mirror-subtask' }
  if (typeof raw === 'string' && raw.trim() !== '') {
    return { kind: 'custom', state: raw.trim() }
  }
  return { kind: 'disabled' }
}

/** Inverse of parseTodoPolicy, used by saveProjectSettings */
export function serializeTodoPolicy(policy: TodoPolicy): boolean | string {
  switch (policy.kind) {
    case 'disabled':
      return false
    case 'mirror-subtask':
      return true
    case 'custom':
      return policy.state
    default:
      return assertNever(policy)
  }
}

export function resolveProjectTodo(
  policy: TodoPolicy,
  subtaskTodo: string,
): string | undefined {
  switch (policy.kind) {
    case 'disabled':
      return undefined
    case 'mirror-subtask':
      return subtaskTodo || undefined
    case 'custom':
      return policy.state
    default:
      return assertNever(policy)
  }
}
