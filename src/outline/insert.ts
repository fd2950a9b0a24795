import type { ProjectTree } from '../core/plan/types.ts'
import type { DocumentHost } from './document.ts'
import { serializeProjectTree } from './serializer.ts'

/**
 * Render `tree` and insert it at `at` in a single edit, keeping the
 * document's folds as they were before the insert.
 */
export function insertProjectTree(
  host: DocumentHost,
  tree: ProjectTree,
  at: number,
): string[] {
  const lines = serializeProjectTree(tree)
  host.withVisibilityPreserved(() => host.insertLines(at, lines))
  return lines
}
