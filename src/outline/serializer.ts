// Renders a project tree as outline markup
import type { HeadlineRecord, ProjectTree, PropertyNode } from '../core/plan/types.ts'

function headlineLine(record: HeadlineRecord): string {
  const prefix = '*'.repeat(record.level)
  const keyword = record.todo ? `${prefix} ${record.todo}` : prefix
  return `${keyword} ${record.title}`
}

function planningLine(record: HeadlineRecord): string | null {
  const parts: string[] = []
  if (record.deadline) parts.push(`DEADLINE: ${record.deadline}`)
  if (record.scheduled) parts.push(`SCHEDULED: ${record.scheduled}`)
  return parts.length > 0 ? parts.join(' ') : null
}

export function serializeHeadline(record: HeadlineRecord): string[] {
  const planning = planningLine(record)
  return planning ? [headlineLine(record), planning] : [headlineLine(record)]
}

export function serializeDrawer(properties: PropertyNode[]): string[] {
  return [
    ':PROPERTIES:',
    ...properties.map((p) => `:${p.key}: ${p.value}`),
    ':END:',
  ]
}

/**
 * Project headline, its planning line, the property drawer, then each
 * subtask headline with its own planning line.
 */
export function serializeProjectTree(tree: ProjectTree): string[] {
  return [
    ...serializeHeadline(tree.root),
    ...serializeDrawer([tree.category]),
    ...tree.children.flatMap(serializeHeadline),
  ]
}
