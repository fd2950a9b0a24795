// Expands the subtask table into a project tree ready for serialization
import type {
  HeadlineRecord,
  InsertionContext,
  PlanConfig,
  PlanningMode,
  ProjectInput,
  ProjectTree,
} from './types.ts'
import { formatTimestamp, resolveOffsetDate } from './date-resolver.ts'
import { resolveProjectTodo } from './todo-policy.ts'

export const CATEGORY_PROPERTY = 'CATEGORY'

function withPlanningDate(
  record: HeadlineRecord,
  planning: PlanningMode,
  timestamp: string,
): HeadlineRecord {
  return planning === 'deadline'
    ? { ...record, deadline: timestamp }
    : { ...record, scheduled: timestamp }
}

function withTodo(record: HeadlineRecord, todo: string | undefined): HeadlineRecord {
  return todo ? { ...record, todo } : record
}

/**
 * Project level: explicit value first, then the enclosing headline, then 1.
 */
export function resolveProjectLevel(
  level: number | undefined,
  context?: InsertionContext,
): number {
  if (level !== undefined && level >= 1) return Math.floor(level)
  return context?.level ?? 1
}

/**
 * Build the project headline, its CATEGORY property and one child per
 * configured subtask. Children keep the configured order even when their
 * dates are not chronological.
 */
export function buildProject(
  input: ProjectInput,
  config: PlanConfig,
  context?: InsertionContext,
): ProjectTree {
  const level = resolveProjectLevel(input.level, context)
  const subtaskTodo = input.todo ?? config.defaultTodo
  const category = input.category?.trim() || input.name

  const root = withTodo(
    withPlanningDate(
      { title: input.name, level },
      config.planning,
      formatTimestamp(input.dueDate),
    ),
    resolveProjectTodo(config.projectTodo, subtaskTodo),
  )

  const children = config.subtasks.map((spec) =>
    withTodo(
      withPlanningDate(
        { title: spec.name, level: level + 1 },
        config.planning,
        resolveOffsetDate(input.dueDate, spec.offsetDays, config.allowWeekends),
      ),
      subtaskTodo,
    ),
  )

  return {
    root,
    category: { key: CATEGORY_PROPERTY, value: category },
    children,
  }
}
