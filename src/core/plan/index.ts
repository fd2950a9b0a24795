// Project template module exports

export type {
  SubtaskSpec,
  PlanningMode,
  TodoPolicy,
  PlanConfig,
  HeadlineRecord,
  PropertyNode,
  ProjectTree,
  ProjectInput,
  InsertionContext,
} from './types.ts'

export { formatTimestamp, shiftOffsetDate, resolveOffsetDate } from './date-resolver.ts'
export { parseTodoPolicy, serializeTodoPolicy, resolveProjectTodo } from './todo-policy.ts'
export { buildProject, resolveProjectLevel, CATEGORY_PROPERTY } from './template-builder.ts'
