// Configuration types for backplan
import { z } from 'zod'
import type { PlanConfig, SubtaskSpec } from '../core/plan/types.ts'
import { parseTodoPolicy } from '../core/plan/todo-policy.ts'

// ============================================================================
// Subtask Table
// ============================================================================

export const DEFAULT_SUBTASKS: SubtaskSpec[] = [
  { name: 'Kickoff and scope', offsetDays: 21 },
  { name: 'Gather requirements', offsetDays: 14 },
  { name: 'First draft', offsetDays: 10 },
  { name: 'Review round', offsetDays: 5 },
  { name: 'Final revisions', offsetDays: 2 },
  { name: 'Deliver', offsetDays: 0 },
  { name: 'Retrospective', offsetDays: -3 },
]

// ============================================================================
// Schema
// ============================================================================

export const SubtaskSpecSchema = z.object({
  name: z.string(),
  offsetDays: z.number().int(),
})

export const BackplanConfigSchema = z.object({
  subtasks: z.array(SubtaskSpecSchema),
  // boolean | string; anything else is read as "no keyword" (see parseTodoPolicy)
  masterTodo: z.unknown(),
  defaultTodo: z.string(),
  useDeadline: z.boolean(),
  allowWeekends: z.boolean(),
  logToFile: z.boolean(),
})

export type BackplanConfig = z.infer<typeof BackplanConfigSchema>

export const DEFAULT_CONFIG: BackplanConfig = {
  subtasks: DEFAULT_SUBTASKS,
  masterTodo: true,
  defaultTodo: 'TODO',
  useDeadline: true,
  allowWeekends: false,
  logToFile: false,
}

/** Settings a `.backplan.json` beside an outline file may override */
export const PROJECT_SETTING_KEYS = [
  'subtasks',
  'masterTodo',
  'defaultTodo',
  'useDeadline',
  'allowWeekends',
] as const

export type ProjectSettingKey = (typeof PROJECT_SETTING_KEYS)[number]

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Freeze persisted settings into the immutable value the template builder
 * reads. Called once per command.
 */
export function toPlanConfig(config: BackplanConfig): PlanConfig {
  return Object.freeze({
    subtasks: Object.freeze(config.subtasks.map((s) => Object.freeze({ ...s }))),
    projectTodo: parseTodoPolicy(config.masterTodo),
    defaultTodo: config.defaultTodo.trim(),
    planning: config.useDeadline ? 'deadline' : 'scheduled',
    allowWeekends: config.allowWeekends,
  })
}
