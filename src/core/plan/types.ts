// Core types for project templates

// ============================================================================
// Template Configuration
// ============================================================================

/**
 * One row of the subtask table. `offsetDays` counts days *before* the due
 * date: positive offsets land earlier, negative offsets land after it.
 */
export type SubtaskSpec = {
  readonly name: string
  readonly offsetDays: number
}

/** Which planning keyword carries the computed dates */
export type PlanningMode = 'deadline' | 'scheduled'

/** How the project headline gets its todo keyword */
export type TodoPolicy =
  | { kind: 'disabled' }
  | { kind: 'mirror-subtask' }
  | { kind: 'custom'; state: string }

export type PlanConfig = {
  readonly subtasks: readonly SubtaskSpec[]
  readonly projectTodo: TodoPolicy
  readonly defaultTodo: string
  readonly planning: PlanningMode
  readonly allowWeekends: boolean
}

// ============================================================================
// Tree
// ============================================================================

export type HeadlineRecord = {
  title: string
  level: number
  scheduled?: string
  deadline?: string
  todo?: string
}

export type PropertyNode = {
  key: string
  value: string
}

export type ProjectTree = {
  root: HeadlineRecord
  category: PropertyNode
  children: HeadlineRecord[]
}

// ============================================================================
// Builder Input
// ============================================================================

export type ProjectInput = {
  name: string
  /** Blank falls back to the project name */
  category?: string
  dueDate: Date
  level?: number
  /** Todo keyword for subtasks; defaults to the configured one */
  todo?: string
}

/** What the host knows about the cursor when the project is created */
export type InsertionContext = {
  /** Level of the enclosing headline, or null before the first headline */
  level: number | null
}
