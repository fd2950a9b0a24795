// Create-project command: answers in, project subtree inserted into the host
import { buildProject, type InsertionContext, type PlanConfig, type ProjectTree } from './plan/index.ts'
import {
  insertProjectTree,
  parseDueDate,
  serializeProjectTree,
  type DocumentHost,
} from '../outline/index.ts'
import { debugLog } from '../debug/logger.ts'

/** The three answers collected by the prompts, as typed */
export type ProjectAnswers = {
  name: string
  category: string
  dueDate: string
}

export type PreviewOptions = {
  config: PlanConfig
  today: Date
  context?: InsertionContext
  /** Subtask keyword override */
  todo?: string
}

export type CreateProjectOptions = PreviewOptions & {
  host: DocumentHost
  /** Cursor line in the host document; null means "no cursor" */
  cursorLine: number | null
}

export type ProjectPreview = {
  tree: ProjectTree
  lines: string[]
}

export type CreateProjectResult = ProjectPreview & {
  insertedAt: number
}

/**
 * Build the project tree without touching any document.
 * Throws DateInputError when the due date can't be read.
 */
export function previewProject(
  answers: ProjectAnswers,
  options: PreviewOptions,
): ProjectPreview {
  const dueDate = parseDueDate(answers.dueDate, options.today)
  const tree = buildProject(
    {
      name: answers.name,
      category: answers.category,
      dueDate,
      todo: options.todo,
    },
    options.config,
    options.context,
  )
  return { tree, lines: serializeProjectTree(tree) }
}

/**
 * Insert a new project after the subtree at the cursor, at the cursor
 * headline's level. Nothing is inserted if the due date is invalid.
 */
export function createProject(
  answers: ProjectAnswers,
  options: CreateProjectOptions,
): CreateProjectResult {
  const context = options.host.contextAt(options.cursorLine)
  debugLog.debug('Insertion context', {
    cursorLine: options.cursorLine,
    level: context.level,
    insertAt: context.insertAt,
  })

  const { tree } = previewProject(answers, {
    ...options,
    context: { level: context.level },
  })

  const lines = insertProjectTree(options.host, tree, context.insertAt)
  debugLog.info('Project inserted', {
    name: tree.root.title,
    level: tree.root.level,
    subtasks: tree.children.length,
    insertedAt: context.insertAt,
  })

  return { tree, lines, insertedAt: context.insertAt }
}
