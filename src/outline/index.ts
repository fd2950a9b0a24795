// Outline host adapter exports

export {
  OutlineDocument,
  DEFAULT_TODO_KEYWORDS,
  type DocumentHost,
  type CursorContext,
  type Headline,
} from './document.ts'
export { OutlineFileHost } from './file-host.ts'
export { parseDueDate, DateInputError } from './date-input.ts'
export { serializeProjectTree, serializeHeadline, serializeDrawer } from './serializer.ts'
export { insertProjectTree } from './insert.ts'
