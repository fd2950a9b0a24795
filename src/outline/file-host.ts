import { existsSync, readFileSync, writeFileSync } from 'fs'
import { OutlineDocument, type CursorContext, type DocumentHost } from './document.ts'
import { debugLog } from '../debug/logger.ts'

/**
 * DocumentHost over an outline file on disk. Every insert is written back
 * immediately; a missing file is treated as empty and created on first insert.
 */
export class OutlineFileHost implements DocumentHost {
  readonly path: string
  readonly document: OutlineDocument

  constructor(path: string, options: { todoKeywords?: string[] } = {}) {
    this.path = path
    const text = existsSync(path) ? readFileSync(path, 'utf-8') : ''
    this.document = new OutlineDocument(text, options)
  }

  contextAt(line: number | null): CursorContext {
    return this.document.contextAt(line)
  }

  insertLines(at: number, lines: string[]): void {
    this.document.insertLines(at, lines)
    writeFileSync(this.path, this.document.toString(), 'utf-8')
    debugLog.debug('Outline file written', { path: this.path, at, lines: lines.length })
  }

  withVisibilityPreserved<T>(fn: () => T): T {
    return this.document.withVisibilityPreserved(fn)
  }
}
