/**
 * In-memory outline document.
 *
 * Headlines are lines starting with one or more `*` followed by whitespace;
 * the star count is the level. Folding is tracked per headline line so that
 * inserts can be wrapped in withVisibilityPreserved.
 */

export const DEFAULT_TODO_KEYWORDS = ['TODO', 'NEXT', 'WAITING', 'DONE', 'CANCELLED']

const HEADLINE_REGEX = /^(\*+)[ \t]+(.*)$/

export type Headline = {
  line: number
  level: number
  todo?: string
  title: string
}

export type CursorContext = {
  /** Enclosing headline, or null when the cursor is above the first one */
  headline: Headline | null
  level: number | null
  /** Line index where a sibling subtree would start */
  insertAt: number
}

/** What the template command needs from whatever holds the document */
export interface DocumentHost {
  contextAt(line: number | null): CursorContext
  insertLines(at: number, lines: string[]): void
  withVisibilityPreserved<T>(fn: () => T): T
}

type Edit = { at: number; count: number }

export class OutlineDocument implements DocumentHost {
  private lines: string[]
  private trailingNewline: boolean
  private readonly lineEnding: '\n' | '\r\n'
  private folded = new Set<number>()
  private edits: Edit[] | null = null
  private readonly todoKeywords: Set<string>

  constructor(text: string, options: { todoKeywords?: string[] } = {}) {
    // Lines are kept without their endings; CRLF files are written back as CRLF
    this.lineEnding = text.includes('\r\n') ? '\r\n' : '\n'
    const normalized = text.replace(/\r\n/g, '\n')
    this.trailingNewline = normalized.endsWith('\n')
    const body = this.trailingNewline ? normalized.slice(0, -1) : normalized
    this.lines = body === '' ? [] : body.split('\n')
    this.todoKeywords = new Set(options.todoKeywords ?? DEFAULT_TODO_KEYWORDS)
  }

  get lineCount(): number {
    return this.lines.length
  }

  getLines(): string[] {
    return [...this.lines]
  }

  toString(): string {
    if (this.lines.length === 0) return ''
    return this.lines.join(this.lineEnding) + (this.trailingNewline ? this.lineEnding : '')
  }

  headlines(): Headline[] {
    const result: Headline[] = []
    this.lines.forEach((text, line) => {
      const match = text.match(HEADLINE_REGEX)
      if (!match) return

      const level = match[1].length
      const rest = match[2]
      const [first] = rest.split(/\s+/, 1)
      if (first && this.todoKeywords.has(first)) {
        result.push({ line, level, todo: first, title: rest.slice(first.length).trim() })
      } else {
        result.push({ line, level, title: rest.trim() })
      }
    })
    return result
  }

  /** Last headline at or above `line` */
  private headlineAt(line: number): Headline | null {
    let found: Headline | null = null
    for (const headline of this.headlines()) {
      if (headline.line > line) break
      found = headline
    }
    return found
  }

  /** Line index just past the subtree rooted at `headline` */
  private subtreeEnd(headline: Headline): number {
    const next = this.headlines().find(
      (h) => h.line > headline.line && h.level <= headline.level,
    )
    return next ? next.line : this.lines.length
  }

  contextAt(line: number | null): CursorContext {
    const headline = line === null ? null : this.headlineAt(line)
    if (!headline) {
      return { headline: null, level: null, insertAt: this.lines.length }
    }
    return { headline, level: headline.level, insertAt: this.subtreeEnd(headline) }
  }

  insertLines(at: number, lines: string[]): void {
    if (at < 0 || at > this.lines.length) {
      throw new RangeError(`Insert position ${at} is outside the document (0-${this.lines.length})`)
    }

    // An empty document gains a final newline with its first lines
    if (this.lines.length === 0) this.trailingNewline = true
    this.lines.splice(at, 0, ...lines)

    this.folded = new Set([...this.folded].map((l) => (l >= at ? l + lines.length : l)))
    this.edits?.push({ at, count: lines.length })

    // Inserting reveals the outline path leading to the insertion point
    for (const headline of this.ancestorsOf(at)) {
      this.folded.delete(headline.line)
    }
  }

  // ==========================================================================
  // Visibility
  // ==========================================================================

  fold(line: number): void {
    if (!this.headlines().some((h) => h.line === line)) {
      throw new RangeError(`Line ${line} is not a headline`)
    }
    this.folded.add(line)
  }

  unfold(line: number): void {
    this.folded.delete(line)
  }

  isFolded(line: number): boolean {
    return this.folded.has(line)
  }

  foldedLines(): number[] {
    return [...this.folded].sort((a, b) => a - b)
  }

  /**
   * Run `fn` and put the folds back as they were, shifted past any lines it
   * inserted. Folds are restored even when `fn` throws.
   */
  withVisibilityPreserved<T>(fn: () => T): T {
    const saved = [...this.folded]
    const outer = this.edits
    const edits: Edit[] = []
    this.edits = edits

    try {
      return fn()
    } finally {
      this.folded = new Set(
        saved.map((line) =>
          edits.reduce((l, edit) => (l >= edit.at ? l + edit.count : l), line),
        ),
      )
      this.edits = outer
      outer?.push(...edits)
    }
  }

  private ancestorsOf(line: number): Headline[] {
    const ancestors: Headline[] = []
    let level = Infinity
    const before = this.headlines().filter((h) => h.line < line).reverse()
    for (const headline of before) {
      if (headline.level < level) {
        ancestors.push(headline)
        level = headline.level
      }
    }
    return ancestors
  }
}
