import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { createProject, previewProject, type ProjectAnswers } from './create-project.ts'
import type { PlanConfig } from './plan/types.ts'
import { OutlineDocument, type CursorContext, type DocumentHost } from '../outline/document.ts'
import { OutlineFileHost } from '../outline/file-host.ts'
import { DateInputError } from '../outline/date-input.ts'

const CONFIG: PlanConfig = {
  subtasks: [
    { name: 'Draft', offsetDays: 7 },
    { name: 'Review', offsetDays: 2 },
  ],
  projectTodo: { kind: 'mirror-subtask' },
  defaultTodo: 'TODO',
  planning: 'deadline',
  allowWeekends: false,
}

const SAMPLE = ['* Work', '** TODO Report', 'Some notes', '** Meetings', '* Home', ''].join('\n')

// Tuesday 2024-06-11
const TODAY = new Date(2024, 5, 11, 9, 0)

const ANSWERS: ProjectAnswers = { name: 'Launch', category: '', dueDate: '2024-06-14' }

const LEVEL_2_PROJECT = [
  '** TODO Launch',
  'DEADLINE: <2024-06-14 Fri>',
  ':PROPERTIES:',
  ':CATEGORY: Launch',
  ':END:',
  '*** TODO Draft',
  'DEADLINE: <2024-06-07 Fri>',
  '*** TODO Review',
  'DEADLINE: <2024-06-12 Wed>',
]

describe('createProject', () => {
  it('inserts a sibling project after the subtree at the cursor', () => {
    const doc = new OutlineDocument(SAMPLE)
    const result = createProject(ANSWERS, { host: doc, config: CONFIG, today: TODAY, cursorLine: 2 })

    expect(result.insertedAt).toBe(3)
    expect(result.lines).toEqual(LEVEL_2_PROJECT)
    expect(doc.getLines()).toEqual([
      '* Work',
      '** TODO Report',
      'Some notes',
      ...LEVEL_2_PROJECT,
      '** Meetings',
      '* Home',
    ])
  })

  it('appends a top-level project when there is no cursor', () => {
    const doc = new OutlineDocument(SAMPLE)
    const result = createProject(ANSWERS, { host: doc, config: CONFIG, today: TODAY, cursorLine: null })

    expect(result.insertedAt).toBe(5)
    expect(result.tree.root.level).toBe(1)
    expect(doc.getLines()[5]).toBe('* TODO Launch')
    expect(doc.getLines()[10]).toBe('** TODO Draft')
  })

  it('resolves relative due dates against today', () => {
    const doc = new OutlineDocument(SAMPLE)
    const result = createProject(
      { ...ANSWERS, dueDate: '+3d' },
      { host: doc, config: CONFIG, today: TODAY, cursorLine: 2 },
    )

    expect(result.tree.root.deadline).toBe('<2024-06-14 Fri>')
  })

  it('keeps the category when one is given', () => {
    const doc = new OutlineDocument(SAMPLE)
    const result = createProject(
      { ...ANSWERS, category: 'release' },
      { host: doc, config: CONFIG, today: TODAY, cursorLine: 2 },
    )

    expect(result.lines[3]).toBe(':CATEGORY: release')
  })

  it('keeps existing folds closed', () => {
    const doc = new OutlineDocument(SAMPLE)
    doc.fold(0)
    doc.fold(4)

    createProject(ANSWERS, { host: doc, config: CONFIG, today: TODAY, cursorLine: 2 })

    expect(doc.foldedLines()).toEqual([0, 13])
  })

  it('inserts nothing when the due date is invalid', () => {
    const doc = new OutlineDocument(SAMPLE)

    expect(() =>
      createProject(
        { ...ANSWERS, dueDate: 'someday' },
        { host: doc, config: CONFIG, today: TODAY, cursorLine: 2 },
      ),
    ).toThrow(DateInputError)
    expect(doc.toString()).toBe(SAMPLE)
  })

  it('reports out-of-range offsets as date input errors', () => {
    const doc = new OutlineDocument(SAMPLE)

    expect(() =>
      createProject(
        { ...ANSWERS, dueDate: '+99999999999d' },
        { host: doc, config: CONFIG, today: TODAY, cursorLine: 2 },
      ),
    ).toThrow(DateInputError)
    expect(doc.toString()).toBe(SAMPLE)
  })

  it('hands the whole project to the host in a single insert', () => {
    const inserts: Array<{ at: number; lines: string[] }> = []
    let wrapped = 0
    const host: DocumentHost = {
      contextAt: (): CursorContext => ({ headline: null, level: 3, insertAt: 12 }),
      insertLines: (at, lines) => {
        inserts.push({ at, lines })
      },
      withVisibilityPreserved: (fn) => {
        wrapped++
        return fn()
      },
    }

    createProject(ANSWERS, { host, config: CONFIG, today: TODAY, cursorLine: 20 })

    expect(wrapped).toBe(1)
    expect(inserts).toHaveLength(1)
    expect(inserts[0].at).toBe(12)
    expect(inserts[0].lines[0]).toBe('*** TODO Launch')
    expect(inserts[0].lines).toHaveLength(9)
  })

  it('passes an empty project name through', () => {
    const doc = new OutlineDocument('')
    const result = createProject(
      { name: '', category: '', dueDate: '2024-06-14' },
      { host: doc, config: CONFIG, today: TODAY, cursorLine: null },
    )

    expect(result.lines[0]).toBe('* TODO ')
    expect(result.lines[3]).toBe(':CATEGORY: ')
  })
})

describe('previewProject', () => {
  it('builds the lines without a document', () => {
    const preview = previewProject(ANSWERS, { config: CONFIG, today: TODAY, context: { level: 1 } })

    expect(preview.lines).toEqual(LEVEL_2_PROJECT.map((line) => line.replace(/^\*(\*+)/, '$1')))
  })

  it('applies a subtask keyword override', () => {
    const preview = previewProject(ANSWERS, { config: CONFIG, today: TODAY, todo: 'NEXT' })

    expect(preview.lines[0]).toBe('* NEXT Launch')
    expect(preview.lines[5]).toBe('** NEXT Draft')
  })
})

describe('createProject with an outline file', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = join(tmpdir(), `backplan-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(tempDir, { recursive: true })
  })

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  it('writes the project into the file', () => {
    const path = join(tempDir, 'plans.org')
    writeFileSync(path, SAMPLE)

    createProject(ANSWERS, { host: new OutlineFileHost(path), config: CONFIG, today: TODAY, cursorLine: 2 })

    expect(readFileSync(path, 'utf-8')).toBe(
      ['* Work', '** TODO Report', 'Some notes', ...LEVEL_2_PROJECT, '** Meetings', '* Home', ''].join('\n'),
    )
  })

  it('writes into a CRLF file at the cursor level with CRLF endings', () => {
    const path = join(tempDir, 'plans.org')
    writeFileSync(path, SAMPLE.replace(/\n/g, '\r\n'))

    const result = createProject(ANSWERS, {
      host: new OutlineFileHost(path),
      config: CONFIG,
      today: TODAY,
      cursorLine: 2,
    })

    expect(result.insertedAt).toBe(3)
    expect(readFileSync(path, 'utf-8')).toBe(
      ['* Work', '** TODO Report', 'Some notes', ...LEVEL_2_PROJECT, '** Meetings', '* Home', ''].join('\r\n'),
    )
  })

  it('creates a missing file', () => {
    const path = join(tempDir, 'new.org')

    createProject(ANSWERS, { host: new OutlineFileHost(path), config: CONFIG, today: TODAY, cursorLine: null })

    expect(readFileSync(path, 'utf-8').split('\n')[0]).toBe('* TODO Launch')
  })

  it('leaves the file untouched when the date is invalid', () => {
    const path = join(tempDir, 'plans.org')
    writeFileSync(path, SAMPLE)

    expect(() =>
      createProject(
        { ...ANSWERS, dueDate: '2024-13-01' },
        { host: new OutlineFileHost(path), config: CONFIG, today: TODAY, cursorLine: 2 },
      ),
    ).toThrow(DateInputError)
    expect(readFileSync(path, 'utf-8')).toBe(SAMPLE)
  })
})
