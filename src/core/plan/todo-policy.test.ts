import { describe, it, expect } from 'vitest'
import { parseTodoPolicy, resolveProjectTodo, serializeTodoPolicy } from './todo-policy.ts'

describe('parseTodoPolicy', () => {
  it('reads true as mirroring the subtask keyword', () => {
    expect(parseTodoPolicy(true)).toEqual({ kind: 'mirror-subtask' })
  })

  it('reads false as disabled', () => {
    expect(parseTodoPolicy(false)).toEqual({ kind: 'disabled' })
  })

  it('reads a string as a custom keyword', () => {
    expect(parseTodoPolicy(' PROJ ')).toEqual({ kind: 'custom', state: 'PROJ' })
  })

  it('treats blank strings and other values as disabled', () => {
    expect(parseTodoPolicy('   ')).toEqual({ kind: 'disabled' })
    expect(parseTodoPolicy(42)).toEqual({ kind: 'disabled' })
    expect(parseTodoPolicy(null)).toEqual({ kind: 'disabled' })
    expect(parseTodoPolicy(undefined)).toEqual({ kind: 'disabled' })
    expect(parseTodoPolicy({ state: 'TODO' })).toEqual({ kind: 'disabled' })
  })
})

describe('serializeTodoPolicy', () => {
  it('writes each variant back to its settings value', () => {
    expect(serializeTodoPolicy({ kind: 'disabled' })).toBe(false)
    expect(serializeTodoPolicy({ kind: 'mirror-subtask' })).toBe(true)
    expect(serializeTodoPolicy({ kind: 'custom', state: 'PROJ' })).toBe('PROJ')
  })
})

describe('resolveProjectTodo', () => {
  it('returns nothing when disabled', () => {
    expect(resolveProjectTodo({ kind: 'disabled' }, 'TODO')).toBeUndefined()
  })

  it('copies the subtask keyword when mirroring', () => {
    expect(resolveProjectTodo({ kind: 'mirror-subtask' }, 'NEXT')).toBe('NEXT')
  })

  it('returns nothing when mirroring an empty subtask keyword', () => {
    expect(resolveProjectTodo({ kind: 'mirror-subtask' }, '')).toBeUndefined()
  })

  it('uses the custom keyword regardless of the subtask keyword', () => {
    expect(resolveProjectTodo({ kind: 'custom', state: 'PROJ' }, 'TODO')).toBe('PROJ')
  })
})
