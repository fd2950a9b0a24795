import { describe, it, expect } from 'vitest'
import { parseArgs, parseCursorLine } from './args.ts'

describe('parseArgs', () => {
  it('splits the command from its positionals', () => {
    expect(parseArgs(['new', 'plans.org', '12'])).toEqual({
      command: 'new',
      positionals: ['plans.org', '12'],
      debug: false,
    })
  })

  it('picks up the debug flag anywhere', () => {
    expect(parseArgs(['-d', 'new', 'plans.org'])).toEqual({
      command: 'new',
      positionals: ['plans.org'],
      debug: true,
    })
    expect(parseArgs(['preview', '--debug']).debug).toBe(true)
  })

  it('has no command for empty input', () => {
    expect(parseArgs([]).command).toBeUndefined()
  })
})

describe('parseCursorLine', () => {
  it('converts a 1-based line to an index', () => {
    expect(parseCursorLine('1')).toBe(0)
    expect(parseCursorLine('12')).toBe(11)
  })

  it('returns null when no line is given', () => {
    expect(parseCursorLine(undefined)).toBeNull()
  })

  it('rejects zero and non-numbers', () => {
    expect(() => parseCursorLine('0')).toThrow('Line must be a positive integer, got "0"')
    expect(() => parseCursorLine('ten')).toThrow('Line must be a positive integer, got "ten"')
    expect(() => parseCursorLine('-3')).toThrow('Line must be a positive integer, got "-3"')
  })
})
