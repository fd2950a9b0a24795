import { describe, it, expect } from 'vitest'
import { serializeDrawer, serializeHeadline, serializeProjectTree } from './serializer.ts'
import type { ProjectTree } from '../core/plan/types.ts'

describe('serializeHeadline', () => {
  it('writes stars, keyword and title followed by the planning line', () => {
    expect(
      serializeHeadline({ title: 'Kickoff', level: 3, todo: 'TODO', deadline: '<2024-05-31 Fri>' }),
    ).toEqual(['*** TODO Kickoff', 'DEADLINE: <2024-05-31 Fri>'])
  })

  it('omits the keyword when there is none', () => {
    expect(serializeHeadline({ title: 'Kickoff', level: 1, scheduled: '<2024-05-31 Fri>' })).toEqual([
      '* Kickoff',
      'SCHEDULED: <2024-05-31 Fri>',
    ])
  })

  it('keeps the space after the stars for an empty title', () => {
    expect(serializeHeadline({ title: '', level: 2 })).toEqual(['** '])
    expect(serializeHeadline({ title: '', level: 2, todo: 'TODO' })).toEqual(['** TODO '])
  })

  it('writes no planning line for an undated headline', () => {
    expect(serializeHeadline({ title: 'Notes', level: 1 })).toEqual(['* Notes'])
  })
})

describe('serializeDrawer', () => {
  it('wraps properties in a PROPERTIES drawer', () => {
    expect(serializeDrawer([{ key: 'CATEGORY', value: 'work' }])).toEqual([
      ':PROPERTIES:',
      ':CATEGORY: work',
      ':END:',
    ])
  })
})

describe('serializeProjectTree', () => {
  it('renders the root, its drawer and the subtasks in order', () => {
    const tree: ProjectTree = {
      root: { title: 'Launch', level: 2, todo: 'TODO', deadline: '<2024-06-14 Fri>' },
      category: { key: 'CATEGORY', value: 'launch' },
      children: [
        { title: 'Kickoff', level: 3, todo: 'TODO', deadline: '<2024-05-31 Fri>' },
        { title: 'Wrap up', level: 3, todo: 'TODO', deadline: '<2024-06-17 Mon>' },
      ],
    }

    expect(serializeProjectTree(tree)).toEqual([
      '** TODO Launch',
      'DEADLINE: <2024-06-14 Fri>',
      ':PROPERTIES:',
      ':CATEGORY: launch',
      ':END:',
      '*** TODO Kickoff',
      'DEADLINE: <2024-05-31 Fri>',
      '*** TODO Wrap up',
      'DEADLINE: <2024-06-17 Mon>',
    ])
  })
})
