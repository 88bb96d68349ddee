import { describe, it, expect } from 'vitest'
import { LabelStore } from './labelStore'

describe('LabelStore', () => {
  it('merges partial entries and defaults valueLabels', () => {
    const store = LabelStore.empty().setLabel('y1', 'Outcome 1').set('y1', { notes: 'self-reported' })
    expect(store.get('y1')).toEqual({ valueLabels: [], label: 'Outcome 1', notes: 'self-reported' })
  })

  it('is immutable', () => {
    const a = LabelStore.empty()
    const b = a.setLabel('x', 'X')
    expect(a.has('x')).toBe(false)
    expect(b.has('x')).toBe(true)
  })

  it('renames keys keeping order', () => {
    const store = LabelStore.empty().setLabel('a', 'A').setLabel('b', 'B').renameKeys(new Map([['a', 'alpha']]))
    expect(store.keys()).toEqual(['alpha', 'b'])
    expect(store.get('alpha')?.label).toBe('A')
    expect(store.get('a')).toBeUndefined()
  })

  it('deletes keys', () => {
    const store = LabelStore.empty().setLabel('a', 'A').setLabel('b', 'B').deleteKeys(['a', 'missing'])
    expect(store.keys()).toEqual(['b'])
    expect(store.size).toBe(1)
  })

  it('records transformations', () => {
    const store = LabelStore.empty().setTransformation('z', 'y1 * 2')
    expect(store.toObject()).toEqual({ z: { valueLabels: [], transformation: 'y1 * 2' } })
  })
})
