import { describe, it, expect } from 'vitest'
import { makeAllDesigns } from '../test/designs'
import { expectInvariants } from '../test/invariants'
import { DOMAIN_COLUMN, asSurvey } from './design'
import { distinct } from './distinct'
import { described } from './expressions'
import { filter } from './filter'
import { Table } from './table'
import { captureWarnings } from './warnings'

function tiny() {
  const table = Table.fromColumns({ wt: [1, 1, 2, 1], a: [1, 1, 1, 2], b: ['x', 'x', 'x', 'y'] })
  return asSurvey(table, { weights: 'wt' })
}

describe('distinct', () => {
  it('compares non-protected columns by default and keeps the first row', () => {
    const { value, warnings } = captureWarnings(() => distinct(tiny()))
    expect(value.table.columnNames).toEqual(['wt', 'a', 'b'])
    expect(value.table.column('wt')).toEqual([1, 1])
    expect(value.table.column('b')).toEqual(['x', 'y'])
    expect(warnings.map((w) => w.code)).toEqual(['PHYSICAL_SUBSET'])
    expectInvariants(value)
  })

  it('deduplicates on the given keys, keeping every column', () => {
    const d = distinct(tiny(), 'b')
    expect(d.table.nrow).toBe(2)
    expect(d.table.columnNames).toEqual(['wt', 'a', 'b'])
  })

  it('warns when a key is a design variable', () => {
    const { value, warnings } = captureWarnings(() => distinct(tiny(), ['wt']))
    expect(value.table.column('wt')).toEqual([1, 2])
    expect(value.table.column('a')).toEqual([1, 1])
    expect(warnings.map((w) => w.code)).toEqual(['PHYSICAL_SUBSET', 'DEDUPLICATING_ON_DESIGN_VARIABLE'])
    expect(warnings[1].columns).toEqual(['wt'])
  })

  it('treats missing values as equal', () => {
    const table = Table.fromColumns({ wt: [1, 1, 1], a: [null, null, 3] })
    expect(distinct(asSurvey(table, { weights: 'wt' })).table.column('a')).toEqual([null, 3])
  })

  it('keeps the domain column aligned and out of the default key', () => {
    const notFirst = described('row > 0', (s) => s.rows.map((r) => r > 0))
    const d = distinct(filter(tiny(), [notFirst]))
    expect(d.table.column(DOMAIN_COLUMN)).toEqual([false, true])
  })

  it('keeps every design valid', () => {
    for (const d of Object.values(makeAllDesigns())) {
      const result = distinct(d, 'group')
      expect(result.table.column('group')).toEqual(['A', 'B', 'C'])
      expectInvariants(result)
    }
  })
})
