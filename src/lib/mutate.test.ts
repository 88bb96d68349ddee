import { describe, it, expect } from 'vitest'
import { makeLinearizationDesign } from '../test/designs'
import { expectInvariants } from '../test/invariants'
import { DOMAIN_COLUMN, asSurvey, update } from './design'
import { ColumnNotFoundError, ExpressionResultError, InvalidArgumentError } from './errors'
import { type EvalScope, across, described, maxOf, meanOf, where } from './expressions'
import { filter } from './filter'
import { groupBy, rowwise, ungroup } from './groupBy'
import { mutate } from './mutate'
import { select } from './select'
import { Table } from './table'
import { startsWith } from './tidySelect'
import { captureWarnings } from './warnings'

function tiny() {
  const table = Table.fromColumns({ wt: [1, 1, 1, 1], g: ['a', 'b', 'a', 'b'], x: [1, 2, 3, 4], z: [0, 0, 1, 1] })
  return asSurvey(table, { weights: 'wt' })
}

const doubled = described('x * 2', (s) => s.col('x').map((v) => Number(v) * 2))

describe('mutate', () => {
  it('adds a column at the end and records how it was made', () => {
    const d = mutate(tiny(), { x2: doubled })
    expect(d.table.columnNames).toEqual(['wt', 'g', 'x', 'z', 'x2'])
    expect(d.table.column('x2')).toEqual([2, 4, 6, 8])
    expect(d.labels.get('x2')?.transformation).toBe('x * 2')
  })

  it('recycles a scalar', () => {
    expect(mutate(tiny(), { one: () => 1 }).table.column('one')).toEqual([1, 1, 1, 1])
  })

  it('sees columns written earlier in the same call', () => {
    const d = mutate(tiny(), { x2: doubled, x4: (s) => s.col('x2').map((v) => Number(v) * 2) })
    expect(d.table.column('x4')).toEqual([4, 8, 12, 16])
  })

  it('evaluates per group', () => {
    const d = mutate(groupBy(tiny(), ['g']), { gm: (s) => meanOf(s.col('x')) })
    expect(d.table.column('gm')).toEqual([2, 3, 2, 3])
    expect(d.groups).toEqual(['g'])
  })

  it('computes per row, then over the whole table once ungrouped', () => {
    const rowMax = rowwise(makeLinearizationDesign())
    const withMax = mutate(rowMax, { row_max: (s) => maxOf(s.cAcross(startsWith('y'))) })
    // row 0: y1 -5, y2 -3, y3 missing; row 1: y1 2, y2 0, y3 1
    expect(withMax.table.column('row_max').slice(0, 2)).toEqual([-3, 2])
    expect(withMax.rowwise.active).toBe(true)

    const d = mutate(ungroup(withMax), { y1_mean: (s) => meanOf(s.col('y1')) })
    const means = d.table.column('y1_mean')
    expect(new Set(means).size).toBe(1)
    expect(means[0]).toBeCloseTo(-0.05)
    expectInvariants(d)
  })

  it('warns when a design variable is overwritten', () => {
    const { value, warnings } = captureWarnings(() => mutate(tiny(), { wt: described('constant 2', () => 2) }))
    expect(value.table.column('wt')).toEqual([2, 2, 2, 2])
    expect(value.labels.get('wt')?.transformation).toBe('constant 2')
    expect(warnings.map((w) => w.code)).toEqual(['COMPUTED_OVER_DESIGN_VARIABLE'])
    expect(warnings[0].columns).toEqual(['wt'])
  })

  it('keeps only used, unused or no input columns', () => {
    const cols = (keep: 'all' | 'used' | 'unused' | 'none') => mutate(tiny(), { x2: doubled }, { keep }).table.columnNames
    expect(cols('all')).toEqual(['wt', 'g', 'x', 'z', 'x2'])
    expect(cols('used')).toEqual(['wt', 'x', 'x2'])
    expect(cols('unused')).toEqual(['wt', 'g', 'z', 'x2'])
    expect(cols('none')).toEqual(['wt', 'x2'])
  })

  it('always keeps grouping columns', () => {
    const d = mutate(groupBy(tiny(), ['g']), { x2: doubled }, { keep: 'none' })
    expect(d.table.columnNames).toEqual(['wt', 'g', 'x2'])
  })

  it('purges labels of dropped columns', () => {
    const base = tiny()
    const d = update(base, { labels: base.labels.setLabel('z', 'Zed') })
    expect(mutate(d, { x2: doubled }, { keep: 'used' }).labels.has('z')).toBe(false)
  })

  it('places new columns before or after an anchor', () => {
    expect(mutate(tiny(), { x2: doubled }, { before: 'x' }).table.columnNames).toEqual(['wt', 'g', 'x2', 'x', 'z'])
    expect(mutate(tiny(), { x2: doubled }, { after: 'wt' }).table.columnNames).toEqual(['wt', 'x2', 'g', 'x', 'z'])
    expect(() => mutate(tiny(), { x2: doubled }, { before: 'x', after: 'x' })).toThrow(InvalidArgumentError)
  })

  it('appends new columns to an explicit visible list', () => {
    const d = mutate(select(tiny(), ['x']), { x2: doubled })
    expect(d.visibleColumns).toEqual(['x', 'x2'])
    const none = mutate(select(tiny(), ['x']), { x2: doubled }, { keep: 'none' })
    expect(none.visibleColumns).toEqual(['x2'])
  })

  it('applies a function across columns without recording it', () => {
    const { value, warnings } = captureWarnings(() =>
      mutate(tiny(), [across(['x', 'wt'], (v) => v.map((c) => Number(c) * 10), '{col}_x10')])
    )
    expect(value.table.columnNames).toEqual(['wt', 'g', 'x', 'z', 'x_x10', 'wt_x10'])
    expect(value.table.column('x_x10')).toEqual([10, 20, 30, 40])
    expect(value.labels.has('x_x10')).toBe(false)
    expect(warnings).toEqual([])
  })

  it('overwrites inputs with across by default', () => {
    const d = mutate(tiny(), [across(['x', 'z'], (v) => v.map((c) => Number(c) + 1))])
    expect(d.table.column('x')).toEqual([2, 3, 4, 5])
    expect(d.table.column('z')).toEqual([1, 1, 2, 2])
  })

  it('rejects a result of the wrong length', () => {
    expect(() => mutate(tiny(), { bad: () => [1, 2] })).toThrow(ExpressionResultError)
    expect(() => mutate(tiny(), { bad: () => [1, 2] })).toThrow('Expression for "bad" returned 2 value(s); expected 1 or 4.')
  })

  it('cannot read the domain column', () => {
    const d = filter(tiny(), [where('x', (v) => Number(v) > 1)])
    expect(() => mutate(d, { m: (s) => s.col(DOMAIN_COLUMN) })).toThrow(ColumnNotFoundError)
  })

  it('refuses to write the domain column, even before any filter', () => {
    const d = tiny()
    const overDomain = { [DOMAIN_COLUMN]: (s: EvalScope) => s.col('x').map((v) => Number(v) > 2) }
    expect(() => mutate(d, overDomain)).toThrow(InvalidArgumentError)
    expect(() => mutate(d, overDomain)).toThrow(`mutate(): "${DOMAIN_COLUMN}" is reserved for the domain column.`)
    expect(() => mutate(d, [across('x', (v) => v, DOMAIN_COLUMN)])).toThrow(InvalidArgumentError)
    expect(d.table.has(DOMAIN_COLUMN)).toBe(false)
  })

  it('places new columns in an explicit visible list next to a shown anchor', () => {
    const d = select(tiny(), ['x', 'z'])
    const before = mutate(d, { x2: doubled }, { before: 'z' })
    expect(before.table.columnNames).toEqual(['x', 'x2', 'z', 'wt'])
    expect(before.visibleColumns).toEqual(['x', 'x2', 'z'])
    expect(mutate(d, { x2: doubled }, { after: 'x' }).visibleColumns).toEqual(['x', 'x2', 'z'])
  })

  it('appends to the visible list when the anchor is not shown', () => {
    const d = mutate(select(tiny(), ['x', 'z']), { x2: doubled }, { after: 'wt' })
    expect(d.table.columnNames).toEqual(['x', 'z', 'wt', 'x2'])
    expect(d.visibleColumns).toEqual(['x', 'z', 'x2'])
  })

  it('leaves the domain mask alone', () => {
    const d = filter(tiny(), [where('x', (v) => Number(v) > 1)])
    const result = mutate(d, { x2: doubled }, { keep: 'none' })
    expect(result.table.column(DOMAIN_COLUMN)).toEqual([false, true, true, true])
    expectInvariants(result)
  })
})
