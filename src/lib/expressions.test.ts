import { describe, it, expect } from 'vitest'
import { ColumnNotFoundError, ExpressionResultError, NonLogicalPredicateError } from './errors'
import {
  across,
  createScope,
  described,
  describe as describeExpression,
  evaluate,
  evaluateCondition,
  isAcross,
  maxOf,
  meanOf,
  minOf,
  missingIn,
  negate,
  sumOf,
  where,
} from './expressions'
import { Table } from './table'
import { startsWith } from './tidySelect'

const table = Table.fromColumns({ a: [1, 2, 3, 4], b: [10, null, 30, 40], s: ['p', 'q', 'r', 's'], hide: [true, true, false, false] })

describe('createScope', () => {
  it('reads the rows in scope and records used columns', () => {
    const used = new Set<string>()
    const scope = createScope(table, [1, 3], used)
    expect(scope.col('a')).toEqual([2, 4])
    expect(scope.n()).toBe(2)
    expect(scope.rows).toEqual([1, 3])
    expect(Array.from(used)).toEqual(['a'])
  })

  it('concatenates selected columns with cAcross', () => {
    const used = new Set<string>()
    const scope = createScope(table, [0], used)
    expect(scope.cAcross(['a', 'b'])).toEqual([1, 10])
    expect(Array.from(used)).toEqual(['a', 'b'])
  })

  it('hides columns from reads and selections', () => {
    const scope = createScope(table, [0, 1], new Set(), new Set(['hide']))
    expect(() => scope.col('hide')).toThrow(ColumnNotFoundError)
    expect(scope.cAcross(startsWith('h'))).toEqual([])
  })
})

describe('evaluate', () => {
  const scope = createScope(table, [0, 1, 2])

  it('recycles scalars and length-1 results', () => {
    expect(evaluate(() => 7, scope, 'x')).toEqual([7, 7, 7])
    expect(evaluate(() => ['k'], scope, 'x')).toEqual(['k', 'k', 'k'])
  })

  it('returns full-length results as they are', () => {
    expect(evaluate((s) => s.col('s'), scope, 'x')).toEqual(['p', 'q', 'r'])
  })

  it('rejects other lengths', () => {
    expect(() => evaluate(() => [1, 2], scope, 'x')).toThrow(ExpressionResultError)
  })
})

describe('evaluateCondition', () => {
  const scope = createScope(table, [0, 1, 2, 3])

  it('keeps missing as null', () => {
    const bBig = described('b > 15', (s) => s.col('b').map((v) => (v === null ? null : Number(v) > 15)))
    expect(evaluateCondition('filter', 0, bBig, scope)).toEqual([false, null, true, true])
  })

  it('rejects non-boolean values', () => {
    expect(() => evaluateCondition('filter', 2, (s) => s.col('a'), scope)).toThrow(NonLogicalPredicateError)
    expect(() => evaluateCondition('filter', 2, (s) => s.col('a'), scope)).toThrow('filter() condition 3 must be logical, not number.')
  })
})

describe('condition helpers', () => {
  const scope = createScope(table, [0, 1, 2, 3])

  it('where tests each present value', () => {
    const expr = where('b', (v) => Number(v) > 15)
    expect(expr.fn(scope)).toEqual([false, null, true, true])
    expect(expr.description.startsWith('b: ')).toBe(true)
  })

  it('missingIn flags missing values', () => {
    const expr = missingIn('b')
    expect(expr.fn(scope)).toEqual([false, true, false, false])
    expect(expr.description).toBe('is_missing(b)')
  })

  it('negate flips booleans and keeps missing', () => {
    const expr = negate(where('b', (v) => Number(v) > 15))
    expect(expr.fn(scope)).toEqual([true, null, false, false])
    expect(negate(described('a > 1', () => true)).description).toBe('!(a > 1)')
  })

  it('describes an expression by its description or its source', () => {
    expect(describeExpression(described('total', () => 1))).toBe('total')
    expect(describeExpression(() => 1)).toContain('1')
  })
})

describe('aggregates', () => {
  it('ignore missing and non-numeric values', () => {
    expect(meanOf([1, null, 'a', 3])).toBe(2)
    expect(sumOf([1, null, 2])).toBe(3)
    expect(minOf([4, Number.NaN, 2])).toBe(2)
    expect(maxOf([4, true, 9])).toBe(9)
  })

  it('return null on empty input, except sum', () => {
    expect(meanOf([])).toBeNull()
    expect(minOf([null])).toBeNull()
    expect(maxOf(['x'])).toBeNull()
    expect(sumOf([])).toBe(0)
  })
})

describe('across', () => {
  it('builds a tagged term with a default name template', () => {
    const term = across(['a'], (v) => v)
    expect(term.names).toBe('{col}')
    expect(isAcross(term)).toBe(true)
    expect(isAcross({ a: () => 1 })).toBe(false)
  })
})
