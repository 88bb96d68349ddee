/**
 * slice*() verbs. Each one physically removes rows, so each warns first and
 * refuses to return an empty design.
 */

import { sampleWithReplacement, shuffle } from 'simple-statistics'
import type { SurveyDesign } from '../types'
import { compareCells } from './arrange'
import { update, validated } from './design'
import { EmptyResultError, InvalidArgumentError } from './errors'
import { createScope, evaluate, type Expression } from './expressions'
import { createLogger } from './logger'
import { isMissing } from './table'
import { emitWarning, warnPhysicalSubset } from './warnings'

const log = createLogger('slice')

export interface SliceSize {
  n?: number
  /** Fraction of rows; rounded down */
  prop?: number
}

export interface SliceOrderOptions extends SliceSize {
  /** Keep every row tied with the last one selected (default true) */
  withTies?: boolean
}

export interface SliceSampleOptions extends SliceSize {
  replace?: boolean
  /** Column of sampling weights; unrelated to the design weights */
  weightBy?: string
  /** Uniform [0, 1) source; defaults to Math.random */
  random?: () => number
}

/** Build a slice verb from a function choosing the row indices to keep. */
function sliceVerb<A extends unknown[]>(verb: string, pick: (design: SurveyDesign, ...args: A) => number[]) {
  return <D extends SurveyDesign>(design: D, ...args: A): D => {
    warnPhysicalSubset(verb)
    const rows = pick(design, ...args)
    if (rows.length === 0) throw new EmptyResultError(verb)
    log.debug(`${verb}() kept rows`, { before: design.table.nrow, after: rows.length })
    return validated(update(design, { table: design.table.takeRows(rows) }))
  }
}

function sliceCount(verb: string, total: number, size: SliceSize, allowOver = false): number {
  if (size.n !== undefined && size.prop !== undefined) throw new InvalidArgumentError(verb, 'supply at most one of "n" and "prop".')
  if (size.prop !== undefined) {
    if (!(size.prop >= 0)) throw new InvalidArgumentError(verb, '"prop" must be a non-negative number.', { prop: size.prop })
    const count = Math.floor(size.prop * total)
    return allowOver ? count : Math.min(count, total)
  }
  const n = size.n ?? 1
  if (!Number.isInteger(n)) throw new InvalidArgumentError(verb, '"n" must be an integer.', { n })
  // negative n keeps all but |n| rows
  if (n < 0) return Math.max(0, total + n)
  return allowOver ? n : Math.min(n, total)
}

const range = (from: number, to: number) => Array.from({ length: Math.max(0, to - from) }, (_, i) => from + i)

/** Keep rows at the given 0-based positions, in that order. Out-of-range positions are ignored. */
export const slice = sliceVerb('slice', (design, positions: number[]) => {
  if (positions.some((p) => !Number.isInteger(p) || p < 0)) {
    throw new InvalidArgumentError('slice', 'positions must be non-negative integers.', { positions })
  }
  return positions.filter((p) => p < design.table.nrow)
})

export const sliceHead = sliceVerb('sliceHead', (design, size: SliceSize = {}) => range(0, sliceCount('sliceHead', design.table.nrow, size)))

export const sliceTail = sliceVerb('sliceTail', (design, size: SliceSize = {}) => {
  const total = design.table.nrow
  return range(total - sliceCount('sliceTail', total, size), total)
})

function orderedSlice(verb: string, design: SurveyDesign, orderBy: string | Expression, options: SliceOrderOptions, direction: 1 | -1): number[] {
  const rows = range(0, design.table.nrow)
  const values = typeof orderBy === 'string' ? design.table.column(orderBy) : evaluate(orderBy, createScope(design.table, rows), 'orderBy')
  const sorted = rows.slice().sort((i, j) => {
    const mi = isMissing(values[i])
    const mj = isMissing(values[j])
    if (mi || mj) return mi === mj ? i - j : mi ? 1 : -1
    return direction * compareCells(values[i], values[j]) || i - j
  })
  const count = sliceCount(verb, rows.length, options)
  if (count === 0 || options.withTies === false) return sorted.slice(0, count)
  const last = values[sorted[count - 1]]
  let end = count
  while (end < sorted.length && !isMissing(last) && compareCells(values[sorted[end]], last) === 0) end++
  return sorted.slice(0, end)
}

/** Rows with the smallest values of `orderBy`. Missing values come last. */
export const sliceMin = sliceVerb('sliceMin', (design, orderBy: string | Expression, options: SliceOrderOptions = {}) =>
  orderedSlice('sliceMin', design, orderBy, options, 1)
)

/** Rows with the largest values of `orderBy`. Missing values come last. */
export const sliceMax = sliceVerb('sliceMax', (design, orderBy: string | Expression, options: SliceOrderOptions = {}) =>
  orderedSlice('sliceMax', design, orderBy, options, -1)
)

function weightedSample(rows: number[], weights: number[], count: number, replace: boolean, random: () => number): number[] {
  const pool = rows.slice()
  const w = weights.slice()
  const out: number[] = []
  while (out.length < count) {
    const total = w.reduce((a, b) => a + b, 0)
    if (total <= 0) break
    let target = random() * total
    let k = 0
    while (k < w.length - 1 && target >= w[k]) {
      target -= w[k]
      k++
    }
    out.push(pool[k])
    if (!replace) {
      pool.splice(k, 1)
      w.splice(k, 1)
    }
  }
  return out
}

/**
 * Random rows. Without `weightBy` every row is equally likely; with it, rows
 * are drawn in proportion to that column, which ignores the design weights.
 */
export const sliceSample = sliceVerb('sliceSample', (design, options: SliceSampleOptions = {}) => {
  const { replace = false, random = Math.random } = options
  const rows = range(0, design.table.nrow)
  const count = sliceCount('sliceSample', rows.length, options, replace)

  if (options.weightBy === undefined) {
    return replace ? sampleWithReplacement(rows, count, random) : shuffle(rows, random).slice(0, count)
  }

  emitWarning({
    code: 'SAMPLE_WEIGHT_INDEPENDENT_OF_DESIGN',
    verb: 'sliceSample',
    message: `sliceSample() samples in proportion to "${options.weightBy}", independently of the survey design weights. Use the design weights for probability-proportional sampling.`,
    columns: [options.weightBy],
  })
  const weights = design.table.column(options.weightBy).map((v) => (isMissing(v) ? 0 : v))
  const numeric: number[] = []
  for (const w of weights) {
    if (typeof w !== 'number' || w < 0) {
      throw new InvalidArgumentError('sliceSample', `"weightBy" column must hold non-negative numbers.`, { column: options.weightBy })
    }
    numeric.push(w)
  }
  return weightedSample(rows, numeric, count, replace, random)
})
