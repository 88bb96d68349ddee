/**
 * Domain filtering. filter() and filterOut() never remove rows: they AND a new
 * boolean vector into the domain column. subset() is the physical variant.
 */

import type { SurveyDesign } from '../types'
import { domainMask, update, validated } from './design'
import { EmptyResultError, UnsupportedGroupingArgumentError } from './errors'
import { createScope, describe, evaluateCondition, type Expression } from './expressions'
import { createLogger } from './logger'
import { warnEmptyDomain, warnPhysicalSubset } from './warnings'

const log = createLogger('filter')

export interface FilterOptions {
  /** Per-call grouping is not supported; use groupBy() */
  by?: unknown
}

function allRows(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i)
}

/**
 * Evaluate every condition over the whole table and AND them element-wise.
 * Missing results stay missing (null) so callers can apply their own rule.
 */
export function conjunction(verb: string, design: SurveyDesign, conditions: Expression[]): (boolean | null)[] {
  const scope = createScope(design.table, allRows(design.table.nrow), new Set(), new Set([design.domainColumn]))
  const vectors = conditions.map((c, i) => evaluateCondition(verb, i, c, scope))
  return scope.rows.map((_, row) => {
    let acc: boolean | null = true
    for (const v of vectors) {
      const x = v[row]
      if (x === false) return false
      if (x === null) acc = null
    }
    return acc
  })
}

function applyMask<D extends SurveyDesign>(verb: string, design: D, mask: boolean[], audit: string[]): D {
  const existing = domainMask(design)
  const combined = mask.map((m, i) => m && existing[i])
  const inDomain = combined.filter(Boolean).length
  log.debug(`${verb}() updated domain`, { rows: combined.length, inDomain })
  if (inDomain === 0) warnEmptyDomain(verb)
  return validated(
    update(design, {
      table: design.table.withColumn(design.domainColumn, combined),
      domainAudit: [...design.domainAudit, ...audit],
    })
  )
}

function rejectBy(verb: string, options: FilterOptions): void {
  if (options.by !== undefined && options.by !== null) throw new UnsupportedGroupingArgumentError(verb)
}

/**
 * Restrict the domain to rows where every condition is true.
 * Missing condition results count as false. Row count never changes.
 *
 * @example
 * filter(design, [where('y1', (v) => Number(v) > 0)])
 */
export function filter<D extends SurveyDesign>(design: D, conditions: Expression[], options: FilterOptions = {}): D {
  rejectBy('filter', options)
  const mask = conjunction('filter', design, conditions).map((v) => v === true)
  return applyMask('filter', design, mask, conditions.map(describe))
}

/**
 * Mark rows where every condition is true as out-of-domain.
 * Missing condition results keep the row in-domain, so this is not the
 * same as filter() on a negated condition when values are missing.
 */
export function filterOut<D extends SurveyDesign>(design: D, conditions: Expression[], options: FilterOptions = {}): D {
  rejectBy('filterOut', options)
  const mask = conjunction('filterOut', design, conditions).map((v) => v !== true)
  const audit = conditions.length ? [`!(${conditions.map(describe).join(' & ')})`] : []
  return applyMask('filterOut', design, mask, audit)
}

/** Physically keep only rows where every condition is true. */
export function subset<D extends SurveyDesign>(design: D, conditions: Expression[]): D {
  warnPhysicalSubset('subset')
  const keep = conjunction('subset', design, conditions).map((v) => v === true)
  if (!keep.some(Boolean)) throw new EmptyResultError('subset')
  log.debug('subset() removed rows', { before: keep.length, after: keep.filter(Boolean).length })
  return validated(update(design, { table: design.table.filterRows(keep) }))
}
