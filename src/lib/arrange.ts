import type { Cell, SurveyDesign } from '../types'
import { update, validated } from './design'
import { createScope, evaluate, type Expression } from './expressions'
import { createLogger } from './logger'
import { isMissing } from './table'

const log = createLogger('arrange')

export type SortDirection = 'asc' | 'desc'

export type SortKey = string | { column: string; direction: SortDirection } | { by: Expression; direction?: SortDirection; label?: string }

/** Sort descending on `column`. */
export function desc(column: string): SortKey {
  return { column, direction: 'desc' }
}

const TYPE_ORDER: Record<string, number> = { boolean: 0, number: 1, string: 2 }

/** Ascending order on non-missing cells. Strings compare by code unit. */
export function compareCells(a: Cell, b: Cell): number {
  if (typeof a !== typeof b) return (TYPE_ORDER[typeof a] ?? 3) - (TYPE_ORDER[typeof b] ?? 3)
  if (a === b) return 0
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : 1
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1
  if (typeof a === 'boolean' && typeof b === 'boolean') return a ? 1 : -1
  return 0
}

interface ResolvedKey {
  values: readonly Cell[]
  direction: SortDirection
}

function resolveKey(design: SurveyDesign, key: SortKey, rows: number[]): ResolvedKey {
  if (typeof key === 'string') return { values: design.table.column(key), direction: 'asc' }
  if ('column' in key) return { values: design.table.column(key.column), direction: key.direction }
  const scope = createScope(design.table, rows)
  return { values: evaluate(key.by, scope, key.label ?? 'sort key'), direction: key.direction ?? 'asc' }
}

/**
 * Row order for `keys`: stable, missing values last whatever the direction.
 */
export function sortOrder(design: SurveyDesign, keys: SortKey[]): number[] {
  const rows = Array.from({ length: design.table.nrow }, (_, i) => i)
  const resolved = keys.map((k) => resolveKey(design, k, rows))
  return rows.slice().sort((i, j) => {
    for (const { values, direction } of resolved) {
      const a = values[i]
      const b = values[j]
      const ma = isMissing(a)
      const mb = isMissing(b)
      if (ma || mb) {
        if (ma && mb) continue
        return ma ? 1 : -1
      }
      const c = compareCells(a, b)
      if (c !== 0) return direction === 'desc' ? -c : c
    }
    return i - j
  })
}

export interface ArrangeOptions {
  /** Sort by the grouping columns first */
  byGroup?: boolean
}

/** Reorder rows. Every column, the domain column included, moves with its row. */
export function arrange<D extends SurveyDesign>(design: D, keys: SortKey[], options: ArrangeOptions = {}): D {
  const allKeys: SortKey[] = options.byGroup ? [...design.groups, ...keys] : keys
  const order = sortOrder(design, allKeys)
  log.debug('arrange() sorted rows', { keys: allKeys.length })
  return validated(update(design, { table: design.table.takeRows(order) }))
}
