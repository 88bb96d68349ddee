/**
 * Column-set verbs. select() drops columns physically but never a protected
 * one; what the user asked for is recorded separately as the visible columns.
 */

import type { Cell, SurveyDesign } from '../types'
import { presentProtectedColumns, update, validated } from './design'
import { ColumnNotFoundError, InvalidArgumentError } from './errors'
import { createLogger } from './logger'
import type { Table } from './table'
import { resolveSelection, type Selection } from './tidySelect'

const log = createLogger('select')

function sameSet(a: string[], b: string[]): boolean {
  const set = new Set(a)
  return set.size === new Set(b).size && b.every((n) => set.has(n))
}

/** Normalize a visible list: empty or everything means "all visible" (null). */
export function normalizeVisible(visible: string[], columns: string[]): string[] | null {
  return visible.length === 0 || sameSet(visible, columns) ? null : visible
}

/**
 * Keep the selected columns plus every protected and grouping column.
 * Labels of dropped columns are purged.
 */
export function select<D extends SurveyDesign>(design: D, selection: Selection): D {
  const current = design.table.columnNames
  const userColumns = resolveSelection(selection, current, design.table)
  const keep = new Set([...design.groups, ...presentProtectedColumns(design)])
  const finalColumns = [...userColumns, ...current.filter((n) => keep.has(n) && !userColumns.includes(n))]
  const dropped = current.filter((n) => !finalColumns.includes(n))

  log.debug('select() resolved columns', { selected: userColumns, dropped })
  return validated(
    update(design, {
      table: design.table.selectColumns(finalColumns),
      labels: design.labels.deleteKeys(dropped),
      visibleColumns: normalizeVisible(userColumns, finalColumns),
      rowwise: { ...design.rowwise, idColumns: design.rowwise.idColumns.filter((n) => finalColumns.includes(n)) },
    })
  )
}

export interface RelocateOptions {
  before?: Selection
  after?: Selection
}

/** Move `moving` to the position given by `options` within `names`. */
export function relocateNames(verb: string, names: string[], selection: Selection, options: RelocateOptions, table?: Table): string[] {
  if (options.before !== undefined && options.after !== undefined) {
    throw new InvalidArgumentError(verb, 'supply at most one of "before" and "after".')
  }
  const moving = resolveSelection(selection, names, table)
  const rest = names.filter((n) => !moving.includes(n))

  let at = 0
  if (options.before !== undefined) {
    const anchors = resolveSelection(options.before, names, table)
    const positions = anchors.map((a) => rest.indexOf(a)).filter((i) => i !== -1)
    at = positions.length ? Math.min(...positions) : 0
  } else if (options.after !== undefined) {
    const anchors = resolveSelection(options.after, names, table)
    const positions = anchors.map((a) => rest.indexOf(a)).filter((i) => i !== -1)
    at = positions.length ? Math.max(...positions) + 1 : rest.length
  }
  return [...rest.slice(0, at), ...moving, ...rest.slice(at)]
}

/**
 * Reorder columns. With an explicit visible list only that list is reordered;
 * otherwise the table's physical order changes.
 */
export function relocate<D extends SurveyDesign>(design: D, selection: Selection, options: RelocateOptions = {}): D {
  if (design.visibleColumns !== null) {
    const visibleColumns = relocateNames('relocate', design.visibleColumns, selection, options, design.table)
    return validated(update(design, { visibleColumns }))
  }
  const order = relocateNames('relocate', design.table.columnNames, selection, options, design.table)
  return validated(update(design, { table: design.table.selectColumns(order) }))
}

/**
 * Extract one column's values. A number counts from the start (0-based) or,
 * when negative, from the end. The default is the last column.
 */
export function pull(design: SurveyDesign, column: string | number = -1): Cell[] {
  const names = design.table.columnNames
  const name = typeof column === 'string' ? column : names[column < 0 ? names.length + column : column]
  if (name === undefined) throw new ColumnNotFoundError([String(column)])
  return design.table.column(name).slice()
}

/** Columns the presentation layer should show, in display order. */
export function visibleColumnNames(design: SurveyDesign): string[] {
  return design.visibleColumns ?? design.table.columnNames.filter((n) => n !== design.domainColumn)
}
