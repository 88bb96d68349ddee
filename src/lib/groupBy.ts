/**
 * Grouping and rowwise state. Neither changes the table's rows; they only
 * decide how mutate() scopes its expressions.
 *
 *   Ungrouped --groupBy--> Grouped --ungroup()--> Ungrouped
 *   Ungrouped --rowwise--> Rowwise --ungroup()--> Ungrouped
 *   Rowwise   --groupBy(add)--> Grouped on the rowwise id columns + new keys
 *   Grouped   --rowwise--> Rowwise with the grouping columns as id columns
 */

import type { SurveyDesign } from '../types'
import { assertNotDomainColumn, protectedColumns, update, validated } from './design'
import { createScope, evaluate, type Expression } from './expressions'
import { createLogger } from './logger'
import type { Table } from './table'
import { resolveSelection, type Selection } from './tidySelect'
import { emitWarning } from './warnings'

const log = createLogger('groupBy')

/** Group on a column computed from `expr`, stored under `name` */
export interface ComputedGroupKey {
  name: string
  expr: Expression
}

export type GroupKey = Selection | ComputedGroupKey

function isComputedKey(key: GroupKey): key is ComputedGroupKey {
  return typeof key === 'object' && !Array.isArray(key) && 'expr' in key
}

const unique = (names: string[]) => names.filter((n, i) => names.indexOf(n) === i)

export interface GroupByOptions {
  /** Add to the existing grouping instead of replacing it */
  add?: boolean
}

/**
 * Set the grouping columns. Computed keys are added to the table first.
 * Always leaves rowwise mode.
 */
export function groupBy<D extends SurveyDesign>(design: D, keys: GroupKey[], options: GroupByOptions = {}): D {
  let table = design.table
  let visibleColumns = design.visibleColumns
  let labels = design.labels
  const protectedSet = protectedColumns(design)
  const names: string[] = []

  for (const key of keys) {
    if (isComputedKey(key)) {
      assertNotDomainColumn('groupBy', design, [key.name])
      if (protectedSet.has(key.name)) {
        emitWarning({
          code: 'COMPUTED_OVER_DESIGN_VARIABLE',
          verb: 'groupBy',
          message: `groupBy() overwrote design variable "${key.name}" with a computed key.`,
          columns: [key.name],
        })
      }
      const rows = Array.from({ length: table.nrow }, (_, i) => i)
      const isNew = !table.has(key.name)
      table = table.withColumn(key.name, evaluate(key.expr, createScope(table, rows), key.name))
      labels = labels.deleteKeys([key.name])
      if (isNew && visibleColumns !== null) visibleColumns = [...visibleColumns, key.name]
      names.push(key.name)
    } else {
      names.push(...resolveSelection(key, table.columnNames, table))
    }
  }

  let groups: string[]
  if (options.add) {
    const base = design.rowwise.active ? design.rowwise.idColumns : design.groups
    groups = unique([...base, ...names])
  } else {
    groups = unique(names)
  }

  log.debug('groupBy() set groups', { groups })
  return validated(update(design, { table, visibleColumns, labels, groups, rowwise: { active: false, idColumns: [] } }))
}

/**
 * Remove grouping. With no selection, clears every group and leaves rowwise
 * mode; with one, removes only those columns from the grouping.
 */
export function ungroup<D extends SurveyDesign>(design: D, selection?: Selection): D {
  if (selection === undefined) {
    return validated(update(design, { groups: [], rowwise: { active: false, idColumns: [] } }))
  }
  const drop = new Set(resolveSelection(selection, design.table.columnNames, design.table))
  return validated(update(design, { groups: design.groups.filter((g) => !drop.has(g)) }))
}

/**
 * Compute per row from now on. Grouping columns of a grouped design become
 * the leading id columns, since a design is never grouped and rowwise at once.
 */
export function rowwise<D extends SurveyDesign>(design: D, idColumns?: Selection): D {
  const ids = idColumns === undefined ? [] : resolveSelection(idColumns, design.table.columnNames, design.table)
  return validated(update(design, { groups: [], rowwise: { active: true, idColumns: unique([...design.groups, ...ids]) } }))
}

/** Row indices of each group, in order of first appearance. */
export function partitionRows(table: Table, columns: string[]): number[][] {
  const values = columns.map((c) => table.column(c))
  const groups = new Map<string, number[]>()
  for (let i = 0; i < table.nrow; i++) {
    const key = JSON.stringify(values.map((col) => col[i] ?? null))
    const rows = groups.get(key)
    if (rows) rows.push(i)
    else groups.set(key, [i])
  }
  return Array.from(groups.values())
}

/** Row sets expressions are evaluated over: one per row, one per group, or the whole table. */
export function scopeRows(design: SurveyDesign): number[][] {
  const { table } = design
  if (design.rowwise.active) return Array.from({ length: table.nrow }, (_, i) => [i])
  if (design.groups.length > 0) return partitionRows(table, design.groups)
  return [Array.from({ length: table.nrow }, (_, i) => i)]
}
