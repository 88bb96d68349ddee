/**
 * mutate(): add or replace columns, scoped by the design's rowwise or grouping
 * state. Results from every scope are written back into one whole-table
 * column, so the next call starts from a plain table again.
 *
 * Design-variable detection is by output name. Columns written through
 * across() are not checked and get no transformation record.
 */

import type { Cell, SurveyDesign } from '../types'
import { assertNotDomainColumn, protectedColumns, update, validated } from './design'
import { createScope, describe, evaluate, isAcross, type Across, type EvalScope, type Expression } from './expressions'
import { scopeRows } from './groupBy'
import { createLogger } from './logger'
import { relocateNames, type RelocateOptions } from './select'
import type { Table } from './table'
import { allOf, resolveSelection } from './tidySelect'
import { emitWarning } from './warnings'

const log = createLogger('mutate')

export type MutateColumns = Record<string, Expression> | (Record<string, Expression> | Across)[]

export type KeepOption = 'all' | 'used' | 'unused' | 'none'

export interface MutateOptions extends RelocateOptions {
  /**
   * Which existing columns survive: all of them, only those the expressions
   * read, only those they did not read, or none. Grouping and protected
   * columns always survive.
   */
  keep?: KeepOption
}

type Term = { kind: 'named'; name: string; expr: Expression } | { kind: 'across'; across: Across }

function toTerms(columns: MutateColumns): Term[] {
  const items = Array.isArray(columns) ? columns : [columns]
  return items.flatMap((item): Term[] =>
    isAcross(item) ? [{ kind: 'across', across: item }] : Object.entries(item).map(([name, expr]): Term => ({ kind: 'named', name, expr }))
  )
}

function evaluateScoped(table: Table, partitions: number[][], used: Set<string>, hidden: ReadonlySet<string>, run: (scope: EvalScope) => Cell[]): Cell[] {
  const out = Array<Cell>(table.nrow).fill(null)
  for (const rows of partitions) {
    const values = run(createScope(table, rows, used, hidden))
    rows.forEach((row, k) => {
      out[row] = values[k]
    })
  }
  return out
}

/**
 * Compute columns.
 *
 * @example
 * mutate(design, { y_total: (s) => s.col('y1').map((v, i) => Number(v) + Number(s.col('y2')[i])) })
 */
export function mutate<D extends SurveyDesign>(design: D, columns: MutateColumns, options: MutateOptions = {}): D {
  const { keep = 'all' } = options
  const original = design.table.columnNames
  const protectedSet = protectedColumns(design)
  const hidden = new Set([design.domainColumn])
  const partitions = scopeRows(design)
  const used = new Set<string>()
  const outputs: string[] = []

  let table = design.table
  let labels = design.labels
  const write = (name: string, values: Cell[]) => {
    table = table.withColumn(name, values)
    if (!outputs.includes(name)) outputs.push(name)
  }

  for (const term of toTerms(columns)) {
    if (term.kind === 'named') {
      const { name, expr } = term
      assertNotDomainColumn('mutate', design, [name])
      if (protectedSet.has(name)) {
        emitWarning({
          code: 'COMPUTED_OVER_DESIGN_VARIABLE',
          verb: 'mutate',
          message: `mutate() overwrote design variable "${name}". Variance estimates will use the new values.`,
          columns: [name],
        })
      }
      write(name, evaluateScoped(table, partitions, used, hidden, (scope) => evaluate(expr, scope, name)))
      labels = labels.setTransformation(name, describe(expr))
      continue
    }
    const { selection, fn, names } = term.across
    const inputs = resolveSelection(
      selection,
      table.columnNames.filter((n) => !hidden.has(n)),
      table
    )
    for (const col of inputs) {
      const target = names.split('{col}').join(col)
      assertNotDomainColumn('mutate', design, [target])
      write(target, evaluateScoped(table, partitions, used, hidden, (scope) => evaluate((s) => fn(s.col(col), s), scope, target)))
    }
  }

  const created = outputs.filter((n) => !original.includes(n))
  const usedOriginal = new Set(original.filter((n) => used.has(n)))
  const always = new Set([...outputs, ...design.groups, ...protectedSet])
  const keepColumn = (name: string): boolean => {
    if (keep === 'all' || always.has(name)) return true
    if (keep === 'used') return usedOriginal.has(name)
    if (keep === 'unused') return !usedOriginal.has(name)
    return false
  }

  let order = table.columnNames.filter(keepColumn)
  if (created.length > 0 && (options.before !== undefined || options.after !== undefined)) {
    order = relocateNames('mutate', order, allOf(created), { before: options.before, after: options.after }, table)
  }
  const dropped = table.columnNames.filter((n) => !order.includes(n))

  let visibleColumns = design.visibleColumns
  if (visibleColumns !== null) {
    let next = [...visibleColumns.filter((n) => !dropped.includes(n)), ...created]
    const anchor = options.before ?? options.after
    if (created.length > 0 && anchor !== undefined) {
      // only anchors that are shown can place the new columns; otherwise they go last
      const shown = resolveSelection(anchor, order, table).filter((n) => next.includes(n) && !created.includes(n))
      if (shown.length > 0) {
        next = relocateNames('mutate', next, allOf(created), options.before !== undefined ? { before: shown } : { after: shown })
      }
    }
    visibleColumns = next.length > 0 ? next : null
  }

  log.debug('mutate() computed columns', { outputs, dropped, scopes: partitions.length })
  return validated(
    update(design, {
      table: table.selectColumns(order),
      labels: labels.deleteKeys(dropped),
      visibleColumns,
    })
  )
}
