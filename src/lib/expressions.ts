/**
 * Expressions are plain functions of an EvalScope. The scope is the only way
 * an expression reads data, which lets mutate() see which columns were used.
 */

import { max, mean, min, sum } from 'simple-statistics'
import type { Cell } from '../types'
import { ColumnNotFoundError, ExpressionResultError, NonLogicalPredicateError } from './errors'
import { type Table, cellType, isMissing } from './table'
import { resolveSelection, type Selection } from './tidySelect'

export interface EvalScope {
  /** Values of `name` for the rows in scope */
  col(name: string): Cell[]
  /** Values of every selected column for the rows in scope, column by column */
  cAcross(selection: Selection): Cell[]
  /** Number of rows in scope */
  n(): number
  /** Table row indices in scope */
  readonly rows: readonly number[]
}

export type ExpressionFn = (scope: EvalScope) => Cell | readonly Cell[]

export interface DescribedExpression {
  fn: ExpressionFn
  description: string
}

export type Expression = ExpressionFn | DescribedExpression

/** Attach a human-readable description, used in audit logs and transformation records. */
export function described(description: string, fn: ExpressionFn): DescribedExpression {
  return { fn, description }
}

export function expressionFn(expr: Expression): ExpressionFn {
  return typeof expr === 'function' ? expr : expr.fn
}

export function describe(expr: Expression): string {
  return typeof expr === 'function' ? expr.toString() : expr.description
}

/**
 * Build a scope over `rows` of `table`. Column reads are recorded in `used`.
 * `hidden` columns cannot be read or selected.
 */
export function createScope(table: Table, rows: readonly number[], used: Set<string> = new Set(), hidden: ReadonlySet<string> = new Set()): EvalScope {
  const readable = () => table.columnNames.filter((n) => !hidden.has(n))
  const read = (name: string): Cell[] => {
    if (hidden.has(name)) throw new ColumnNotFoundError([name])
    used.add(name)
    const values = table.column(name)
    return rows.map((i) => values[i])
  }
  return {
    rows,
    n: () => rows.length,
    col: read,
    cAcross: (selection) => resolveSelection(selection, readable(), table).flatMap(read),
  }
}

/** Evaluate `expr` and recycle a scalar (or length-1 result) to the scope length. */
export function evaluate(expr: Expression, scope: EvalScope, target: string): Cell[] {
  const result = expressionFn(expr)(scope)
  const n = scope.n()
  if (!isCellArray(result)) return Array<Cell>(n).fill(result)
  if (result.length === n) return result.slice()
  if (result.length === 1) return Array<Cell>(n).fill(result[0])
  throw new ExpressionResultError(target, n, result.length)
}

export function isCellArray(value: Cell | readonly Cell[]): value is readonly Cell[] {
  return Array.isArray(value)
}

/**
 * Evaluate a row condition to a boolean-or-missing vector.
 * Any non-boolean, non-missing element raises NonLogicalPredicateError.
 */
export function evaluateCondition(verb: string, index: number, expr: Expression, scope: EvalScope): (boolean | null)[] {
  const values = evaluate(expr, scope, `condition ${index + 1}`)
  return values.map((v) => {
    if (isMissing(v)) return null
    if (typeof v !== 'boolean') throw new NonLogicalPredicateError(verb, index, cellType(v), describe(expr))
    return v
  })
}

// ----- Condition helpers -----

/** Element-wise test on a column; missing cells stay missing. */
export function where(column: string, test: (value: string | number | boolean) => boolean): DescribedExpression {
  return described(`${column}: ${test.toString()}`, (s) => s.col(column).map((v) => (isMissing(v) ? null : test(v))))
}

/** True where `column` is missing. */
export function missingIn(column: string): DescribedExpression {
  return described(`is_missing(${column})`, (s) => s.col(column).map((v) => isMissing(v)))
}

/** Logical negation with missing propagation. */
export function negate(expr: Expression): DescribedExpression {
  const fn = expressionFn(expr)
  return described(`!(${describe(expr)})`, (s) => {
    const r = fn(s)
    const values: readonly Cell[] = isCellArray(r) ? r : [r]
    return values.map((v) => (typeof v === 'boolean' ? !v : v))
  })
}

// ----- Aggregates -----
// Missing and non-numeric values are ignored; an empty input gives null.

function numbers(values: readonly Cell[]): number[] {
  return values.filter((v): v is number => typeof v === 'number' && !Number.isNaN(v))
}

export function meanOf(values: readonly Cell[]): number | null {
  const xs = numbers(values)
  return xs.length ? mean(xs) : null
}

export function sumOf(values: readonly Cell[]): number {
  return sum(numbers(values))
}

export function minOf(values: readonly Cell[]): number | null {
  const xs = numbers(values)
  return xs.length ? min(xs) : null
}

export function maxOf(values: readonly Cell[]): number | null {
  const xs = numbers(values)
  return xs.length ? max(xs) : null
}

// ----- Across -----

export interface Across {
  type: 'across'
  selection: Selection
  fn: (values: Cell[], scope: EvalScope) => Cell | readonly Cell[]
  /** Output name template; `{col}` is replaced by the input column name */
  names: string
}

/** Apply `fn` to each selected column. Outputs default to overwriting their inputs. */
export function across(selection: Selection, fn: Across['fn'], names = '{col}'): Across {
  return { type: 'across', selection, fn, names }
}

export function isAcross(value: unknown): value is Across {
  return typeof value === 'object' && value !== null && 'type' in value && value.type === 'across'
}
