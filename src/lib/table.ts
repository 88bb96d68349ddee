/**
 * Columnar table: ordered, named, equal-length columns of cells.
 * Every transform returns a new Table; column arrays are never mutated in place.
 */

import type { Cell, DataRow } from '../types'
import { ColumnNotFoundError, InvariantViolationError } from './errors'

export function isMissing(value: Cell | undefined): value is null | undefined {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value))
}

/** Type name used in error messages ("number", "string", "boolean", "missing") */
export function cellType(value: Cell | undefined): string {
  return isMissing(value) ? 'missing' : typeof value
}

export class Table {
  private readonly names: string[]
  private readonly columns: Map<string, readonly Cell[]>
  readonly nrow: number

  private constructor(names: string[], columns: Map<string, readonly Cell[]>, nrow: number) {
    this.names = names
    this.columns = columns
    this.nrow = nrow
  }

  static fromColumns(columns: Record<string, readonly Cell[]> | [string, readonly Cell[]][]): Table {
    const entries = Array.isArray(columns) ? columns : Object.entries(columns)
    const names: string[] = []
    const map = new Map<string, readonly Cell[]>()
    let nrow: number | null = null
    for (const [name, values] of entries) {
      if (map.has(name)) throw new InvariantViolationError(1, `duplicate column name "${name}"`)
      if (nrow === null) nrow = values.length
      else if (values.length !== nrow) {
        throw new InvariantViolationError(1, `column "${name}" has ${values.length} rows, expected ${nrow}`)
      }
      names.push(name)
      map.set(name, values.slice())
    }
    return new Table(names, map, nrow ?? 0)
  }

  /** Build from row objects; column order follows first appearance across rows. */
  static fromRows(rows: DataRow[]): Table {
    const names: string[] = []
    const seen = new Set<string>()
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          seen.add(key)
          names.push(key)
        }
      }
    }
    return Table.fromColumns(names.map((name): [string, Cell[]] => [name, rows.map((r) => r[name] ?? null)]))
  }

  get columnNames(): string[] {
    return this.names.slice()
  }

  get ncol(): number {
    return this.names.length
  }

  has(name: string): boolean {
    return this.columns.has(name)
  }

  column(name: string): readonly Cell[] {
    const values = this.columns.get(name)
    if (values === undefined) throw new ColumnNotFoundError([name])
    return values
  }

  cell(row: number, name: string): Cell {
    return this.column(name)[row] ?? null
  }

  row(index: number): DataRow {
    const out: DataRow = {}
    for (const name of this.names) out[name] = this.cell(index, name)
    return out
  }

  toRows(): DataRow[] {
    return Array.from({ length: this.nrow }, (_, i) => this.row(i))
  }

  private assertKnown(names: string[]): void {
    const missing = names.filter((n) => !this.columns.has(n))
    if (missing.length > 0) throw new ColumnNotFoundError(missing)
  }

  /** Add or replace a column. New columns go last unless `position` is given. */
  withColumn(name: string, values: readonly Cell[], position?: number): Table {
    if (values.length !== this.nrow) {
      throw new InvariantViolationError(1, `column "${name}" has ${values.length} rows, expected ${this.nrow}`)
    }
    const names = this.names.slice()
    if (!this.columns.has(name)) {
      const at = position === undefined ? names.length : Math.max(0, Math.min(position, names.length))
      names.splice(at, 0, name)
    }
    const map = new Map(this.columns)
    map.set(name, values.slice())
    return new Table(names, map, this.nrow)
  }

  /** Keep only `names`, in that order. */
  selectColumns(names: string[]): Table {
    this.assertKnown(names)
    const map = new Map<string, readonly Cell[]>()
    for (const n of names) map.set(n, this.column(n))
    if (map.size !== names.length) throw new InvariantViolationError(1, 'duplicate column name in selection')
    return new Table(names.slice(), map, this.nrow)
  }

  /** Rename columns in place of their current position. `mapping` is old name -> new name. */
  renameColumns(mapping: Map<string, string>): Table {
    this.assertKnown(Array.from(mapping.keys()))
    const names = this.names.map((n) => mapping.get(n) ?? n)
    if (new Set(names).size !== names.length) {
      throw new InvariantViolationError(1, 'rename would create duplicate column names')
    }
    const map = new Map<string, readonly Cell[]>()
    this.names.forEach((old, i) => map.set(names[i], this.column(old)))
    return new Table(names, map, this.nrow)
  }

  /** Rows at `indices`, in that order. Serves both permutation and subsetting. */
  takeRows(indices: readonly number[]): Table {
    for (const i of indices) {
      if (!Number.isInteger(i) || i < 0 || i >= this.nrow) {
        throw new InvariantViolationError(1, `row index ${i} out of range 0..${this.nrow - 1}`)
      }
    }
    const map = new Map<string, readonly Cell[]>()
    for (const name of this.names) {
      const values = this.column(name)
      map.set(name, indices.map((i) => values[i]))
    }
    return new Table(this.names.slice(), map, indices.length)
  }

  filterRows(mask: readonly boolean[]): Table {
    if (mask.length !== this.nrow) {
      throw new InvariantViolationError(1, `row mask has ${mask.length} entries, expected ${this.nrow}`)
    }
    const indices: number[] = []
    mask.forEach((keep, i) => {
      if (keep) indices.push(i)
    })
    return this.takeRows(indices)
  }
}
