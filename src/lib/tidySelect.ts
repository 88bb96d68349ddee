/**
 * Column selection language used by select(), relocate(), renameWith() and friends.
 * A selection resolves against the current ordered column names to an ordered,
 * de-duplicated subset.
 */

import type { Cell } from '../types'
import { ColumnNotFoundError, InvalidArgumentError } from './errors'
import type { Table } from './table'

export type SelectionHelper =
  | { type: 'everything' }
  | { type: 'allOf'; names: string[] }
  | { type: 'anyOf'; names: string[] }
  | { type: 'startsWith'; prefix: string }
  | { type: 'endsWith'; suffix: string }
  | { type: 'contains'; text: string }
  | { type: 'matches'; pattern: RegExp }
  | { type: 'where'; test: (values: readonly Cell[]) => boolean }
  | { type: 'not'; selection: Selection }

export type Selection = string | SelectionHelper | Selection[]

export const everything = (): SelectionHelper => ({ type: 'everything' })
export const allOf = (names: string[]): SelectionHelper => ({ type: 'allOf', names })
export const anyOf = (names: string[]): SelectionHelper => ({ type: 'anyOf', names })
export const startsWith = (prefix: string): SelectionHelper => ({ type: 'startsWith', prefix })
export const endsWith = (suffix: string): SelectionHelper => ({ type: 'endsWith', suffix })
export const contains = (text: string): SelectionHelper => ({ type: 'contains', text })
export const matches = (pattern: RegExp | string): SelectionHelper => ({
  type: 'matches',
  pattern: typeof pattern === 'string' ? new RegExp(pattern) : pattern,
})
/** Columns whose values pass `test`; needs a table at resolve time. */
export const whereColumn = (test: (values: readonly Cell[]) => boolean): SelectionHelper => ({ type: 'where', test })
export const not = (selection: Selection): SelectionHelper => ({ type: 'not', selection })

function resolveOne(selection: Selection, available: string[], table?: Table): string[] {
  if (typeof selection === 'string') {
    if (!available.includes(selection)) throw new ColumnNotFoundError([selection])
    return [selection]
  }
  if (Array.isArray(selection)) return resolveList(selection, available, table)

  switch (selection.type) {
    case 'everything':
      return available.slice()
    case 'allOf': {
      const missing = selection.names.filter((n) => !available.includes(n))
      if (missing.length > 0) throw new ColumnNotFoundError(missing)
      return selection.names.slice()
    }
    case 'anyOf':
      return selection.names.filter((n) => available.includes(n))
    case 'startsWith':
      return available.filter((n) => n.startsWith(selection.prefix))
    case 'endsWith':
      return available.filter((n) => n.endsWith(selection.suffix))
    case 'contains':
      return available.filter((n) => n.includes(selection.text))
    case 'matches': {
      // a g or y flag would carry lastIndex from one name to the next
      const pattern = new RegExp(selection.pattern.source, selection.pattern.flags.replace(/[gy]/g, ''))
      return available.filter((n) => pattern.test(n))
    }
    case 'where': {
      if (!table) throw new InvalidArgumentError('whereColumn', 'a table is required to test column values.')
      return available.filter((n) => table.has(n) && selection.test(table.column(n)))
    }
    case 'not': {
      const excluded = new Set(resolveOne(selection.selection, available, table))
      return available.filter((n) => !excluded.has(n))
    }
  }
}

function resolveList(selections: Selection[], available: string[], table?: Table): string[] {
  let out: string[] = []
  selections.forEach((sel, i) => {
    if (typeof sel === 'object' && !Array.isArray(sel) && sel.type === 'not') {
      // leading negation: start from every column
      if (i === 0) out = available.slice()
      const excluded = new Set(resolveOne(sel.selection, available, table))
      out = out.filter((n) => !excluded.has(n))
      return
    }
    for (const name of resolveOne(sel, available, table)) {
      if (!out.includes(name)) out.push(name)
    }
  })
  return out
}

/**
 * Resolve `selection` against `available` column names.
 * Pass `table` to support whereColumn(). Unknown bare names throw ColumnNotFoundError.
 */
export function resolveSelection(selection: Selection, available: string[], table?: Table): string[] {
  const resolved = resolveOne(selection, available, table)
  return resolved.filter((n, i) => resolved.indexOf(n) === i)
}
