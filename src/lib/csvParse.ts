import Papa from 'papaparse'
import type { Cell } from '../types'
import { LabelStore } from './labelStore'
import { Table } from './table'

function parseCell(raw: string): Cell {
  const trimmed = raw.trim()
  if (trimmed === '' || trimmed === 'NA') return null
  if (/^(true|false)$/i.test(trimmed)) return trimmed.toLowerCase() === 'true'
  const num = Number(trimmed)
  if (!Number.isNaN(num) && String(num) === trimmed) return num
  return trimmed
}

/** Display label from a column name: "q1_age_group" becomes "Age Group". */
export function toLabel(name: string): string {
  return (
    name
      .replace(/^Q\d+_?/i, '')
      .replace(/[_.-]+/g, ' ')
      .replace(/\b\w/g, (c) => c.toUpperCase())
      .trim() || name
  )
}

/**
 * Parse CSV text into a Table. The first row is the header; blank headers
 * become Column_<n>. Blank and "NA" cells are missing, numeric text becomes a
 * number and true/false a boolean.
 */
export function tableFromCsv(csvText: string): Table {
  const parsed = Papa.parse<string[]>(csvText, { skipEmptyLines: true })
  const rows = parsed.data
  if (rows.length === 0) return Table.fromColumns({})

  const headers = rows[0].map((h, j) => h.trim() || `Column_${j + 1}`)
  const body = rows.slice(1)
  return Table.fromColumns(headers.map((name, j): [string, Cell[]] => [name, body.map((row) => parseCell(row[j] ?? ''))]))
}

/** Seed a label store with a display label for each column name. */
export function labelsFromHeaders(names: string[]): LabelStore {
  return names.reduce((store, name) => store.setLabel(name, toLabel(name)), LabelStore.empty())
}
