import type { SurveyDesign } from '../types'
import { protectedColumns, update, validated } from './design'
import { createLogger } from './logger'
import { resolveSelection, type Selection } from './tidySelect'
import { emitWarning, warnPhysicalSubset } from './warnings'

const log = createLogger('distinct')

/**
 * Physically remove duplicate rows. The first row of each key wins and every
 * column is kept.
 *
 * Without `keys`, rows are compared on the non-protected columns only. That
 * default can merge rows that differ solely in design bookkeeping, and two
 * respondents with identical answers are still two respondents; pass `keys`
 * when the duplicate definition matters.
 */
export function distinct<D extends SurveyDesign>(design: D, keys?: Selection): D {
  warnPhysicalSubset('distinct')
  const { table } = design
  const protectedSet = protectedColumns(design)

  let keyColumns: string[]
  if (keys === undefined) {
    keyColumns = table.columnNames.filter((n) => !protectedSet.has(n))
  } else {
    keyColumns = resolveSelection(keys, table.columnNames, table)
    const designKeys = keyColumns.filter((n) => protectedSet.has(n))
    if (designKeys.length > 0) {
      emitWarning({
        code: 'DEDUPLICATING_ON_DESIGN_VARIABLE',
        verb: 'distinct',
        message: `distinct() deduplicates on design variable(s) ${designKeys.join(', ')}; this may corrupt variance estimation.`,
        columns: designKeys,
      })
    }
  }

  const columns = keyColumns.map((c) => table.column(c))
  const seen = new Set<string>()
  const rows: number[] = []
  for (let i = 0; i < table.nrow; i++) {
    const key = JSON.stringify(columns.map((col) => col[i] ?? null))
    if (!seen.has(key)) {
      seen.add(key)
      rows.push(i)
    }
  }

  log.debug('distinct() kept rows', { keys: keyColumns, before: table.nrow, after: rows.length })
  return validated(update(design, { table: table.takeRows(rows) }))
}
