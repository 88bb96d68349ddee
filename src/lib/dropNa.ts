import type { SurveyDesign } from '../types'
import { domainMask, update, validated } from './design'
import { createLogger } from './logger'
import { isMissing } from './table'
import { everything, resolveSelection, type Selection } from './tidySelect'
import { warnEmptyDomain } from './warnings'

const log = createLogger('dropNa')

/**
 * Mark rows with a missing value in any of `columns` (default: every column)
 * as out-of-domain. Rows are masked, not removed.
 */
export function dropNa<D extends SurveyDesign>(design: D, columns: Selection = everything()): D {
  const available = design.table.columnNames.filter((n) => n !== design.domainColumn)
  const targets = resolveSelection(columns, available, design.table)
  const values = targets.map((c) => design.table.column(c))
  const existing = domainMask(design)
  const mask = existing.map((m, row) => m && values.every((col) => !isMissing(col[row])))

  const inDomain = mask.filter(Boolean).length
  log.debug('dropNa() updated domain', { columns: targets, rows: mask.length, inDomain })
  if (inDomain === 0) warnEmptyDomain('dropNa')

  return validated(
    update(design, {
      table: design.table.withColumn(design.domainColumn, mask),
      domainAudit: [...design.domainAudit, ...targets.map((c) => `!is_missing(${c})`)],
    })
  )
}
