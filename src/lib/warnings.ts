/**
 * Non-fatal conditions raised by verbs. A warning never stops the verb; it is
 * handed to the active handler (by default, the logger) and the verb completes.
 */

import { createLogger } from './logger'

export type WarningCode =
  | 'EMPTY_DOMAIN'
  | 'PHYSICAL_SUBSET'
  | 'RENAMED_DESIGN_VARIABLE'
  | 'COMPUTED_OVER_DESIGN_VARIABLE'
  | 'DEDUPLICATING_ON_DESIGN_VARIABLE'
  | 'SAMPLE_WEIGHT_INDEPENDENT_OF_DESIGN'

export interface SurveyVerbsWarning {
  code: WarningCode
  verb: string
  message: string
  /** Columns the warning is about, if any */
  columns: string[]
}

export type WarningHandler = (warning: SurveyVerbsWarning) => void

const log = createLogger('warnings')

const logWarning: WarningHandler = (w) => {
  log.warn(w.message, { code: w.code, verb: w.verb, ...(w.columns.length ? { columns: w.columns } : {}) })
}

let baseHandler: WarningHandler = logWarning
const collectors: SurveyVerbsWarning[][] = []

/** Replace the handler used outside captureWarnings(). Pass nothing to restore logging. */
export function setWarningHandler(handler?: WarningHandler): void {
  baseHandler = handler ?? logWarning
}

export function emitWarning(warning: SurveyVerbsWarning): void {
  const collector = collectors[collectors.length - 1]
  if (collector) collector.push(warning)
  else baseHandler(warning)
}

/** Run `fn`, collecting the warnings it raises instead of passing them to the handler. */
export function captureWarnings<T>(fn: () => T): { value: T; warnings: SurveyVerbsWarning[] } {
  const warnings: SurveyVerbsWarning[] = []
  collectors.push(warnings)
  try {
    const value = fn()
    return { value, warnings }
  } finally {
    collectors.pop()
  }
}

// ----- Standard warnings -----

export function warnPhysicalSubset(verb: string): void {
  emitWarning({
    code: 'PHYSICAL_SUBSET',
    verb,
    message: `${verb}() physically removes rows from the survey data. Use filter() for subpopulation analyses; it keeps every row for variance estimation.`,
    columns: [],
  })
}

export function warnEmptyDomain(verb: string): void {
  emitWarning({
    code: 'EMPTY_DOMAIN',
    verb,
    message: `${verb}() produced an empty domain: no rows are in-domain. Variance estimation on this domain will fail.`,
    columns: [],
  })
}
