/**
 * Error hierarchy for survey design verbs.
 *
 *   SurveyVerbsError (base)
 *   ├── NonLogicalPredicateError      filter condition did not yield booleans
 *   ├── EmptyResultError              physical row removal would leave 0 rows
 *   ├── DesignVariableRemovedError    a bound design column is missing
 *   ├── InvalidRenameFunctionError    renameWith() function returned bad names
 *   ├── UnsupportedGroupingArgumentError
 *   ├── DomainColumnRenameError
 *   ├── ColumnNotFoundError
 *   ├── ExpressionResultError
 *   ├── InvalidDesignError
 *   ├── InvalidArgumentError
 *   ├── InvariantViolationError
 *   └── ConfigError
 *
 * Every error is raised before the incoming design is touched, so a caught
 * error leaves the caller's design usable.
 */

export type ErrorCode =
  | 'NON_LOGICAL_PREDICATE'
  | 'EMPTY_RESULT'
  | 'DESIGN_VARIABLE_REMOVED'
  | 'INVALID_RENAME_FUNCTION'
  | 'UNSUPPORTED_GROUPING_ARGUMENT'
  | 'DOMAIN_COLUMN_RENAME_BLOCKED'
  | 'COLUMN_NOT_FOUND'
  | 'INVALID_EXPRESSION_RESULT'
  | 'INVALID_DESIGN'
  | 'INVALID_ARGUMENT'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_CONFIG'

export class SurveyVerbsError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      suggestion?: string
      context?: Record<string, unknown>
      cause?: Error
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'SurveyVerbsError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    }
  }
}

export class NonLogicalPredicateError extends SurveyVerbsError {
  readonly index: number
  readonly actualType: string

  constructor(verb: string, index: number, actualType: string, description: string) {
    super(`${verb}() condition ${index + 1} must be logical, not ${actualType}.`, 'NON_LOGICAL_PREDICATE', {
      suggestion: 'Add a comparison, e.g. where("y1", (v) => v > 0).',
      context: { verb, index, actualType, condition: description },
    })
    this.name = 'NonLogicalPredicateError'
    this.index = index
    this.actualType = actualType
  }
}

export class EmptyResultError extends SurveyVerbsError {
  constructor(verb: string) {
    super(`${verb}() produced 0 rows. Survey designs require at least 1 row.`, 'EMPTY_RESULT', {
      suggestion: 'Use filter() for domain estimation; it keeps all rows.',
      context: { verb },
    })
    this.name = 'EmptyResultError'
  }
}

export class DesignVariableRemovedError extends SurveyVerbsError {
  readonly missing: string[]

  constructor(missing: string[]) {
    super(`Design variable(s) missing from the table: ${missing.join(', ')}.`, 'DESIGN_VARIABLE_REMOVED', {
      suggestion: 'Design variables are required for variance estimation and cannot be dropped.',
      context: { missing },
    })
    this.name = 'DesignVariableRemovedError'
    this.missing = missing
  }
}

export type RenameFailure = 'non-string' | 'wrong-length' | 'duplicate' | 'conflict'

export class InvalidRenameFunctionError extends SurveyVerbsError {
  readonly reason: RenameFailure
  readonly value: unknown

  constructor(reason: RenameFailure, message: string, value: unknown) {
    super(message, 'INVALID_RENAME_FUNCTION', { context: { reason, value } })
    this.name = 'InvalidRenameFunctionError'
    this.reason = reason
    this.value = value
  }
}

export class UnsupportedGroupingArgumentError extends SurveyVerbsError {
  constructor(verb: string) {
    super(`The "by" option is not supported by ${verb}() on survey designs.`, 'UNSUPPORTED_GROUPING_ARGUMENT', {
      suggestion: 'Use groupBy() to add grouping to a survey design.',
      context: { verb },
    })
    this.name = 'UnsupportedGroupingArgumentError'
  }
}

export class DomainColumnRenameError extends SurveyVerbsError {
  constructor(domainColumn: string) {
    super(`The domain column "${domainColumn}" cannot be renamed.`, 'DOMAIN_COLUMN_RENAME_BLOCKED', {
      suggestion: 'Set configure({ domainColumnRename: "warn" }) to allow it.',
      context: { domainColumn },
    })
    this.name = 'DomainColumnRenameError'
  }
}

export class ColumnNotFoundError extends SurveyVerbsError {
  readonly columns: string[]

  constructor(columns: string[]) {
    super(`Column(s) not found: ${columns.join(', ')}.`, 'COLUMN_NOT_FOUND', { context: { columns } })
    this.name = 'ColumnNotFoundError'
    this.columns = columns
  }
}

export class ExpressionResultError extends SurveyVerbsError {
  constructor(target: string, expected: number, actual: number) {
    super(
      `Expression for "${target}" returned ${actual} value(s); expected 1 or ${expected}.`,
      'INVALID_EXPRESSION_RESULT',
      { context: { target, expected, actual } }
    )
    this.name = 'ExpressionResultError'
  }
}

export class InvalidDesignError extends SurveyVerbsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_DESIGN', { context })
    this.name = 'InvalidDesignError'
  }
}

export class InvalidArgumentError extends SurveyVerbsError {
  constructor(verb: string, message: string, context?: Record<string, unknown>) {
    super(`${verb}(): ${message}`, 'INVALID_ARGUMENT', { context: { verb, ...context } })
    this.name = 'InvalidArgumentError'
  }
}

export class InvariantViolationError extends SurveyVerbsError {
  readonly invariant: number

  constructor(invariant: number, message: string) {
    super(`Invariant ${invariant} violated: ${message}`, 'INVARIANT_VIOLATION', { context: { invariant } })
    this.name = 'InvariantViolationError'
    this.invariant = invariant
  }
}

export class ConfigError extends SurveyVerbsError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_CONFIG', { cause })
    this.name = 'ConfigError'
  }
}

export function isSurveyVerbsError(error: unknown): error is SurveyVerbsError {
  return error instanceof SurveyVerbsError
}
