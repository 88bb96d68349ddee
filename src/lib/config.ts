/**
 * Library configuration, validated with zod.
 * Defaults can be overridden from the environment (SURVEY_VERBS_LOG_LEVEL) or with configure().
 */

import { z } from 'zod'
import { ConfigError } from './errors'

export const LogLevel = z.enum(['debug', 'info', 'warn', 'error', 'silent'])
export type LogLevel = z.infer<typeof LogLevel>

/**
 * What rename() does when asked to rename the domain column.
 * "block" raises DomainColumnRenameError; "warn" renames it and warns.
 */
export const DomainColumnRenamePolicy = z.enum(['block', 'warn'])
export type DomainColumnRenamePolicy = z.infer<typeof DomainColumnRenamePolicy>

export const SurveyVerbsConfigSchema = z
  .object({
    logLevel: LogLevel.default('warn'),
    domainColumnRename: DomainColumnRenamePolicy.default('block'),
    /** Re-check design invariants after every verb */
    checkInvariants: z.boolean().default(true),
  })
  .strict()

export type SurveyVerbsConfig = z.infer<typeof SurveyVerbsConfigSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}

function defaultsFromEnv(): SurveyVerbsConfig {
  const raw = process.env.SURVEY_VERBS_LOG_LEVEL
  const parsed = LogLevel.safeParse(raw === undefined || raw === '' ? 'warn' : raw.toLowerCase())
  if (!parsed.success) {
    throw new ConfigError(`SURVEY_VERBS_LOG_LEVEL must be one of ${LogLevel.options.join(', ')}, got: ${raw}`)
  }
  return SurveyVerbsConfigSchema.parse({ logLevel: parsed.data })
}

let current: SurveyVerbsConfig | null = null

export function getConfig(): SurveyVerbsConfig {
  if (current === null) current = defaultsFromEnv()
  return current
}

/** Merge `overrides` into the active configuration. Throws ConfigError on invalid values. */
export function configure(overrides: Partial<SurveyVerbsConfig>): SurveyVerbsConfig {
  const result = SurveyVerbsConfigSchema.safeParse({ ...getConfig(), ...overrides })
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, result.error)
  }
  current = result.data
  return current
}

export function resetConfig(): void {
  current = null
}
