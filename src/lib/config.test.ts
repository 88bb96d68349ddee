import { afterEach, describe, it, expect } from 'vitest'
import { configure, getConfig, resetConfig } from './config'
import { ConfigError } from './errors'

describe('config', () => {
  const saved = process.env.SURVEY_VERBS_LOG_LEVEL

  afterEach(() => {
    if (saved === undefined) delete process.env.SURVEY_VERBS_LOG_LEVEL
    else process.env.SURVEY_VERBS_LOG_LEVEL = saved
  })

  it('has defaults', () => {
    delete process.env.SURVEY_VERBS_LOG_LEVEL
    resetConfig()
    expect(getConfig()).toEqual({ logLevel: 'warn', domainColumnRename: 'block', checkInvariants: true })
  })

  it('reads the log level from the environment', () => {
    process.env.SURVEY_VERBS_LOG_LEVEL = 'DEBUG'
    resetConfig()
    expect(getConfig().logLevel).toBe('debug')
  })

  it('rejects an invalid environment log level', () => {
    process.env.SURVEY_VERBS_LOG_LEVEL = 'loud'
    resetConfig()
    expect(() => getConfig()).toThrow(ConfigError)
  })

  it('merges overrides', () => {
    const config = configure({ domainColumnRename: 'warn' })
    expect(config.domainColumnRename).toBe('warn')
    expect(getConfig().checkInvariants).toBe(true)
  })

  it('validates overrides', () => {
    const overrides = JSON.parse('{"checkInvariants":"yes"}')
    expect(() => configure(overrides)).toThrow(/^Invalid configuration: checkInvariants: /)
  })
})
