import { afterEach, describe, it, expect, vi } from 'vitest'
import { configure } from './config'
import { captureWarnings, emitWarning, setWarningHandler, warnPhysicalSubset, type SurveyVerbsWarning } from './warnings'

describe('warnings', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('captures warnings raised inside the callback', () => {
    const { value, warnings } = captureWarnings(() => {
      warnPhysicalSubset('slice')
      return 42
    })
    expect(value).toBe(42)
    expect(warnings).toHaveLength(1)
    expect(warnings[0].code).toBe('PHYSICAL_SUBSET')
    expect(warnings[0].verb).toBe('slice')
  })

  it('nests captures without leaking to the outer one', () => {
    const outer = captureWarnings(() => {
      const inner = captureWarnings(() => warnPhysicalSubset('inner'))
      warnPhysicalSubset('outer')
      return inner.warnings.map((w) => w.verb)
    })
    expect(outer.value).toEqual(['inner'])
    expect(outer.warnings.map((w) => w.verb)).toEqual(['outer'])
  })

  it('hands warnings to a custom handler', () => {
    const seen: SurveyVerbsWarning[] = []
    setWarningHandler((w) => seen.push(w))
    emitWarning({ code: 'EMPTY_DOMAIN', verb: 'filter', message: 'm', columns: [] })
    expect(seen.map((w) => w.code)).toEqual(['EMPTY_DOMAIN'])
  })

  it('logs by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    configure({ logLevel: 'warn' })
    emitWarning({ code: 'RENAMED_DESIGN_VARIABLE', verb: 'rename', message: 'renamed wt', columns: ['wt'] })
    expect(warn).toHaveBeenCalledTimes(1)
    expect(String(warn.mock.calls[0][0])).toContain('[warnings] renamed wt {"code":"RENAMED_DESIGN_VARIABLE","verb":"rename","columns":["wt"]}')
  })
})
