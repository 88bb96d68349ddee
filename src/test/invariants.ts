import { expect } from 'vitest'
import type { SurveyDesign } from '../types'
import { assertInvariants, designVariables } from '../lib/design'

/** Assert invariants 1-7 plus the presence of every design variable. */
export function expectInvariants(design: SurveyDesign): void {
  expect(() => assertInvariants(design)).not.toThrow()
  expect(design.table.nrow).toBeGreaterThan(0)
  for (const name of designVariables(design)) {
    expect(design.table.has(name)).toBe(true)
  }
  if (design.visibleColumns !== null) {
    expect(design.visibleColumns.length).toBeGreaterThan(0)
  }
  expect(design.groups.length > 0 && design.rowwise.active).toBe(false)
}
