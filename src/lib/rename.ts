import type { SurveyDesign } from '../types'
import { assertNotDomainColumn, protectedColumns, renameBindings, update, validated } from './design'
import { getConfig } from './config'
import { ColumnNotFoundError, DomainColumnRenameError, InvalidArgumentError, InvalidRenameFunctionError } from './errors'
import { createLogger } from './logger'
import { everything, resolveSelection, type Selection } from './tidySelect'
import { emitWarning } from './warnings'

const log = createLogger('rename')

const renameList = (names: string[], mapping: Map<string, string>) => names.map((n) => mapping.get(n) ?? n)

/**
 * Rename columns everywhere they are referenced: table, bindings, labels,
 * visible columns, grouping and rowwise id columns. `mapping` is old -> new.
 */
function applyRenameMap<D extends SurveyDesign>(verb: string, design: D, mapping: Map<string, string>): D {
  const protectedSet = protectedColumns(design)
  const renamedProtected = Array.from(mapping.keys()).filter((n) => protectedSet.has(n))
  if (renamedProtected.length > 0) {
    emitWarning({
      code: 'RENAMED_DESIGN_VARIABLE',
      verb,
      message: `${verb}() renamed design variable(s): ${renamedProtected.join(', ')}. The survey design now uses the new name(s).`,
      columns: renamedProtected,
    })
  }
  log.debug(`${verb}() renaming`, { mapping: Object.fromEntries(mapping) })

  const renamed: D = {
    ...design,
    bindings: renameBindings(design.bindings, mapping),
  }
  return validated(
    update(renamed, {
      table: design.table.renameColumns(mapping),
      labels: design.labels.renameKeys(mapping),
      domainColumn: mapping.get(design.domainColumn) ?? design.domainColumn,
      visibleColumns: design.visibleColumns === null ? null : renameList(design.visibleColumns, mapping),
      groups: renameList(design.groups, mapping),
      rowwise: { ...design.rowwise, idColumns: renameList(design.rowwise.idColumns, mapping) },
    })
  )
}

/**
 * Rename columns. `renames` maps each new name to the column it replaces.
 *
 * @example
 * rename(design, { weight: 'wt' })
 */
export function rename<D extends SurveyDesign>(design: D, renames: Record<string, string>): D {
  const { table } = design
  const mapping = new Map<string, string>()
  for (const [newName, oldName] of Object.entries(renames)) {
    if (!table.has(oldName)) throw new ColumnNotFoundError([oldName])
    if (mapping.has(oldName)) throw new InvalidArgumentError('rename', `column "${oldName}" is renamed more than once.`)
    if (newName !== oldName) mapping.set(oldName, newName)
  }

  if (mapping.has(design.domainColumn) && getConfig().domainColumnRename === 'block') {
    throw new DomainColumnRenameError(design.domainColumn)
  }

  const targets = Array.from(mapping.values())
  assertNotDomainColumn('rename', design, targets)
  const dupes = targets.filter((n, i) => targets.indexOf(n) !== i)
  if (dupes.length > 0) throw new InvalidArgumentError('rename', `duplicate new name(s): ${dupes.join(', ')}.`)
  const clashes = targets.filter((n) => table.has(n) && !mapping.has(n))
  if (clashes.length > 0) throw new InvalidArgumentError('rename', `name(s) already in use: ${clashes.join(', ')}.`)

  return applyRenameMap('rename', design, mapping)
}

/**
 * Rename the selected columns (default: every column) with `fn`, which
 * receives the old names and must return as many new names.
 * The domain column is never renamed here; selecting it only warns.
 */
export function renameWith<D extends SurveyDesign>(
  design: D,
  fn: (names: string[]) => readonly unknown[],
  selection: Selection = everything()
): D {
  const { table } = design
  const selected = resolveSelection(selection, table.columnNames, table)
  const oldNames = selected.filter((n) => n !== design.domainColumn)
  const output = fn(oldNames.slice())

  if (output.length !== oldNames.length) {
    throw new InvalidRenameFunctionError(
      'wrong-length',
      `renameWith() function returned ${output.length} name(s) for ${oldNames.length} column(s).`,
      output
    )
  }
  const newNames: string[] = []
  for (const value of output) {
    if (typeof value !== 'string') {
      throw new InvalidRenameFunctionError('non-string', `renameWith() function must return strings, got ${typeof value}.`, value)
    }
    newNames.push(value)
  }
  const dupes = newNames.filter((n, i) => newNames.indexOf(n) !== i)
  if (dupes.length > 0) {
    throw new InvalidRenameFunctionError('duplicate', `renameWith() function returned duplicate name(s): ${Array.from(new Set(dupes)).join(', ')}.`, dupes)
  }
  const conflicts = newNames.filter((n) => n === design.domainColumn || (table.has(n) && !oldNames.includes(n)))
  if (conflicts.length > 0) {
    throw new InvalidRenameFunctionError(
      'conflict',
      `renameWith() function returned name(s) that already exist: ${conflicts.join(', ')}.`,
      conflicts
    )
  }

  const mapping = new Map<string, string>()
  oldNames.forEach((old, i) => {
    if (newNames[i] !== old) mapping.set(old, newNames[i])
  })

  if (selected.includes(design.domainColumn)) {
    emitWarning({
      code: 'RENAMED_DESIGN_VARIABLE',
      verb: 'renameWith',
      message: `renameWith() left the domain column "${design.domainColumn}" unchanged; it is never renamed.`,
      columns: [design.domainColumn],
    })
  }
  return applyRenameMap('renameWith', design, mapping)
}
