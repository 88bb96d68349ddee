/**
 * Survey design records: construction, the narrow update API every verb goes
 * through, protected-column resolution and invariant checks.
 *
 * A design is a plain immutable value. Verbs never modify the design they are
 * given; they build a new one with update() and hand it to validated().
 */

import { z } from 'zod'
import type {
  BindingRecord,
  Cell,
  DesignBase,
  LinearizationDesign,
  ReplicateDesign,
  ReplicateType,
  SurveyDesign,
  TwoPhaseBindings,
  TwoPhaseDesign,
  VariableLabels,
} from '../types'
import { getConfig } from './config'
import { DesignVariableRemovedError, InvalidArgumentError, InvalidDesignError, InvariantViolationError } from './errors'
import { LabelStore } from './labelStore'
import { type Table, isMissing } from './table'
import { resolveSelection, type Selection } from './tidySelect'

/** Default reserved name of the domain column */
export const DOMAIN_COLUMN = '..domain..'

const BINDING_KEYS: (keyof BindingRecord)[] = [
  'weightColumn',
  'clusterColumns',
  'stratumColumn',
  'fpcColumn',
  'replicateWeightColumns',
  'nested',
  'probabilityMode',
]

export function emptyBindings(): BindingRecord {
  return {
    weightColumn: null,
    clusterColumns: [],
    stratumColumn: null,
    fpcColumn: null,
    replicateWeightColumns: [],
    nested: false,
    probabilityMode: false,
  }
}

// ----- Protected columns -----

function bindingRecordColumns(b: BindingRecord): string[] {
  const cols: string[] = []
  if (b.weightColumn !== null) cols.push(b.weightColumn)
  cols.push(...b.clusterColumns)
  if (b.stratumColumn !== null) cols.push(b.stratumColumn)
  if (b.fpcColumn !== null) cols.push(b.fpcColumn)
  cols.push(...b.replicateWeightColumns)
  return cols
}

function isTwoPhaseBindings(b: BindingRecord | TwoPhaseBindings): b is TwoPhaseBindings {
  return 'phase1' in b
}

/** Columns named by the design bindings, in binding order, without duplicates. */
export function designVariables(design: SurveyDesign): string[] {
  const cols =
    design.kind === 'twophase'
      ? [...bindingRecordColumns(design.bindings.phase1), ...bindingRecordColumns(design.bindings.phase2), design.bindings.subsetColumn]
      : bindingRecordColumns(design.bindings)
  return Array.from(new Set(cols))
}

/**
 * Every column that must never be dropped: the design variables plus the
 * domain column once it exists.
 */
export function protectedColumns(design: SurveyDesign): Set<string> {
  const cols = new Set(designVariables(design))
  if (design.table.has(design.domainColumn)) cols.add(design.domainColumn)
  return cols
}

/** Protected columns that are present in the table, in table order. */
export function presentProtectedColumns(design: SurveyDesign): string[] {
  const protectedSet = protectedColumns(design)
  return design.table.columnNames.filter((n) => protectedSet.has(n))
}

export function isDesignVariable(design: SurveyDesign, name: string): boolean {
  return protectedColumns(design).has(name)
}

/**
 * The domain column name is reserved from construction on, whether or not a
 * filter has created the column yet. Throws if `names` would write to it.
 */
export function assertNotDomainColumn(verb: string, design: SurveyDesign, names: Iterable<string>): void {
  for (const name of names) {
    if (name === design.domainColumn) {
      throw new InvalidArgumentError(verb, `"${name}" is reserved for the domain column.`, { column: name })
    }
  }
}

/** Rename every binding that points at a key of `mapping` (old name -> new name). */
export function renameBindings<B extends BindingRecord | TwoPhaseBindings>(bindings: B, mapping: Map<string, string>): B
export function renameBindings(bindings: BindingRecord | TwoPhaseBindings, mapping: Map<string, string>): BindingRecord | TwoPhaseBindings {
  const r = (name: string) => mapping.get(name) ?? name
  const rn = (name: string | null) => (name === null ? null : r(name))
  const renameRecord = (b: BindingRecord): BindingRecord => ({
    ...b,
    weightColumn: rn(b.weightColumn),
    clusterColumns: b.clusterColumns.map(r),
    stratumColumn: rn(b.stratumColumn),
    fpcColumn: rn(b.fpcColumn),
    replicateWeightColumns: b.replicateWeightColumns.map(r),
  })
  if (isTwoPhaseBindings(bindings)) {
    return {
      ...bindings,
      phase1: renameRecord(bindings.phase1),
      phase2: renameRecord(bindings.phase2),
      subsetColumn: r(bindings.subsetColumn),
    }
  }
  return renameRecord(bindings)
}

// ----- Invariants -----

function assertBindingKeys(b: BindingRecord, where: string): void {
  const missing = BINDING_KEYS.filter((k) => !(k in b))
  if (missing.length > 0) throw new InvariantViolationError(3, `${where} bindings lack key(s): ${missing.join(', ')}`)
}

/** Invariant 2. Runs even when `checkInvariants` is off. */
export function assertDesignVariablesPresent(design: SurveyDesign): void {
  const missing = designVariables(design).filter((c) => !design.table.has(c))
  if (missing.length > 0) throw new DesignVariableRemovedError(missing)
}

/** Check invariants 1-7. Throws on the first violation. */
export function assertInvariants(design: SurveyDesign): void {
  const { table } = design
  if (table.nrow < 1) throw new InvariantViolationError(1, 'table has no rows')
  if (table.ncol < 1) throw new InvariantViolationError(1, 'table has no columns')

  assertDesignVariablesPresent(design)

  if (design.kind === 'twophase') {
    assertBindingKeys(design.bindings.phase1, 'phase 1')
    assertBindingKeys(design.bindings.phase2, 'phase 2')
  } else {
    assertBindingKeys(design.bindings, design.kind)
  }

  if (!(design.labels instanceof LabelStore)) throw new InvariantViolationError(4, 'label store is missing')

  if (table.has(design.domainColumn)) {
    const bad = table.column(design.domainColumn).findIndex((v) => typeof v !== 'boolean')
    if (bad !== -1) throw new InvariantViolationError(5, `domain column is not boolean at row ${bad}`)
  }

  if (design.visibleColumns !== null) {
    if (design.visibleColumns.length === 0) throw new InvariantViolationError(6, 'visible column list is empty')
    const unknown = design.visibleColumns.filter((c) => !table.has(c))
    if (unknown.length > 0) throw new InvariantViolationError(6, `visible columns not in table: ${unknown.join(', ')}`)
  }

  if (design.groups.length > 0 && design.rowwise.active) {
    throw new InvariantViolationError(7, 'design is both grouped and rowwise')
  }
}

/**
 * Check that every design variable is present, then the remaining invariants
 * unless disabled in config. Returns the design.
 */
export function validated<D extends SurveyDesign>(design: D): D {
  if (getConfig().checkInvariants) assertInvariants(design)
  else assertDesignVariablesPresent(design)
  return design
}

// ----- Update API -----

/** Shallow copy of `design` with `patch` applied. Does not validate. */
export function update<D extends SurveyDesign>(design: D, patch: Partial<DesignBase>): D {
  return { ...design, ...patch }
}

export function withTable<D extends SurveyDesign>(design: D, table: Table): D {
  return validated(update(design, { table }))
}

/** Write `mask` into the domain column, creating it if absent. */
export function withMask<D extends SurveyDesign>(design: D, mask: readonly boolean[]): D {
  return validated(update(design, { table: design.table.withColumn(design.domainColumn, mask) }))
}

/** Current domain mask, or all-true when no domain has been set. */
export function domainMask(design: SurveyDesign): boolean[] {
  if (!design.table.has(design.domainColumn)) return Array<boolean>(design.table.nrow).fill(true)
  return design.table.column(design.domainColumn).map((v) => v === true)
}

export function isRowwise(design: SurveyDesign): boolean {
  return design.rowwise.active
}

export function isGrouped(design: SurveyDesign): boolean {
  return design.groups.length > 0
}

export function groupVars(design: SurveyDesign): string[] {
  return design.groups.slice()
}

// ----- Construction -----

const ReplicateTypeSchema = z.enum(['BRR', 'Fay', 'JK1', 'JK2', 'JKn', 'bootstrap', 'SDR', 'ACS', 'successive-difference', 'other'])

const ColumnName = z.string().min(1)

const LinearizationArgsSchema = z
  .object({
    weights: ColumnName,
    ids: z.union([ColumnName, z.array(ColumnName)]).optional(),
    strata: ColumnName.optional(),
    fpc: ColumnName.optional(),
    nest: z.boolean().default(false),
    /** The weights column holds selection probabilities rather than weights */
    probs: z.boolean().default(false),
  })
  .strict()

const ReplicateArgsSchema = z
  .object({
    weights: ColumnName,
    repweights: z.array(ColumnName).min(1),
    type: ReplicateTypeSchema,
  })
  .strict()

const TwoPhaseArgsSchema = z
  .object({
    subset: ColumnName,
    ids: z.union([ColumnName, z.array(ColumnName)]).optional(),
    strata: ColumnName.optional(),
    fpc: ColumnName.optional(),
    probs: ColumnName.optional(),
    method: z.enum(['full', 'approx', 'simple']).default('full'),
  })
  .strict()

export type LinearizationArgs = z.input<typeof LinearizationArgsSchema>
export type ReplicateArgs = Omit<z.input<typeof ReplicateArgsSchema>, 'repweights' | 'type'> & {
  repweights: Selection
  type: ReplicateType
}
export type TwoPhaseArgs = z.input<typeof TwoPhaseArgsSchema>

export interface ConstructionOptions {
  labels?: LabelStore | Record<string, Partial<VariableLabels>>
  /** Preferred name for the domain column; made unique against the table */
  domainColumn?: string
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
  const result = schema.safeParse(args)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
    throw new InvalidDesignError(`Invalid design arguments: ${issues}`, { issues: result.error.issues })
  }
  return result.data
}

function toLabelStore(labels: ConstructionOptions['labels']): LabelStore {
  if (labels === undefined) return LabelStore.empty()
  if (labels instanceof LabelStore) return labels
  return Object.entries(labels).reduce((store, [col, l]) => store.set(col, l), LabelStore.empty())
}

function uniqueDomainColumn(table: Table, preferred: string): string {
  let name = preferred
  while (table.has(name)) name = `.${name}.`
  return name
}

function requireColumns(table: Table, names: string[]): void {
  const missing = names.filter((n) => !table.has(n))
  if (missing.length > 0) throw new InvalidDesignError(`Design column(s) not found: ${missing.join(', ')}.`, { missing })
}

function requirePositiveNumbers(table: Table, name: string): void {
  const bad = table.column(name).findIndex((v: Cell) => !isMissing(v) && (typeof v !== 'number' || v <= 0))
  if (bad !== -1) throw new InvalidDesignError(`Weight column "${name}" must hold positive numbers (row ${bad}).`, { column: name, row: bad })
}

function baseFields(table: Table, options: ConstructionOptions): DesignBase {
  if (table.nrow < 1) throw new InvalidDesignError('Survey data must have at least 1 row.')
  return {
    table,
    domainColumn: uniqueDomainColumn(table, options.domainColumn ?? DOMAIN_COLUMN),
    domainAudit: [],
    visibleColumns: null,
    groups: [],
    rowwise: { active: false, idColumns: [] },
    labels: toLabelStore(options.labels),
  }
}

function asArray(ids: string | string[] | undefined): string[] {
  if (ids === undefined) return []
  return Array.isArray(ids) ? ids : [ids]
}

/** Taylor-linearization design from a table and binding arguments. */
export function asSurvey(table: Table, args: LinearizationArgs, options: ConstructionOptions = {}): LinearizationDesign {
  const a = parseArgs(LinearizationArgsSchema, args)
  const bindings: BindingRecord = {
    ...emptyBindings(),
    weightColumn: a.weights,
    clusterColumns: asArray(a.ids),
    stratumColumn: a.strata ?? null,
    fpcColumn: a.fpc ?? null,
    nested: a.nest,
    probabilityMode: a.probs,
  }
  requireColumns(table, bindingRecordColumns(bindings))
  requirePositiveNumbers(table, a.weights)
  return validated({ kind: 'linearization', bindings, ...baseFields(table, options) })
}

/** Replicate-weight design. `repweights` is resolved as a column selection. */
export function asSurveyRep(table: Table, args: ReplicateArgs, options: ConstructionOptions = {}): ReplicateDesign {
  const repweights = resolveSelection(args.repweights, table.columnNames, table)
  const a = parseArgs(ReplicateArgsSchema, { ...args, repweights })
  const bindings: BindingRecord = {
    ...emptyBindings(),
    weightColumn: a.weights,
    replicateWeightColumns: a.repweights,
  }
  requireColumns(table, bindingRecordColumns(bindings))
  requirePositiveNumbers(table, a.weights)
  for (const rw of a.repweights) {
    if (table.column(rw).some((v) => !isMissing(v) && typeof v !== 'number')) {
      throw new InvalidDesignError(`Replicate weight column "${rw}" must be numeric.`, { column: rw })
    }
  }
  return validated({ kind: 'replicate', bindings, replicateType: a.type, ...baseFields(table, options) })
}

/** Two-phase design: `phase1` is the full first-phase sample, `subset` flags the phase-2 rows. */
export function asSurveyTwophase(phase1: LinearizationDesign, args: TwoPhaseArgs): TwoPhaseDesign {
  const a = parseArgs(TwoPhaseArgsSchema, args)
  const { table } = phase1
  const phase2: BindingRecord = {
    ...emptyBindings(),
    weightColumn: a.probs ?? null,
    clusterColumns: asArray(a.ids),
    stratumColumn: a.strata ?? null,
    fpcColumn: a.fpc ?? null,
    probabilityMode: a.probs !== undefined,
  }
  requireColumns(table, [a.subset, ...bindingRecordColumns(phase2)])
  if (table.column(a.subset).some((v) => typeof v !== 'boolean')) {
    throw new InvalidDesignError(`Subset column "${a.subset}" must be boolean with no missing values.`, { column: a.subset })
  }
  const bindings: TwoPhaseBindings = { phase1: phase1.bindings, phase2, subsetColumn: a.subset, method: a.method }
  return validated({
    kind: 'twophase',
    bindings,
    table,
    domainColumn: phase1.domainColumn,
    domainAudit: phase1.domainAudit,
    visibleColumns: phase1.visibleColumns,
    groups: phase1.groups,
    rowwise: phase1.rowwise,
    labels: phase1.labels,
  })
}
