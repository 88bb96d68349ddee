import type { LabelStore } from './lib/labelStore'
import type { Table } from './lib/table'

/** One cell of a table column. `null` is missing. */
export type Cell = string | number | boolean | null

/** Row of data keyed by column name */
export type DataRow = Record<string, Cell>

export type ValueLabel = { code: number | string; label: string }

/** Descriptive metadata kept per column */
export interface VariableLabels {
  label?: string
  valueLabels: ValueLabel[]
  questionPreface?: string
  notes?: string
  /** Human-readable expression that produced the column */
  transformation?: string
}

export type DesignKind = 'linearization' | 'replicate' | 'twophase'

export type ReplicateType = 'BRR' | 'Fay' | 'JK1' | 'JK2' | 'JKn' | 'bootstrap' | 'SDR' | 'ACS' | 'successive-difference' | 'other'

/**
 * Which columns play each structural role. Every key is always present;
 * `null` or `[]` means the role is not used.
 */
export interface BindingRecord {
  weightColumn: string | null
  clusterColumns: string[]
  stratumColumn: string | null
  fpcColumn: string | null
  replicateWeightColumns: string[]
  nested: boolean
  probabilityMode: boolean
}

export interface RowwiseState {
  active: boolean
  idColumns: string[]
}

/** Fields shared by every design variant */
export interface DesignBase {
  table: Table
  /** Reserved name of the boolean in/out-of-domain column */
  domainColumn: string
  /** Condition descriptions, in the order they were applied. Display only. */
  domainAudit: string[]
  /** `null` means every column is visible */
  visibleColumns: string[] | null
  groups: string[]
  rowwise: RowwiseState
  labels: LabelStore
}

export interface LinearizationDesign extends DesignBase {
  kind: 'linearization'
  bindings: BindingRecord
}

export interface ReplicateDesign extends DesignBase {
  kind: 'replicate'
  bindings: BindingRecord
  replicateType: ReplicateType
}

export interface TwoPhaseBindings {
  phase1: BindingRecord
  phase2: BindingRecord
  /** Boolean column marking rows sampled in phase 2 */
  subsetColumn: string
  method: 'full' | 'approx' | 'simple'
}

export interface TwoPhaseDesign extends DesignBase {
  kind: 'twophase'
  bindings: TwoPhaseBindings
}

export type SurveyDesign = LinearizationDesign | ReplicateDesign | TwoPhaseDesign
