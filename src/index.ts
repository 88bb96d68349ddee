export type {
  BindingRecord,
  Cell,
  DataRow,
  DesignBase,
  DesignKind,
  LinearizationDesign,
  ReplicateDesign,
  ReplicateType,
  RowwiseState,
  SurveyDesign,
  TwoPhaseBindings,
  TwoPhaseDesign,
  ValueLabel,
  VariableLabels,
} from './types'

export { Table, isMissing } from './lib/table'
export { LabelStore } from './lib/labelStore'
export {
  allOf,
  anyOf,
  contains,
  endsWith,
  everything,
  matches,
  not,
  resolveSelection,
  startsWith,
  whereColumn,
} from './lib/tidySelect'
export type { Selection, SelectionHelper } from './lib/tidySelect'

export {
  DOMAIN_COLUMN,
  asSurvey,
  asSurveyRep,
  asSurveyTwophase,
  assertInvariants,
  designVariables,
  domainMask,
  groupVars,
  isDesignVariable,
  isGrouped,
  isRowwise,
  protectedColumns,
  withMask,
  withTable,
} from './lib/design'
export type { ConstructionOptions, LinearizationArgs, ReplicateArgs, TwoPhaseArgs } from './lib/design'

export { across, described, maxOf, meanOf, minOf, missingIn, negate, sumOf, where } from './lib/expressions'
export type { Across, DescribedExpression, EvalScope, Expression, ExpressionFn } from './lib/expressions'

export { filter, filterOut, subset } from './lib/filter'
export type { FilterOptions } from './lib/filter'
export { dropNa } from './lib/dropNa'
export { pull, relocate, select, visibleColumnNames } from './lib/select'
export type { RelocateOptions } from './lib/select'
export { rename, renameWith } from './lib/rename'
export { arrange, desc } from './lib/arrange'
export type { ArrangeOptions, SortDirection, SortKey } from './lib/arrange'
export { slice, sliceHead, sliceMax, sliceMin, sliceSample, sliceTail } from './lib/slice'
export type { SliceOrderOptions, SliceSampleOptions, SliceSize } from './lib/slice'
export { distinct } from './lib/distinct'
export { groupBy, rowwise, ungroup } from './lib/groupBy'
export type { ComputedGroupKey, GroupByOptions, GroupKey } from './lib/groupBy'
export { mutate } from './lib/mutate'
export type { KeepOption, MutateColumns, MutateOptions } from './lib/mutate'
export { SurveyChain, chain } from './lib/chain'

export { labelsFromHeaders, tableFromCsv } from './lib/csvParse'

export * from './lib/errors'
export { captureWarnings, emitWarning, setWarningHandler } from './lib/warnings'
export type { SurveyVerbsWarning, WarningCode, WarningHandler } from './lib/warnings'
export { configure, getConfig, resetConfig } from './lib/config'
export type { SurveyVerbsConfig } from './lib/config'
export { createLogger } from './lib/logger'
export type { Logger } from './lib/logger'
