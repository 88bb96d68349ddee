import type { Cell, SurveyDesign } from '../types'
import { arrange, type ArrangeOptions, type SortKey } from './arrange'
import { distinct } from './distinct'
import { dropNa } from './dropNa'
import type { Expression } from './expressions'
import { filter, filterOut, subset, type FilterOptions } from './filter'
import { groupBy, rowwise, ungroup, type GroupByOptions, type GroupKey } from './groupBy'
import { mutate, type MutateColumns, type MutateOptions } from './mutate'
import { rename, renameWith } from './rename'
import { pull, relocate, select, type RelocateOptions } from './select'
import { slice, sliceHead, sliceMax, sliceMin, sliceSample, sliceTail, type SliceOrderOptions, type SliceSampleOptions, type SliceSize } from './slice'
import type { Selection } from './tidySelect'

/**
 * Fluent wrapper: each method applies one verb and returns a new chain.
 *
 * @example
 * chain(design).rowwise().mutate({ row_max: (s) => maxOf(s.cAcross(startsWith('y'))) }).ungroup().value()
 */
export class SurveyChain<D extends SurveyDesign> {
  private readonly design: D

  constructor(design: D) {
    this.design = design
  }

  value(): D {
    return this.design
  }

  private next(design: D): SurveyChain<D> {
    return new SurveyChain(design)
  }

  filter(conditions: Expression[], options?: FilterOptions) {
    return this.next(filter(this.design, conditions, options))
  }

  filterOut(conditions: Expression[], options?: FilterOptions) {
    return this.next(filterOut(this.design, conditions, options))
  }

  subset(conditions: Expression[]) {
    return this.next(subset(this.design, conditions))
  }

  dropNa(columns?: Selection) {
    return this.next(dropNa(this.design, columns))
  }

  select(selection: Selection) {
    return this.next(select(this.design, selection))
  }

  relocate(selection: Selection, options?: RelocateOptions) {
    return this.next(relocate(this.design, selection, options))
  }

  rename(renames: Record<string, string>) {
    return this.next(rename(this.design, renames))
  }

  renameWith(fn: (names: string[]) => readonly unknown[], selection?: Selection) {
    return this.next(renameWith(this.design, fn, selection))
  }

  arrange(keys: SortKey[], options?: ArrangeOptions) {
    return this.next(arrange(this.design, keys, options))
  }

  slice(positions: number[]) {
    return this.next(slice(this.design, positions))
  }

  sliceHead(size?: SliceSize) {
    return this.next(sliceHead(this.design, size))
  }

  sliceTail(size?: SliceSize) {
    return this.next(sliceTail(this.design, size))
  }

  sliceMin(orderBy: string | Expression, options?: SliceOrderOptions) {
    return this.next(sliceMin(this.design, orderBy, options))
  }

  sliceMax(orderBy: string | Expression, options?: SliceOrderOptions) {
    return this.next(sliceMax(this.design, orderBy, options))
  }

  sliceSample(options?: SliceSampleOptions) {
    return this.next(sliceSample(this.design, options))
  }

  distinct(keys?: Selection) {
    return this.next(distinct(this.design, keys))
  }

  groupBy(keys: GroupKey[], options?: GroupByOptions) {
    return this.next(groupBy(this.design, keys, options))
  }

  ungroup(selection?: Selection) {
    return this.next(ungroup(this.design, selection))
  }

  rowwise(idColumns?: Selection) {
    return this.next(rowwise(this.design, idColumns))
  }

  mutate(columns: MutateColumns, options?: MutateOptions) {
    return this.next(mutate(this.design, columns, options))
  }

  /** Terminal: the values of one column */
  pull(column?: string | number): Cell[] {
    return pull(this.design, column)
  }
}

export function chain<D extends SurveyDesign>(design: D): SurveyChain<D> {
  return new SurveyChain(design)
}
