import type { VariableLabels } from '../types'

/** Immutable map from column name to its descriptive metadata. */
export class LabelStore {
  private readonly entries: ReadonlyMap<string, VariableLabels>

  constructor(entries?: Iterable<[string, VariableLabels]>) {
    this.entries = new Map(entries ?? [])
  }

  static empty(): LabelStore {
    return new LabelStore()
  }

  get size(): number {
    return this.entries.size
  }

  keys(): string[] {
    return Array.from(this.entries.keys())
  }

  has(column: string): boolean {
    return this.entries.has(column)
  }

  get(column: string): VariableLabels | undefined {
    return this.entries.get(column)
  }

  set(column: string, labels: Partial<VariableLabels>): LabelStore {
    const next = new Map(this.entries)
    next.set(column, { valueLabels: [], ...this.entries.get(column), ...labels })
    return new LabelStore(next)
  }

  setLabel(column: string, label: string): LabelStore {
    return this.set(column, { label })
  }

  setTransformation(column: string, transformation: string): LabelStore {
    return this.set(column, { transformation })
  }

  /** Re-key entries; `mapping` is old name -> new name. Entry order is kept. */
  renameKeys(mapping: Map<string, string>): LabelStore {
    if (mapping.size === 0) return this
    return new LabelStore(Array.from(this.entries, ([key, value]): [string, VariableLabels] => [mapping.get(key) ?? key, value]))
  }

  deleteKeys(columns: Iterable<string>): LabelStore {
    const drop = new Set(columns)
    if (drop.size === 0) return this
    return new LabelStore(Array.from(this.entries).filter(([key]) => !drop.has(key)))
  }

  toObject(): Record<string, VariableLabels> {
    return Object.fromEntries(this.entries)
  }
}
