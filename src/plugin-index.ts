/**
 * In-memory index over the records of one decoded plugin.
 */

import type { PluginRecord } from './types/record.js';
import { addressingIndex } from './form-id.js';

/**
 * Records grouped by where their FormID says they originate.
 */
export interface OverridePartition {
  /** Overrides of records defined in a master, keyed by master file name. */
  readonly overrides: ReadonlyMap<string, readonly PluginRecord[]>;
  /** Records new in this plugin, keyed by record type. */
  readonly newRecords: ReadonlyMap<string, readonly PluginRecord[]>;
  /** Records whose addressing index points past this plugin. */
  readonly foreign: readonly PluginRecord[];
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list: V[] | undefined = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

/**
 * One canonical record list plus two views over it: by type (insertion-ordered)
 * and by FormID. A later record with an already indexed FormID replaces the
 * FormID entry; both stay in the type view.
 */
export class PluginIndex {
  private readonly store: PluginRecord[] = [];
  private readonly typeView = new Map<string, PluginRecord[]>();
  private readonly formIdView = new Map<number, PluginRecord>();

  add(record: PluginRecord): void {
    this.store.push(record);
    pushTo(this.typeView, record.type, record);
    this.formIdView.set(record.formId, record);
  }

  /** Every record in decode order. */
  get records(): readonly PluginRecord[] {
    return this.store;
  }

  get size(): number {
    return this.store.length;
  }

  byType(type: string): readonly PluginRecord[] {
    return this.typeView.get(type) ?? [];
  }

  /** Record types in first-seen order. */
  types(): string[] {
    return Array.from(this.typeView.keys());
  }

  get(formId: number): PluginRecord | undefined {
    return this.formIdView.get(formId >>> 0);
  }

  has(formId: number): boolean {
    return this.formIdView.has(formId >>> 0);
  }

  /**
   * Partitions every record by its FormID's addressing index. Each record
   * lands in exactly one bucket.
   */
  partitionOverrides(masters: readonly string[]): OverridePartition {
    const overrides = new Map<string, PluginRecord[]>();
    const newRecords = new Map<string, PluginRecord[]>();
    const foreign: PluginRecord[] = [];

    for (const record of this.store) {
      const index: number = addressingIndex(record.formId);
      if (index < masters.length) {
        pushTo(overrides, masters[index], record);
      } else if (index === masters.length) {
        pushTo(newRecords, record.type, record);
      } else {
        foreign.push(record);
      }
    }

    return { overrides, newRecords, foreign };
  }
}
