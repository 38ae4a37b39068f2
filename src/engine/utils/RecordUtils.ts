// ─────────────────────────────────────────────
//  Keyed records (inventories, resource pools, quest logs)
//  Keys come from callers, so records carry no prototype and
//  reads only see own properties.
// ─────────────────────────────────────────────

export const RecordUtils = {
  /** Null-prototype copy of `init`; "__proto__" is stored like any other key */
  create<V>(init: Readonly<Record<string, V>> = {}): Record<string, V> {
    const record: Record<string, V> = Object.create(null);
    for (const [key, value] of Object.entries(init)) record[key] = value;
    return record;
  },

  /** Own-property lookup: inherited names such as "toString" are absent */
  get<V>(record: Readonly<Record<string, V>>, key: string): V | undefined {
    return Object.hasOwn(record, key) ? record[key] : undefined;
  },

  count(record: Readonly<Record<string, number>>, key: string): number {
    return RecordUtils.get(record, key) ?? 0;
  },
};
