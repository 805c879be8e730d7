export class Collection<K extends string, V> extends Map<K, V> {
  constructor(entries?: readonly (readonly [K, V])[] | null) {
    super(entries);
  }

  get valuesArray(): V[] {
    return Array.from(this.values());
  }

  get entriesArray(): [K, V][] {
    return Array.from(this.entries());
  }

  /** Key of the earliest inserted entry still present */
  get firstKey(): K | undefined {
    const next = this.keys().next();
    return next.done ? undefined : next.value;
  }

  filter(fn: (value: V) => boolean): V[] {
    return this.valuesArray.filter(fn);
  }

  /** Removes entries matching `fn`, returning how many were removed */
  sweep(fn: (value: V, key: K) => boolean): number {
    let removed = 0;
    for (const [key, value] of this.entriesArray) {
      if (fn(value, key)) {
        this.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
