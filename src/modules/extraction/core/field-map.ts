/**
 * Ordered label → value map with a first-wins write policy.
 *
 * Once a key holds a value it is never replaced. Empty keys and empty values
 * are ignored, so a blank occurrence does not claim a key ahead of a later
 * filled one. Instances are created per document and never shared.
 */
export class FieldMap {
  private readonly store = new Map<string, string>();

  /**
   * Sets the value only when the key is not already present.
   *
   * @returns true when the value was stored
   */
  setIfAbsent(key: string, value: string): boolean {
    if (key === '' || value === '' || this.store.has(key)) {
      return false;
    }
    this.store.set(key, value);
    return true;
  }

  get(key: string): string | undefined {
    return this.store.get(key);
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  /**
   * Value of the first key, in priority order, that is present.
   */
  first(keys: readonly string[]): string | undefined {
    for (const key of keys) {
      const value = this.store.get(key);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  get size(): number {
    return this.store.size;
  }

  entries(): IterableIterator<[string, string]> {
    return this.store.entries();
  }

  /**
   * Plain object copy in insertion order.
   */
  toRecord(): Record<string, string> {
    return Object.fromEntries(this.store);
  }
}
