/**
 * Ordered set over opaque keys: O(1) membership, O(1) insert and O(1)
 * remove by moving the last element into the freed slot. Iteration order
 * is insertion order until the first removal.
 */
export class ActiveSaleIndex<K> {
  private readonly keys: K[] = [];
  private readonly positions = new Map<K, number>();

  get size(): number {
    return this.keys.length;
  }

  has(key: K): boolean {
    return this.positions.has(key);
  }

  /** Returns false when the key was already present. */
  add(key: K): boolean {
    if (this.positions.has(key)) {
      return false;
    }
    this.positions.set(key, this.keys.length);
    this.keys.push(key);
    return true;
  }

  /** Returns false when the key was absent. */
  delete(key: K): boolean {
    const position = this.positions.get(key);
    if (position === undefined) {
      return false;
    }
    const last = this.keys.pop();
    if (last !== undefined && position < this.keys.length) {
      this.keys[position] = last;
      this.positions.set(last, position);
    }
    this.positions.delete(key);
    return true;
  }

  values(): K[] {
    return [...this.keys];
  }

  slice(offset: number, limit: number): K[] {
    return this.keys.slice(offset, offset + limit);
  }
}
