/**
 * Insertion-ordered set of unique values
 *
 * Adding a present value and removing an absent one are no-ops. Removal
 * keeps the relative order of the remaining values.
 */
export class OrderedSet<T> implements Iterable<T> {
  private readonly values = new Set<T>();

  constructor(values: Iterable<T> = []) {
    for (const value of values) {
      this.values.add(value);
    }
  }

  static from<T>(values: Iterable<T>): OrderedSet<T> {
    return new OrderedSet(values);
  }

  get size(): number {
    return this.values.size;
  }

  has(value: T): boolean {
    return this.values.has(value);
  }

  add(...values: T[]): this {
    for (const value of values) {
      this.values.add(value);
    }
    return this;
  }

  remove(...values: T[]): this {
    for (const value of values) {
      this.values.delete(value);
    }
    return this;
  }

  /**
   * True when every given value is present
   */
  hasAll(values: Iterable<T>): boolean {
    for (const value of values) {
      if (!this.values.has(value)) {
        return false;
      }
    }
    return true;
  }

  toArray(): T[] {
    return Array.from(this.values);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values.values();
  }
}
