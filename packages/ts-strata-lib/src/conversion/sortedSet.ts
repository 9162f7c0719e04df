/**
 * A set that iterates in comparator order. Membership is decided by the
 * comparator: two elements comparing equal are the same element.
 */
export class SortedSet<E> implements Iterable<E> {
  private readonly elements: E[] = [];
  readonly compare: (a: E, b: E) => number;

  constructor(compare: (a: E, b: E) => number, values?: Iterable<E>) {
    this.compare = compare;
    if (values) {
      for (const value of values) {
        this.add(value);
      }
    }
  }

  get size(): number {
    return this.elements.length;
  }

  /** Index of `value` if present, otherwise `-(insertionPoint + 1)`. */
  private search(value: E): number {
    let low = 0;
    let high = this.elements.length - 1;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const order = this.compare(this.elements[mid], value);
      if (order < 0) {
        low = mid + 1;
      } else if (order > 0) {
        high = mid - 1;
      } else {
        return mid;
      }
    }
    return -(low + 1);
  }

  add(value: E): this {
    const index = this.search(value);
    if (index < 0) {
      this.elements.splice(-(index + 1), 0, value);
    }
    return this;
  }

  has(value: E): boolean {
    return this.search(value) >= 0;
  }

  delete(value: E): boolean {
    const index = this.search(value);
    if (index < 0) return false;
    this.elements.splice(index, 1);
    return true;
  }

  clear(): void {
    this.elements.length = 0;
  }

  first(): E | undefined {
    return this.elements[0];
  }

  last(): E | undefined {
    return this.elements[this.elements.length - 1];
  }

  values(): IterableIterator<E> {
    return this.elements.values();
  }

  toArray(): E[] {
    return [...this.elements];
  }

  [Symbol.iterator](): IterableIterator<E> {
    return this.values();
  }
}
