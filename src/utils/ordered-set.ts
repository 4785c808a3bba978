/**
 * Insertion-ordered set of strings
 * Keeps first-seen order and ignores duplicates and empty values
 */
export class OrderedSet implements Iterable<string> {
  private readonly items: string[] = [];
  private readonly seen = new Set<string>();

  constructor(values: Iterable<string | null | undefined> = []) {
    for (const value of values) {
      this.add(value);
    }
  }

  add(value: string | null | undefined): this {
    if (value && !this.seen.has(value)) {
      this.seen.add(value);
      this.items.push(value);
    }
    return this;
  }

  has(value: string): boolean {
    return this.seen.has(value);
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): string[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.items[Symbol.iterator]();
  }
}
