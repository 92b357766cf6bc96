// src/core/values/lazy.ts
// Finite, memoizing lazy sequence

type Cursor<T> = { length: number; compute: (index: number) => T };

/**
 * A finite sequence whose elements are computed from a source list on first
 * access and memoized. With a deferred source even the source list is not
 * obtained until something is read.
 */
export class LazySeq<T> implements Iterable<T> {
  private cursor: Cursor<T> | undefined;
  private readonly cells: Array<{ value: T } | undefined> = [];
  private realized = 0;

  private constructor(private readonly open: () => Cursor<T>) {}

  static from<S, T>(items: readonly S[], f: (item: S, index: number) => T): LazySeq<T> {
    return LazySeq.deferred(() => items, f);
  }

  static deferred<S, T>(items: () => readonly S[], f: (item: S, index: number) => T): LazySeq<T> {
    return new LazySeq<T>(() => {
      const xs = items();
      return { length: xs.length, compute: (i) => f(xs[i]!, i) };
    });
  }

  /** Whether the source list has been obtained. */
  get opened(): boolean {
    return this.cursor !== undefined;
  }

  /** Number of elements computed so far. */
  get realizedCount(): number {
    return this.realized;
  }

  get length(): number {
    return this.source().length;
  }

  get(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) return undefined;
    return this.at(index);
  }

  toArray(): T[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) yield this.at(i);
  }

  private at(index: number): T {
    const cell = this.cells[index];
    if (cell) return cell.value;
    const value = this.source().compute(index);
    this.cells[index] = { value };
    this.realized++;
    return value;
  }

  private source(): Cursor<T> {
    if (!this.cursor) this.cursor = this.open();
    return this.cursor;
  }
}
