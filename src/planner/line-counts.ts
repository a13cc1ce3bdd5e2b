/**
 * Number of wrapped lines per table row for one column (or the element-wise
 * max over several columns), or the infinite marker for an infeasible
 * assignment. Infinity is a state of the whole vector, never an entry.
 */
export class LineCounts {
  private static readonly INFINITE = new LineCounts(null);

  private readonly counts: readonly number[] | null;

  private constructor(counts: readonly number[] | null) {
    this.counts = counts;
  }

  static of(counts: readonly number[]): LineCounts {
    return new LineCounts(counts);
  }

  static zero(nrows: number): LineCounts {
    return new LineCounts(new Array<number>(nrows).fill(0));
  }

  static infinite(): LineCounts {
    return LineCounts.INFINITE;
  }

  get isInfinite(): boolean {
    return this.counts === null;
  }

  /** Per-row counts, or `null` for the infinite marker. */
  values(): readonly number[] | null {
    return this.counts;
  }

  /**
   * Element-wise max: a row is as tall as its tallest cell.
   */
  maxWith(other: LineCounts): LineCounts {
    if (this.counts === null || other.counts === null) {
      return LineCounts.INFINITE;
    }
    const theirs = other.counts;
    if (theirs.length !== this.counts.length) {
      throw new RangeError(`row count mismatch: ${this.counts.length} != ${theirs.length}`);
    }
    return new LineCounts(this.counts.map((n, i) => Math.max(n, theirs[i] ?? 0)));
  }

  /** Total printed lines; `Infinity` for the marker. */
  total(): number {
    if (this.counts === null) return Number.POSITIVE_INFINITY;
    let sum = 0;
    for (const n of this.counts) sum += n;
    return sum;
  }

  /**
   * Order by total, then row by row. A vector no larger than another in every
   * row sorts first; the infinite marker sorts last.
   */
  compare(other: LineCounts): number {
    if (this.counts === null || other.counts === null) {
      return (this.counts === null ? 1 : 0) - (other.counts === null ? 1 : 0);
    }
    const byTotal = this.total() - other.total();
    if (byTotal !== 0) return byTotal;
    for (let i = 0; i < this.counts.length; i++) {
      const diff = (this.counts[i] ?? 0) - (other.counts[i] ?? 0);
      if (diff !== 0) return diff;
    }
    return 0;
  }

  toString(): string {
    return this.counts === null ? "LineCounts(inf)" : `LineCounts([${this.counts.join(", ")}])`;
  }
}
