import { MatrixIndexOutOfRangeError, requireNonNegativeIndex } from "./errors.js";

/**
 * Half-open integer range `[from, to)`.
 */
export class IndexRange implements Iterable<number> {
  readonly from: number;
  readonly to: number;

  private constructor(from: number, to: number) {
    this.from = from;
    this.to = to;
  }

  static of(from: number, to: number): IndexRange {
    requireNonNegativeIndex(from, "Range start");
    requireNonNegativeIndex(to, "Range end");
    if (from > to) {
      throw new MatrixIndexOutOfRangeError(`Range start ${from} is past its end ${to}`, { index: from, limit: to });
    }
    return new IndexRange(from, to);
  }

  get size(): number {
    return this.to - this.from;
  }

  includes(index: number): boolean {
    return Number.isInteger(index) && index >= this.from && index < this.to;
  }

  forEach(action: (index: number) => void): void {
    for (let i = this.from; i < this.to; i++) action(i);
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = this.from; i < this.to; i++) yield i;
  }

  toString(): string {
    return `[${this.from}, ${this.to})`;
  }
}
