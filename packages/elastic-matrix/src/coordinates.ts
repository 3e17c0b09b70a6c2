import { requireNonNegativeIndex } from "./errors.js";

/**
 * An immutable `(x, y)` pair where `x` is a column index and `y` a row index.
 *
 * Also used for matrix sizes, in which case `x` is the column count and `y` the row count.
 */
export class Coordinates {
  readonly x: number;
  readonly y: number;

  private constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }

  static of(x: number, y: number): Coordinates {
    return new Coordinates(requireNonNegativeIndex(x, "X coordinate"), requireNonNegativeIndex(y, "Y coordinate"));
  }

  equals(other: Coordinates): boolean;
  equals(x: number, y: number): boolean;
  equals(xOrOther: Coordinates | number, y?: number): boolean {
    if (typeof xOrOther === "number") return this.x === xOrOther && this.y === y;
    return this.x === xOrOther.x && this.y === xOrOther.y;
  }

  /**
   * Stable key for use in `Map`/`Set`, since coordinates compare by value.
   */
  key(): string {
    return `${this.x}:${this.y}`;
  }

  toString(): string {
    return `[${this.x}, ${this.y}]`;
  }
}
