import { Coordinates } from "./coordinates.js";
import { MatrixIndexOutOfRangeError } from "./errors.js";
import { IndexRange } from "./range.js";

/**
 * A rectangular range of coordinates, `from` inclusive and `to` exclusive on both axes.
 *
 * Iteration is column-major: every `y` of column `from.x`, then the next column.
 */
export class Block implements Iterable<Coordinates> {
  readonly from: Coordinates;
  readonly to: Coordinates;

  private constructor(from: Coordinates, to: Coordinates) {
    this.from = from;
    this.to = to;
  }

  static of(from: Coordinates, to: Coordinates): Block;
  static of(fromX: number, fromY: number, toX: number, toY: number): Block;
  static of(fromOrX: Coordinates | number, toOrY: Coordinates | number, toX?: number, toY?: number): Block {
    const from = typeof fromOrX === "number" ? Coordinates.of(fromOrX, toNumber(toOrY)) : fromOrX;
    const to = typeof fromOrX === "number" ? Coordinates.of(toNumber(toX), toNumber(toY)) : toCoordinates(toOrY);
    if (from.x > to.x) {
      throw new MatrixIndexOutOfRangeError(`Block X range ${from.x}..${to.x} is negative`, { index: from.x, limit: to.x });
    }
    if (from.y > to.y) {
      throw new MatrixIndexOutOfRangeError(`Block Y range ${from.y}..${to.y} is negative`, { index: from.y, limit: to.y });
    }
    return new Block(from, to);
  }

  get xRange(): IndexRange {
    return IndexRange.of(this.from.x, this.to.x);
  }

  get yRange(): IndexRange {
    return IndexRange.of(this.from.y, this.to.y);
  }

  size(): Coordinates {
    return Coordinates.of(this.to.x - this.from.x, this.to.y - this.from.y);
  }

  isEmpty(): boolean {
    return this.from.x === this.to.x || this.from.y === this.to.y;
  }

  contains(coordinates: Coordinates): boolean {
    return this.xRange.includes(coordinates.x) && this.yRange.includes(coordinates.y);
  }

  /**
   * Runs `action` for every cell of the block. Does nothing if either range is empty.
   */
  forEach(action: (x: number, y: number) => void): void {
    const ys = this.yRange;
    this.xRange.forEach((x) => ys.forEach((y) => action(x, y)));
  }

  *[Symbol.iterator](): Iterator<Coordinates> {
    for (const x of this.xRange) {
      for (const y of this.yRange) yield Coordinates.of(x, y);
    }
  }

  toString(): string {
    return `${this.from}..${this.to}`;
  }
}

function toNumber(value: Coordinates | number | undefined): number {
  if (typeof value === "number") return value;
  throw new TypeError("Block.of expects four numeric coordinates");
}

function toCoordinates(value: Coordinates | number): Coordinates {
  if (value instanceof Coordinates) return value;
  throw new TypeError("Block.of expects two Coordinates");
}
