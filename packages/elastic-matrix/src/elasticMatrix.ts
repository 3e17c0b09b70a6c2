import type { Logger } from "pino";

import { Block } from "./block.js";
import type { ElasticMatrixOptions } from "./config.js";
import { Coordinates } from "./coordinates.js";
import { MatrixIndexOutOfRangeError, requireNonNegativeIndex } from "./errors.js";
import { IndexRange } from "./range.js";
import { renderColumns, resolveRenderOptions, type RenderOptions } from "./render.js";

/**
 * Anything but `null`/`undefined`: `null` is reserved for absent cells.
 */
export type CellValue = NonNullable<unknown>;

export type Cell<T extends CellValue> = T | null;

export type CellEquality<T extends CellValue> = (a: T, b: T) => boolean;

function absentCells<T extends CellValue>(count: number): Array<Cell<T>> {
  return new Array<Cell<T>>(count).fill(null);
}

function isAbsent(cell: unknown): boolean {
  return cell === null;
}

/**
 * A dense, resizable two-dimensional container with spreadsheet-like row and column editing.
 *
 * Cells are stored column-major. Every column has the same length, and the matrix is either
 * 0x0 or at least 1x1; removing the last row or the last column empties it.
 *
 * Rows, columns and ranges handed out by the matrix are copies. Not safe for concurrent mutation.
 */
export class ElasticMatrix<T extends CellValue> implements Iterable<Cell<T>> {
  private content: Array<Array<Cell<T>>> = [];
  private readonly options: ElasticMatrixOptions;
  private readonly logger: Logger | undefined;

  constructor(options: ElasticMatrixOptions = {}) {
    this.options = options;
    this.logger = options.logger;
  }

  /**
   * Creates a matrix of absent cells. Zero is only accepted for both dimensions at once.
   */
  static ofSize<T extends CellValue>(columns: number, rows: number, options?: ElasticMatrixOptions): ElasticMatrix<T> {
    requireNonNegativeIndex(columns, "Column count");
    requireNonNegativeIndex(rows, "Row count");
    if ((columns === 0) !== (rows === 0)) {
      throw new MatrixIndexOutOfRangeError(`The matrix size can't be zero in one dimension: ${columns}x${rows}`, {
        index: 0,
      });
    }
    const matrix = new ElasticMatrix<T>(options);
    for (let x = 0; x < columns; x++) matrix.content.push(absentCells<T>(rows));
    return matrix;
  }

  /**
   * Builds a matrix row by row. Shorter rows are padded with absent cells.
   *
   * Throws if some rows are empty while others are not; all-empty input gives an empty matrix.
   */
  static fromRows<T extends CellValue>(
    rows: ReadonlyArray<ReadonlyArray<Cell<T>>>,
    options?: ElasticMatrixOptions
  ): ElasticMatrix<T> {
    assertNotRagged(rows, "Row");
    const matrix = new ElasticMatrix<T>(options);
    for (const row of rows) {
      if (row.length > 0) matrix.addRow(...row);
    }
    return matrix;
  }

  static fromColumns<T extends CellValue>(
    columns: ReadonlyArray<ReadonlyArray<Cell<T>>>,
    options?: ElasticMatrixOptions
  ): ElasticMatrix<T> {
    assertNotRagged(columns, "Column");
    const matrix = new ElasticMatrix<T>(options);
    for (const column of columns) {
      if (column.length > 0) matrix.addColumn(...column);
    }
    return matrix;
  }

  get columnCount(): number {
    return this.content.length;
  }

  get rowCount(): number {
    return this.content[0]?.length ?? 0;
  }

  isEmpty(): boolean {
    return this.content.length === 0;
  }

  /**
   * `x` is the number of columns, `y` the number of rows.
   */
  size(): Coordinates {
    return Coordinates.of(this.columnCount, this.rowCount);
  }

  get(...args: [coordinates: Coordinates] | [x: number, y: number]): Cell<T> {
    const [x, y] = args.length === 1 ? [args[0].x, args[0].y] : args;
    return this.content[this.checkColumn(x)][this.checkRow(y)];
  }

  /**
   * Replaces a cell and returns the previous value.
   */
  set(...args: [coordinates: Coordinates, value: Cell<T>] | [x: number, y: number, value: Cell<T>]): Cell<T> {
    if (args.length === 2) return this.setCell(args[0].x, args[0].y, args[1]);
    return this.setCell(args[0], args[1], args[2]);
  }

  private setCell(x: number, y: number, value: Cell<T>): Cell<T> {
    const column = this.content[this.checkColumn(x)];
    const previous = column[this.checkRow(y)];
    column[y] = value;
    return previous;
  }

  getRow(y: number): Array<Cell<T>> {
    this.checkRow(y);
    return this.content.map((column) => column[y]);
  }

  getFirstRow(): Array<Cell<T>> {
    return this.getRow(0);
  }

  getLastRow(): Array<Cell<T>> {
    return this.getRow(this.rowCount - 1);
  }

  getColumn(x: number): Array<Cell<T>> {
    return this.content[this.checkColumn(x)].slice();
  }

  getFirstColumn(): Array<Cell<T>> {
    return this.getColumn(0);
  }

  getLastColumn(): Array<Cell<T>> {
    return this.getColumn(this.columnCount - 1);
  }

  getRows(): Array<Array<Cell<T>>> {
    const rows: Array<Array<Cell<T>>> = [];
    for (let y = 0; y < this.rowCount; y++) {
      rows.push(this.content.map((column) => column[y]));
    }
    return rows;
  }

  getColumns(): Array<Array<Cell<T>>> {
    return this.content.map((column) => column.slice());
  }

  getRowsRange(): IndexRange {
    return IndexRange.of(0, this.rowCount);
  }

  getColumnsRange(): IndexRange {
    return IndexRange.of(0, this.columnCount);
  }

  /**
   * A block spanning the whole matrix.
   */
  getBlock(): Block {
    return Block.of(Coordinates.of(0, 0), this.size());
  }

  contains(value: Cell<T>): boolean {
    return this.indexOf(value) !== null;
  }

  /**
   * Coordinates of the first strictly-equal cell, scanning column 0 top to bottom, then column 1,
   * and so on. `null` when not found.
   */
  indexOf(value: Cell<T>): Coordinates | null {
    for (let x = 0; x < this.content.length; x++) {
      const y = this.content[x].indexOf(value);
      if (y >= 0) return Coordinates.of(x, y);
    }
    return null;
  }

  /**
   * Coordinates of the last strictly-equal cell, scanning the last column bottom to top, then the
   * one before it. `null` when not found.
   */
  lastIndexOf(value: Cell<T>): Coordinates | null {
    for (let x = this.content.length - 1; x >= 0; x--) {
      const y = this.content[x].lastIndexOf(value);
      if (y >= 0) return Coordinates.of(x, y);
    }
    return null;
  }

  /**
   * Appends a row. See {@link addRowBefore} for padding and stretching.
   */
  addRow(...values: Array<Cell<T>>): void {
    this.addRowBefore(this.rowCount, ...values);
  }

  /**
   * Inserts a row so it becomes row `y`, shifting later rows down.
   *
   * Missing values are absent. Extra values stretch the matrix with absent columns appended on
   * the right before the row is inserted. On an empty matrix this yields `max(values.length, 1)`
   * columns and one row.
   *
   * @param y May equal the row count to append.
   */
  addRowBefore(y: number, ...values: Array<Cell<T>>): void {
    this.checkRowInsert(y);
    const bootstrap = this.isEmpty();
    // Placeholder row, dropped once the real one is in.
    if (bootstrap) this.content.push([null]);
    this.stretchColumns(values.length, bootstrap);
    this.content.forEach((column, x) => column.splice(y, 0, values[x] ?? null));
    if (bootstrap) this.dropRow(y + 1);
  }

  addRowAfter(y: number, ...values: Array<Cell<T>>): void {
    this.addRowBefore(requireNonNegativeIndex(y, "Row") + 1, ...values);
  }

  /**
   * Appends a column. See {@link addColumnBefore} for padding and stretching.
   */
  addColumn(...values: Array<Cell<T>>): void {
    this.addColumnBefore(this.columnCount, ...values);
  }

  /**
   * Inserts a column so it becomes column `x`, shifting later columns right.
   *
   * Missing values are absent. Extra values stretch the matrix with absent rows appended at the
   * bottom before the column is inserted. On an empty matrix this yields one column and
   * `max(values.length, 1)` rows.
   *
   * @param x May equal the column count to append.
   */
  addColumnBefore(x: number, ...values: Array<Cell<T>>): void {
    this.checkColumnInsert(x);
    const bootstrap = this.isEmpty();
    if (bootstrap) this.content.push([null]);
    this.stretchRows(values.length, bootstrap);
    const column = absentCells<T>(this.rowCount);
    for (let y = 0; y < values.length; y++) column[y] = values[y] ?? null;
    this.content.splice(x, 0, column);
    if (bootstrap) this.content.splice(x + 1, 1);
  }

  addColumnAfter(x: number, ...values: Array<Cell<T>>): void {
    this.addColumnBefore(requireNonNegativeIndex(x, "Column") + 1, ...values);
  }

  /**
   * Removes row `y` and returns it. Removing the only row empties the matrix.
   */
  removeRow(y: number): Array<Cell<T>> {
    return this.dropRow(this.checkRow(y));
  }

  removeFirstRow(): Array<Cell<T>> {
    return this.removeRow(0);
  }

  removeLastRow(): Array<Cell<T>> {
    return this.removeRow(this.rowCount - 1);
  }

  /**
   * Removes column `x` and returns it. Removing the only column empties the matrix.
   */
  removeColumn(x: number): Array<Cell<T>> {
    const [column] = this.content.splice(this.checkColumn(x), 1);
    if (this.isEmpty()) this.logger?.debug({ removed: "column" }, "matrix_collapsed");
    return column;
  }

  removeFirstColumn(): Array<Cell<T>> {
    return this.removeColumn(0);
  }

  removeLastColumn(): Array<Cell<T>> {
    return this.removeColumn(this.columnCount - 1);
  }

  /**
   * Replaces row `y` and returns the previous one.
   *
   * If replacing the only row emptied the matrix, the column count is stretched back so it is at
   * least the replaced row's length.
   */
  setRow(y: number, ...values: Array<Cell<T>>): Array<Cell<T>> {
    const previous = this.removeRow(y);
    this.addRowBefore(y, ...values);
    this.stretchColumns(previous.length);
    return previous;
  }

  setColumn(x: number, ...values: Array<Cell<T>>): Array<Cell<T>> {
    const previous = this.removeColumn(x);
    this.addColumnBefore(x, ...values);
    this.stretchRows(previous.length);
    return previous;
  }

  /**
   * Strips trailing rows and/or columns whose cells are all absent, until one holds a value or
   * the matrix is empty. Rows are packed first.
   */
  pack(packRows = true, packColumns = true): void {
    let rowsRemoved = 0;
    let columnsRemoved = 0;
    if (packRows) {
      while (!this.isEmpty() && this.getLastRow().every(isAbsent)) {
        this.removeLastRow();
        rowsRemoved++;
      }
    }
    if (packColumns) {
      while (!this.isEmpty() && this.content[this.content.length - 1].every(isAbsent)) {
        this.removeLastColumn();
        columnsRemoved++;
      }
    }
    if (rowsRemoved > 0 || columnsRemoved > 0) {
      this.logger?.debug({ rowsRemoved, columnsRemoved }, "matrix_packed");
    }
  }

  packRows(): void {
    this.pack(true, false);
  }

  packColumns(): void {
    this.pack(false, true);
  }

  clear(): void {
    this.content = [];
  }

  swap(...args: [a: Coordinates, b: Coordinates] | [x1: number, y1: number, x2: number, y2: number]): void {
    const [x1, y1, x2, y2] = args.length === 2 ? [args[0].x, args[0].y, args[1].x, args[1].y] : args;
    this.checkColumn(x1);
    this.checkRow(y1);
    this.checkColumn(x2);
    this.checkRow(y2);
    const held = this.content[x1][y1];
    this.content[x1][y1] = this.content[x2][y2];
    this.content[x2][y2] = held;
  }

  swapRows(y1: number, y2: number): void {
    this.checkRow(y1);
    this.checkRow(y2);
    for (const column of this.content) {
      const held = column[y1];
      column[y1] = column[y2];
      column[y2] = held;
    }
  }

  swapColumns(x1: number, x2: number): void {
    this.checkColumn(x1);
    this.checkColumn(x2);
    const held = this.content[x1];
    this.content[x1] = this.content[x2];
    this.content[x2] = held;
  }

  /**
   * Reverses the column order.
   */
  reverseX(): void {
    this.content.reverse();
  }

  /**
   * Reverses the row order.
   */
  reverseY(): void {
    for (const column of this.content) column.reverse();
  }

  /**
   * Transposes the matrix along its main diagonal: rows become columns.
   */
  flip(): void {
    this.content = this.getRows();
    if (!this.isEmpty()) {
      this.logger?.debug({ columns: this.columnCount, rows: this.rowCount }, "matrix_transposed");
    }
  }

  turnClockwise(): void {
    this.flip();
    this.reverseX();
  }

  turnCounterClockwise(): void {
    this.flip();
    this.reverseY();
  }

  /**
   * Same size and equal cells. Absent cells only equal absent cells; present ones are compared
   * with `cellEquals` (strict equality by default).
   */
  equals(other: ElasticMatrix<T>, cellEquals: CellEquality<T> = (a, b) => a === b): boolean {
    if (this === other) return true;
    if (this.columnCount !== other.columnCount || this.rowCount !== other.rowCount) return false;
    for (let x = 0; x < this.content.length; x++) {
      const mine = this.content[x];
      const theirs = other.content[x];
      for (let y = 0; y < mine.length; y++) {
        const a = mine[y];
        const b = theirs[y];
        if (a === null || b === null) {
          if (a !== b) return false;
        } else if (!cellEquals(a, b)) {
          return false;
        }
      }
    }
    return true;
  }

  clone(): ElasticMatrix<T> {
    const next = new ElasticMatrix<T>(this.options);
    next.content = this.getColumns();
    return next;
  }

  /**
   * Cells in column-major order.
   */
  *values(): IterableIterator<Cell<T>> {
    for (const column of this.content) yield* column;
  }

  *entries(): IterableIterator<[Coordinates, Cell<T>]> {
    for (let x = 0; x < this.content.length; x++) {
      const column = this.content[x];
      for (let y = 0; y < column.length; y++) yield [Coordinates.of(x, y), column[y]];
    }
  }

  [Symbol.iterator](): IterableIterator<Cell<T>> {
    return this.values();
  }

  /**
   * Renders the matrix row by row. `overrides` take precedence over the matrix's `render`
   * options, which take precedence over the defaults.
   */
  toString(overrides?: Partial<RenderOptions>): string {
    return renderColumns(this.content, resolveRenderOptions(this.options.render, overrides));
  }

  private stretchColumns(target: number, quiet = false): void {
    const missing = target - this.columnCount;
    if (missing <= 0) return;
    const rows = this.rowCount;
    for (let i = 0; i < missing; i++) this.content.push(absentCells<T>(rows));
    if (!quiet) this.logger?.debug({ axis: "columns", added: missing, size: this.size().toString() }, "matrix_stretched");
  }

  private stretchRows(target: number, quiet = false): void {
    const missing = target - this.rowCount;
    if (missing <= 0) return;
    for (const column of this.content) {
      for (let i = 0; i < missing; i++) column.push(null);
    }
    if (!quiet) this.logger?.debug({ axis: "rows", added: missing, size: this.size().toString() }, "matrix_stretched");
  }

  private dropRow(y: number): Array<Cell<T>> {
    const row = this.content.map((column) => column.splice(y, 1)[0]);
    if (this.rowCount === 0) {
      this.content = [];
      this.logger?.debug({ removed: "row" }, "matrix_collapsed");
    }
    return row;
  }

  private checkColumn(x: number): number {
    if (requireNonNegativeIndex(x, "Column") >= this.columnCount) {
      throw new MatrixIndexOutOfRangeError(`Column ${x} doesn't exist in a total of ${this.columnCount}`, {
        index: x,
        limit: this.columnCount,
      });
    }
    return x;
  }

  private checkRow(y: number): number {
    if (requireNonNegativeIndex(y, "Row") >= this.rowCount) {
      throw new MatrixIndexOutOfRangeError(`Row ${y} doesn't exist in a total of ${this.rowCount}`, {
        index: y,
        limit: this.rowCount,
      });
    }
    return y;
  }

  private checkColumnInsert(x: number): void {
    if (requireNonNegativeIndex(x, "Column") > this.columnCount) {
      throw new MatrixIndexOutOfRangeError(`Column ${x} can't be added having a total of ${this.columnCount}`, {
        index: x,
        limit: this.columnCount + 1,
      });
    }
  }

  private checkRowInsert(y: number): void {
    if (requireNonNegativeIndex(y, "Row") > this.rowCount) {
      throw new MatrixIndexOutOfRangeError(`Row ${y} can't be added having a total of ${this.rowCount}`, {
        index: y,
        limit: this.rowCount + 1,
      });
    }
  }
}

function assertNotRagged(vectors: ReadonlyArray<ReadonlyArray<unknown>>, what: "Row" | "Column"): void {
  if (!vectors.some((vector) => vector.length > 0)) return;
  const empty = vectors.findIndex((vector) => vector.length === 0);
  if (empty >= 0) {
    throw new MatrixIndexOutOfRangeError(`${what} ${empty} is empty; the matrix size can't be zero in one dimension`, {
      index: empty,
    });
  }
}
