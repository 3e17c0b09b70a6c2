import { describe, expect, it } from "vitest";

import { ElasticMatrix, isMatrixIndexOutOfRangeError, MatrixIndexOutOfRangeError } from "../src/index.js";
import { flat } from "./helpers.js";

function expectOutOfRange(action: () => unknown): void {
  expect(action).toThrow(MatrixIndexOutOfRangeError);
}

function expectNegativeIndexesRejected(matrix: ElasticMatrix<string>): void {
  expectOutOfRange(() => matrix.get(-1, 0));
  expectOutOfRange(() => matrix.get(0, -1));
  expectOutOfRange(() => matrix.getRow(-1));
  expectOutOfRange(() => matrix.getColumn(-1));
  expectOutOfRange(() => matrix.addRowAfter(-1));
  expectOutOfRange(() => matrix.addColumnAfter(-1));
  expectOutOfRange(() => matrix.addRowAfter(-1, "X"));
  expectOutOfRange(() => matrix.addColumnAfter(-1, "X"));
  expectOutOfRange(() => matrix.addRowBefore(-1));
  expectOutOfRange(() => matrix.addColumnBefore(-1));
  expectOutOfRange(() => matrix.removeRow(-1));
  expectOutOfRange(() => matrix.removeColumn(-1));
}

function expectEmptyIndexesRejected(matrix: ElasticMatrix<string>): void {
  expectOutOfRange(() => matrix.get(0, 0));
  expectOutOfRange(() => matrix.getFirstRow());
  expectOutOfRange(() => matrix.getLastColumn());
  expectOutOfRange(() => matrix.addRowAfter(0));
  expectOutOfRange(() => matrix.addColumnAfter(0, "X"));
  expectOutOfRange(() => matrix.addRowBefore(1));
  expectOutOfRange(() => matrix.addColumnBefore(1, "X"));
  expectOutOfRange(() => matrix.removeFirstRow());
  expectOutOfRange(() => matrix.removeLastColumn());
}

describe("ElasticMatrix index validation", () => {
  it("rejects every index on an empty matrix", () => {
    const matrix = new ElasticMatrix<string>();
    expectNegativeIndexesRejected(matrix);
    expectEmptyIndexesRejected(matrix);
    expect(matrix.isEmpty()).toBe(true);
  });

  it("tracks the bounds through inserts and removals", () => {
    const matrix = new ElasticMatrix<string>();
    matrix.addRow("a", "b");
    expectNegativeIndexesRejected(matrix);
    expectOutOfRange(() => matrix.get(2, 0));
    expectOutOfRange(() => matrix.get(0, 1));
    expectOutOfRange(() => matrix.getRow(1));
    expectOutOfRange(() => matrix.getColumn(2));
    expectOutOfRange(() => matrix.addRowAfter(1));
    expectOutOfRange(() => matrix.addColumnAfter(2, "X"));
    expectOutOfRange(() => matrix.addRowBefore(2, "X"));
    expectOutOfRange(() => matrix.addColumnBefore(3));
    expectOutOfRange(() => matrix.removeRow(1));
    expectOutOfRange(() => matrix.removeColumn(2));

    matrix.addRow("c", "d");
    expectOutOfRange(() => matrix.get(2, 2));
    expectOutOfRange(() => matrix.addRowAfter(2, "X"));
    expectOutOfRange(() => matrix.addRowBefore(3));
    expectOutOfRange(() => matrix.removeRow(2));

    matrix.removeRow(1);
    matrix.removeColumn(1);
    expect(flat(matrix)).toBe("a");
    expectOutOfRange(() => matrix.get(1, 0));
    expectOutOfRange(() => matrix.addColumnAfter(1, "X", "Y"));
    expectOutOfRange(() => matrix.addRowBefore(2, "X", "Y"));

    matrix.clear();
    expectNegativeIndexesRejected(matrix);
    expectEmptyIndexesRejected(matrix);
  });

  it("rejects fractional indexes", () => {
    const matrix = ElasticMatrix.fromRows([["a", "b"]]);
    expectOutOfRange(() => matrix.get(0.5, 0));
    expectOutOfRange(() => matrix.addRowBefore(0.5, "X"));
    expect(flat(matrix)).toBe("a,b");
  });

  it("leaves the matrix unchanged after a failed insert", () => {
    const matrix = ElasticMatrix.fromRows([
      ["a", "b"],
      ["c", "d"],
    ]);
    expectOutOfRange(() => matrix.addRowBefore(3, "X", "Y", "Z"));
    expectOutOfRange(() => matrix.addColumnAfter(2, "X", "Y", "Z"));
    expect(matrix.size().equals(2, 2)).toBe(true);
    expect(flat(matrix)).toBe("a,b|c,d");
  });

  it("reports the failing index and bound", () => {
    const matrix = ElasticMatrix.fromRows([["a", "b"]]);
    let caught: unknown = null;
    try {
      matrix.getColumn(5);
    } catch (err) {
      caught = err;
    }
    expect(isMatrixIndexOutOfRangeError(caught)).toBe(true);
    expect(caught).toMatchObject({ name: "MatrixIndexOutOfRangeError", index: 5, limit: 2 });
    expect(isMatrixIndexOutOfRangeError(new Error("nope"))).toBe(false);
  });
});
