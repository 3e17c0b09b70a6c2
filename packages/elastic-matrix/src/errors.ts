export const MATRIX_INDEX_OUT_OF_RANGE_ERROR_NAME = "MatrixIndexOutOfRangeError";

/**
 * Thrown when an index, coordinate or size falls outside what the matrix (or a
 * coordinate type) accepts.
 *
 * `limit` is the exclusive upper bound that was in effect, or `null` when only
 * the lower bound (non-negative integer) was checked.
 */
export class MatrixIndexOutOfRangeError extends Error {
  readonly index: number;
  readonly limit: number | null;

  constructor(message: string, opts: { index: number; limit?: number | null }) {
    super(message);
    this.name = MATRIX_INDEX_OUT_OF_RANGE_ERROR_NAME;
    this.index = opts.index;
    this.limit = opts.limit ?? null;
  }
}

export function isMatrixIndexOutOfRangeError(err: unknown): err is MatrixIndexOutOfRangeError {
  return (
    err instanceof Error &&
    err.name === MATRIX_INDEX_OUT_OF_RANGE_ERROR_NAME &&
    "index" in err &&
    typeof err.index === "number"
  );
}

/**
 * Asserts `index` is a non-negative integer and returns it.
 */
export function requireNonNegativeIndex(index: number, what = "Index"): number {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new MatrixIndexOutOfRangeError(`${what} out of bounds: ${index}`, { index });
  }
  return index;
}
