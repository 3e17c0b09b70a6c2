import type { DestinationStream } from "pino";

import type { CellValue, ElasticMatrix } from "../src/index.js";

/**
 * Compact single-line rendering: `,` between cells, `|` between rows, `null` for absent cells.
 */
export function flat<T extends CellValue>(matrix: ElasticMatrix<T>): string {
  return matrix.toString({ cellDelimiter: ",", rowDelimiter: "|", absentMarker: "null", padCells: false });
}

export function expectRectangular<T extends CellValue>(matrix: ElasticMatrix<T>): void {
  const columns = matrix.getColumns();
  const rows = matrix.size().y;
  if ((columns.length === 0) !== (rows === 0)) {
    throw new Error(`Matrix has ${columns.length} columns but ${rows} rows`);
  }
  for (const [x, column] of columns.entries()) {
    if (column.length !== rows) {
      throw new Error(`Column ${x} has ${column.length} cells, expected ${rows}`);
    }
  }
}

export function captureStream(): { stream: DestinationStream; records: () => unknown[] } {
  const lines: string[] = [];
  return {
    stream: {
      write(msg: string) {
        lines.push(msg);
      },
    },
    records: () => lines.map((line): unknown => JSON.parse(line)),
  };
}
