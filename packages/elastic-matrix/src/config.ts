import type { DestinationStream, Logger } from "pino";

import { createLogger } from "./logger.js";
import type { RenderOptions } from "./render.js";

export type ElasticMatrixConfig = {
  logLevel: string;
  /**
   * Rendering defaults for matrices built from this config. Unset fields fall back to
   * the built-in defaults (space, newline, empty marker, padded cells).
   */
  render: Partial<RenderOptions>;
};

export type ElasticMatrixOptions = {
  /**
   * Receives `debug` records for structural events (stretch, collapse, pack, transpose).
   */
  logger?: Logger;
  render?: Partial<RenderOptions>;
};

type Env = Record<string, string | undefined>;

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

// Delimiters are hard to pass through env files verbatim, so accept `\n`, `\t` and `\\`.
function envDelimiter(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.replace(/\\([nt\\])/g, (_match, ch: string) => (ch === "n" ? "\n" : ch === "t" ? "\t" : "\\"));
}

export function loadMatrixConfigFromEnv(env: Env = process.env): ElasticMatrixConfig {
  const logLevel = env.ELASTIC_MATRIX_LOG_LEVEL?.trim() || "info";

  const render: Partial<RenderOptions> = {};
  const cellDelimiter = envDelimiter(env.ELASTIC_MATRIX_CELL_DELIMITER);
  if (cellDelimiter !== undefined) render.cellDelimiter = cellDelimiter;
  const rowDelimiter = envDelimiter(env.ELASTIC_MATRIX_ROW_DELIMITER);
  if (rowDelimiter !== undefined) render.rowDelimiter = rowDelimiter;
  const absentMarker = env.ELASTIC_MATRIX_ABSENT_MARKER;
  if (absentMarker !== undefined) render.absentMarker = absentMarker;
  const padCells = envBool(env.ELASTIC_MATRIX_PAD_CELLS);
  if (padCells !== undefined) render.padCells = padCells;

  return { logLevel, render };
}

export function createMatrixOptions(config: ElasticMatrixConfig, destination?: DestinationStream): ElasticMatrixOptions {
  return {
    logger: createLogger(config.logLevel, destination),
    render: { ...config.render },
  };
}
