export { Block } from "./block.js";
export {
  createMatrixOptions,
  loadMatrixConfigFromEnv,
  type ElasticMatrixConfig,
  type ElasticMatrixOptions,
} from "./config.js";
export { Coordinates } from "./coordinates.js";
export { ElasticMatrix, type Cell, type CellEquality, type CellValue } from "./elasticMatrix.js";
export {
  isMatrixIndexOutOfRangeError,
  MATRIX_INDEX_OUT_OF_RANGE_ERROR_NAME,
  MatrixIndexOutOfRangeError,
} from "./errors.js";
export { createLogger } from "./logger.js";
export { IndexRange } from "./range.js";
export {
  DEFAULT_RENDER_OPTIONS,
  renderColumns,
  RenderOptionsSchema,
  resolveRenderOptions,
  type RenderOptions,
} from "./render.js";
