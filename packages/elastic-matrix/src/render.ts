import { z } from "zod";

export const RenderOptionsSchema = z
  .object({
    /** Placed between the cells of a row. */
    cellDelimiter: z.string(),
    /** Placed between rows. */
    rowDelimiter: z.string(),
    /** Rendering of an absent cell. */
    absentMarker: z.string(),
    /**
     * Right-pad every cell with spaces to the widest rendering in its column, so columns line up
     * when rows are separated by newlines.
     */
    padCells: z.boolean(),
  })
  .strict();

export type RenderOptions = z.infer<typeof RenderOptionsSchema>;

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = Object.freeze({
  cellDelimiter: " ",
  rowDelimiter: "\n",
  absentMarker: "",
  padCells: true,
});

const RenderOverridesSchema = RenderOptionsSchema.partial();

export function resolveRenderOptions(...layers: Array<Partial<RenderOptions> | undefined>): RenderOptions {
  let resolved: RenderOptions = { ...DEFAULT_RENDER_OPTIONS };
  for (const layer of layers) {
    if (!layer) continue;
    const parsed = RenderOverridesSchema.parse(layer);
    resolved = {
      cellDelimiter: parsed.cellDelimiter ?? resolved.cellDelimiter,
      rowDelimiter: parsed.rowDelimiter ?? resolved.rowDelimiter,
      absentMarker: parsed.absentMarker ?? resolved.absentMarker,
      padCells: parsed.padCells ?? resolved.padCells,
    };
  }
  return resolved;
}

/**
 * Renders column-major cells as text, one line per row.
 *
 * Each rendered row has its trailing whitespace stripped, and so does the whole result.
 */
export function renderColumns<T>(columns: ReadonlyArray<ReadonlyArray<T | null>>, options: RenderOptions): string {
  const rowCount = columns[0]?.length ?? 0;
  const texts = columns.map((column) => column.map((cell) => (cell === null ? options.absentMarker : String(cell))));

  if (options.padCells) {
    for (const column of texts) {
      const width = column.reduce((max, text) => Math.max(max, text.length), 0);
      for (let y = 0; y < column.length; y++) {
        column[y] = column[y].padEnd(width, " ");
      }
    }
  }

  const lines: string[] = [];
  for (let y = 0; y < rowCount; y++) {
    lines.push(texts.map((column) => column[y]).join(options.cellDelimiter).trimEnd());
  }
  return lines.join(options.rowDelimiter).trimEnd();
}
