import { charCount, padEnd } from "../layout/textMeasure.js";
import { type BoxGlyphSet, getBoxStyle } from "../renderer/boxGlyphs.js";

export type TableOptions = Readonly<{
  boxStyle?: string | undefined;
}>;

/**
 * Width of each column: the longest of its header and every cell at that
 * position. Cells beyond the header count are ignored.
 */
export function tableColumnWidths(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
): readonly number[] {
  const widths = headers.map((header) => charCount(header));
  for (const row of rows) {
    for (let col = 0; col < widths.length; col++) {
      const n = charCount(row[col] ?? "");
      if (n > (widths[col] ?? 0)) widths[col] = n;
    }
  }
  return Object.freeze(widths);
}

function rule(
  widths: readonly number[],
  left: string,
  junction: string,
  right: string,
  glyphs: BoxGlyphSet,
): string {
  return left + widths.map((w) => glyphs.h.repeat(w + 2)).join(junction) + right;
}

function dataRow(cells: readonly string[], widths: readonly number[], glyphs: BoxGlyphSet): string {
  const padded = widths.map((w, col) => ` ${padEnd(cells[col] ?? "", w)} `);
  return glyphs.v + padded.join(glyphs.v) + glyphs.v;
}

export function renderTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  opts: TableOptions = {},
): readonly string[] {
  const glyphs = getBoxStyle(opts.boxStyle);
  const widths = tableColumnWidths(headers, rows);
  const lines = [
    rule(widths, glyphs.tl, glyphs.tDown, glyphs.tr, glyphs),
    dataRow(headers, widths, glyphs),
    rule(widths, glyphs.tRight, glyphs.cross, glyphs.tLeft, glyphs),
    ...rows.map((row) => dataRow(row, widths, glyphs)),
    rule(widths, glyphs.bl, glyphs.tUp, glyphs.br, glyphs),
  ];
  return Object.freeze(lines);
}
