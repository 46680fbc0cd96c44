/**
 * packages/core/src/renderer/boxRow.ts - Side-by-side boxes with an optional merge trunk.
 *
 * Boxes are stretched to the tallest one by inserting blank interior rows just
 * above each bottom border. With `merge`, three extra lines join every box
 * center into a single trunk at the midpoint of the whole span:
 *
 *   │      │      │
 *   └──────┬──────┘
 *          │
 */

import { MERGE } from "./blockGlyphs.js";
import type { BoxGlyphSet } from "./boxGlyphs.js";
import { type RenderedBox, blankBoxRow, renderBox } from "./primitives.js";

export type BoxRowOptions = Readonly<{
  /** Blank columns between adjacent boxes (default: 2) */
  spacing?: number | undefined;
  /** Join box bottoms into one center trunk (default: false) */
  merge?: boolean | undefined;
  style?: BoxGlyphSet | undefined;
}>;

export type RenderedBoxRow = Readonly<{
  lines: readonly string[];
  /** Width of the box band (merge lines never extend past it). */
  width: number;
}>;

export const DEFAULT_ROW_SPACING = 2;

function stretchBox(box: RenderedBox, height: number, style: BoxGlyphSet | undefined): string[] {
  const lines = [...box.lines];
  const missing = height - lines.length;
  if (missing <= 0) return lines;
  const bottom = lines.pop() ?? "";
  for (let i = 0; i < missing; i++) lines.push(blankBoxRow(box.width, style));
  lines.push(bottom);
  return lines;
}

/** Horizontal center of each box within the joined row. */
export function boxCenters(widths: readonly number[], spacing: number): readonly number[] {
  const centers: number[] = [];
  let offset = 0;
  for (const width of widths) {
    centers.push(offset + Math.floor(width / 2));
    offset += width + spacing;
  }
  return Object.freeze(centers);
}

/**
 * Merge connector lines for the given centers: one stem per box, a horizontal
 * run from the first center to the last with a single junction at the span
 * midpoint, and the trunk leaving that junction.
 */
export function mergeLines(centers: readonly number[]): readonly string[] {
  const first = centers[0];
  const last = centers[centers.length - 1];
  if (first === undefined || last === undefined || centers.length < 2) {
    return Object.freeze([]);
  }

  const stems = Array.from({ length: last + 1 }, () => " ");
  for (const c of centers) stems[c] = MERGE.v;

  const mid = Math.floor((first + last) / 2);
  const run: string[] = Array.from({ length: last + 1 }, (_, i) => (i < first ? " " : MERGE.h));
  run[first] = MERGE.left;
  run[last] = MERGE.right;
  run[mid] = MERGE.junction;

  return Object.freeze([stems.join(""), run.join(""), " ".repeat(mid) + MERGE.v]);
}

export function renderBoxRow(
  boxes: readonly (readonly string[])[],
  opts: BoxRowOptions = {},
): RenderedBoxRow {
  if (boxes.length === 0) return Object.freeze({ lines: Object.freeze([]), width: 0 });

  const spacing = Math.max(0, opts.spacing ?? DEFAULT_ROW_SPACING);
  const rendered = boxes.map((content) => renderBox(content, { style: opts.style }));
  const height = Math.max(...rendered.map((box) => box.lines.length));
  const columns = rendered.map((box) => stretchBox(box, height, opts.style));
  const gap = " ".repeat(spacing);

  const lines: string[] = [];
  for (let row = 0; row < height; row++) {
    lines.push(columns.map((column) => column[row] ?? "").join(gap));
  }

  const widths = rendered.map((box) => box.width);
  const width = widths.reduce((sum, w) => sum + w, 0) + spacing * (widths.length - 1);

  if (opts.merge === true && rendered.length >= 2) {
    lines.push(...mergeLines(boxCenters(widths, spacing)));
  }
  return Object.freeze({ lines: Object.freeze(lines), width });
}
