/**
 * packages/core/src/widgets/barChart.ts - Horizontal and vertical bar charts.
 *
 * Bars are scaled against the dataset maximum in eighths of a cell, so a bar
 * of `cells` characters has `cells * 8` distinct lengths.
 */

import { center, indent, maxCharCount, padEnd, truncate } from "../layout/textMeasure.js";
import { BASELINE, FILL_RAMP, FULL_BLOCK, SPARK_RAMP } from "../renderer/blockGlyphs.js";
import { formatValue } from "./format.js";

export type BarDatum = Readonly<{ label: string; value: number }>;

export type BarChartOptions = Readonly<{
  /** Cells available to the longest bar (default: 20) */
  barWidth?: number | undefined;
  /** Print the value after each bar (default: true) */
  showValues?: boolean | undefined;
  /** Label column width (default: longest label) */
  labelWidth?: number | undefined;
}>;

export type VerticalBarChartOptions = Readonly<{
  /** Rows available to the tallest bar (default: 8) */
  barHeight?: number | undefined;
  /** Cells per column (default: 3) */
  barWidth?: number | undefined;
  /** Print each value above its column (default: true) */
  showValues?: boolean | undefined;
  /** Blank cells between columns (default: 1) */
  gap?: number | undefined;
}>;

export const DEFAULT_BAR_WIDTH = 20;
export const DEFAULT_BAR_HEIGHT = 8;
export const DEFAULT_COLUMN_WIDTH = 3;
export const DEFAULT_COLUMN_GAP = 1;

function maxValue(data: readonly BarDatum[]): number {
  let max = Number.NEGATIVE_INFINITY;
  for (const item of data) {
    if (item.value > max) max = item.value;
  }
  return max;
}

/** Filled eighths for `value` on a bar of `cells` characters. */
export function barEighths(value: number, max: number, cells: number): number {
  if (!(max > 0) || !Number.isFinite(value) || value <= 0 || cells <= 0) return 0;
  return Math.min(cells * 8, Math.floor((value / max) * cells * 8));
}

/** Full blocks followed by one partial glyph for the remainder. */
export function horizontalBar(eighths: number): string {
  const full = Math.floor(eighths / 8);
  const remainder = eighths % 8;
  const partial = remainder > 0 ? (FILL_RAMP[8 - remainder] ?? "") : "";
  return FULL_BLOCK.repeat(full) + partial;
}

export function renderBarChart(
  data: readonly BarDatum[],
  opts: BarChartOptions = {},
): readonly string[] {
  if (data.length === 0) return Object.freeze([]);
  const barWidth = Math.max(1, opts.barWidth ?? DEFAULT_BAR_WIDTH);
  const showValues = opts.showValues ?? true;
  const labelWidth = opts.labelWidth ?? maxCharCount(data.map((item) => item.label));
  const max = maxValue(data);

  const lines = data.map((item) => {
    const label = padEnd(truncate(item.label, labelWidth), labelWidth);
    const bar = horizontalBar(barEighths(item.value, max, barWidth));
    if (!showValues) return `${label} ${bar}`;
    return `${label} ${padEnd(bar, barWidth)} ${formatValue(item.value)}`;
  });
  return Object.freeze(lines);
}

/** Glyph for one cell of a vertical bar, `level` rows above the baseline. */
function columnCell(eighths: number, level: number): string {
  const filled = eighths - level * 8;
  if (filled >= 8) return FULL_BLOCK;
  if (filled > 0) return SPARK_RAMP[filled - 1] ?? FULL_BLOCK;
  return " ";
}

export function renderVerticalBarChart(
  data: readonly BarDatum[],
  opts: VerticalBarChartOptions = {},
): readonly string[] {
  if (data.length === 0) return Object.freeze([]);
  const barHeight = Math.max(1, opts.barHeight ?? DEFAULT_BAR_HEIGHT);
  const barWidth = Math.max(1, opts.barWidth ?? DEFAULT_COLUMN_WIDTH);
  const gap = " ".repeat(Math.max(0, opts.gap ?? DEFAULT_COLUMN_GAP));
  const showValues = opts.showValues ?? true;
  const max = maxValue(data);
  const eighths = data.map((item) => barEighths(item.value, max, barHeight));

  const lines: string[] = [];
  if (showValues) {
    lines.push(
      data.map((item) => center(truncate(formatValue(item.value), barWidth), barWidth)).join(gap),
    );
  }
  for (let row = 0; row < barHeight; row++) {
    const level = barHeight - 1 - row;
    lines.push(eighths.map((e) => columnCell(e, level).repeat(barWidth)).join(gap));
  }
  const span = data.length * barWidth + (data.length - 1) * gap.length;
  lines.push(BASELINE.repeat(span));
  lines.push(data.map((item) => center(truncate(item.label, barWidth), barWidth)).join(gap));
  return Object.freeze(lines);
}

/** Indent every chart line by `x` cells. */
export function indentLines(lines: readonly string[], x: number): readonly string[] {
  return x > 0 ? Object.freeze(lines.map((line) => indent(line, x))) : lines;
}
