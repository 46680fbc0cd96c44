/**
 * packages/core/src/elements/el.ts - Element factory functions.
 *
 * Builds typed diagram elements without spelling out the discriminated union
 * by hand.
 */

import type { BarDatum } from "../widgets/barChart.js";
import type {
  ArrowElement,
  BarChartElement,
  BoxElement,
  DiagramElement,
  ProgressElement,
  RowElement,
  ShadedBoxElement,
  SparklineElement,
  TableElement,
  TextElement,
  TitleElement,
  VerticalBarChartElement,
} from "./types.js";

type BoxContentInput = string | readonly string[];

/** Multi-line strings become one box line per `\n`. */
export function toBoxLines(content: BoxContentInput): readonly string[] {
  return typeof content === "string" ? Object.freeze(content.split("\n")) : content;
}

function title(text: string): TitleElement {
  return { type: "title", text };
}

/**
 * Create a bordered box.
 *
 * @example
 * ```ts
 * el.box("API gateway")
 * el.box(["Worker", "x4"], { comment: "autoscaled" })
 * el.box("Queue", { x: 4, width: 16 })
 * ```
 */
function box(
  content: BoxContentInput,
  props: Omit<BoxElement, "type" | "lines"> = {},
): BoxElement {
  return { type: "box", lines: toBoxLines(content), ...props };
}

/**
 * Create a row of boxes, optionally merged into one trunk below.
 *
 * @example
 * ```ts
 * el.row(["web", "mobile", "cli"], { merge: true })
 * ```
 */
function row(
  boxes: readonly BoxContentInput[],
  props: Omit<RowElement, "type" | "boxes"> = {},
): RowElement {
  return { type: "row", boxes: Object.freeze(boxes.map(toBoxLines)), ...props };
}

function text(value: string, props: Omit<TextElement, "type" | "text"> = {}): TextElement {
  return { type: "text", text: value, ...props };
}

function spacer(): DiagramElement {
  return { type: "spacer" };
}

function arrow(props: Omit<ArrowElement, "type"> = {}): ArrowElement {
  return { type: "arrow", ...props };
}

function barChart(
  data: readonly BarDatum[],
  props: Omit<BarChartElement, "type" | "data"> = {},
): BarChartElement {
  return { type: "bar_chart", data, ...props };
}

function verticalBarChart(
  data: readonly BarDatum[],
  props: Omit<VerticalBarChartElement, "type" | "data"> = {},
): VerticalBarChartElement {
  return { type: "bar_chart_vertical", data, ...props };
}

function sparkline(
  data: readonly number[],
  props: Omit<SparklineElement, "type" | "data"> = {},
): SparklineElement {
  return { type: "sparkline", data, ...props };
}

function progress(
  value: number,
  props: Omit<ProgressElement, "type" | "value"> = {},
): ProgressElement {
  return { type: "progress", value, ...props };
}

function shadedBox(props: Omit<ShadedBoxElement, "type"> = {}): ShadedBoxElement {
  return { type: "shaded_box", ...props };
}

function table(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  props: Omit<TableElement, "type" | "headers" | "rows"> = {},
): TableElement {
  return { type: "table", headers, rows, ...props };
}

export const el = {
  title,
  box,
  row,
  text,
  spacer,
  arrow,
  barChart,
  verticalBarChart,
  sparkline,
  progress,
  shadedBox,
  table,
} as const;
