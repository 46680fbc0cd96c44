/**
 * packages/core/src/elements/types.ts - Diagram element definitions.
 *
 * A diagram is an ordered list of elements rendered top to bottom. The union
 * is closed: the layout engine switches on `type` exhaustively, and untyped
 * input is narrowed into it by parseElements().
 */

import type { ArrowDirection } from "../renderer/primitives.js";
import type { BarDatum } from "../widgets/barChart.js";

export type TitleElement = Readonly<{
  type: "title";
  text: string;
}>;

export type BoxElement = Readonly<{
  type: "box";
  /** Content lines, centered inside the border */
  lines: readonly string[];
  /** Indent in cells; 0 centers the box in the diagram (default: 0) */
  x?: number | undefined;
  /** Total box width (default: fit content) */
  width?: number | undefined;
  padding?: number | undefined;
  /** Side annotation on the middle content line of a centered box */
  comment?: string | undefined;
  topConnector?: boolean | undefined;
  /** Also set automatically when the next element is a downward arrow */
  bottomConnector?: boolean | undefined;
  boxStyle?: string | undefined;
}>;

export type RowElement = Readonly<{
  type: "row";
  /** Content lines of each box, left to right */
  boxes: readonly (readonly string[])[];
  spacing?: number | undefined;
  /** Join box bottoms into one trunk below the row */
  merge?: boolean | undefined;
  boxStyle?: string | undefined;
}>;

export type TextElement = Readonly<{
  type: "text";
  text: string;
  x?: number | undefined;
  comment?: string | undefined;
}>;

export type SpacerElement = Readonly<{
  type: "spacer";
}>;

export type ArrowElement = Readonly<{
  type: "arrow";
  /** Default: "down" */
  direction?: ArrowDirection | undefined;
  /** Stem cells before the head (default: 1) */
  length?: number | undefined;
  /** Indent in cells; 0 centers vertical arrows (default: 0) */
  x?: number | undefined;
}>;

export type BarChartElement = Readonly<{
  type: "bar_chart";
  data: readonly BarDatum[];
  barWidth?: number | undefined;
  showValues?: boolean | undefined;
  labelWidth?: number | undefined;
  x?: number | undefined;
}>;

export type VerticalBarChartElement = Readonly<{
  type: "bar_chart_vertical";
  data: readonly BarDatum[];
  barHeight?: number | undefined;
  barWidth?: number | undefined;
  showValues?: boolean | undefined;
  gap?: number | undefined;
  x?: number | undefined;
}>;

export type SparklineElement = Readonly<{
  type: "sparkline";
  data: readonly number[];
  label?: string | undefined;
  x?: number | undefined;
}>;

export type ProgressElement = Readonly<{
  type: "progress";
  value: number;
  max?: number | undefined;
  width?: number | undefined;
  showPercent?: boolean | undefined;
  label?: string | undefined;
  x?: number | undefined;
}>;

export type ShadedBoxElement = Readonly<{
  type: "shaded_box";
  width?: number | undefined;
  height?: number | undefined;
  title?: string | undefined;
  palette?: string | undefined;
  direction?: string | undefined;
  contrast?: number | undefined;
  boxStyle?: string | undefined;
  x?: number | undefined;
}>;

export type TableElement = Readonly<{
  type: "table";
  headers: readonly string[];
  rows: readonly (readonly string[])[];
  boxStyle?: string | undefined;
  x?: number | undefined;
}>;

export type DiagramElement =
  | TitleElement
  | BoxElement
  | RowElement
  | TextElement
  | SpacerElement
  | ArrowElement
  | BarChartElement
  | VerticalBarChartElement
  | SparklineElement
  | ProgressElement
  | ShadedBoxElement
  | TableElement;

export type DiagramElementType = DiagramElement["type"];

export const ELEMENT_TYPES: readonly DiagramElementType[] = Object.freeze([
  "title",
  "box",
  "row",
  "text",
  "spacer",
  "arrow",
  "bar_chart",
  "bar_chart_vertical",
  "sparkline",
  "progress",
  "shaded_box",
  "table",
]);
