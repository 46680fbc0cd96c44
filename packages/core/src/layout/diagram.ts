/**
 * packages/core/src/layout/diagram.ts - Diagram layout engine.
 *
 * Single top-to-bottom pass over the element list. Each element renders into
 * lines which are indented by the element's `x`, or centered against the
 * diagram's inner width when `x` is 0 for boxes, rows and vertical arrows.
 * A box peeks at the element after it: a following downward arrow gives the
 * box a bottom connector so the arrow leaves through the border.
 *
 * Rendering is a pure function of (elements, options); no state survives a call.
 */

import type { BoxElement, DiagramElement } from "../elements/types.js";
import { getBoxStyle } from "../renderer/boxGlyphs.js";
import { renderBoxRow } from "../renderer/boxRow.js";
import {
  renderArrow,
  renderBox,
  renderComment,
  renderFrame,
  renderTitle,
} from "../renderer/primitives.js";
import { indentLines, renderBarChart, renderVerticalBarChart } from "../widgets/barChart.js";
import { renderProgress } from "../widgets/progress.js";
import { renderShadedBox } from "../widgets/shadedBox.js";
import { renderSparkline } from "../widgets/sparkline.js";
import { renderTable } from "../widgets/table.js";
import { indent } from "./textMeasure.js";

export type DiagramOptions = Readonly<{
  /** Total diagram width in cells, frame included (default: 60) */
  width?: number | undefined;
  /** Wrap the result in a dashed frame (default: false) */
  frame?: boolean | undefined;
}>;

export const DEFAULT_DIAGRAM_WIDTH = 60;

/** Cells the frame adds around its content: border plus one space per side. */
const FRAME_CHROME = 4;

const NO_LINES: readonly string[] = Object.freeze([]);

/**
 * One position in the element list. `undefined` marks an element that was
 * skipped during validation: it draws nothing but still sits between its
 * neighbours for the lookahead.
 */
export type DiagramSlot = DiagramElement | undefined;

function peek(slots: readonly DiagramSlot[], index: number): DiagramSlot {
  return index + 1 < slots.length ? slots[index + 1] : undefined;
}

function isDownArrow(element: DiagramSlot): boolean {
  return element?.type === "arrow" && (element.direction ?? "down") === "down";
}

/** Left offset that centers `width` cells on the diagram's center column. */
function centeredOffset(width: number, innerWidth: number): number {
  if (width >= innerWidth) return 0;
  return Math.max(0, Math.floor(innerWidth / 2) - Math.floor(width / 2));
}

function layoutBox(
  element: BoxElement,
  next: DiagramSlot,
  innerWidth: number,
): readonly string[] {
  const x = element.x ?? 0;
  const box = renderBox(element.lines, {
    width: element.width,
    padding: element.padding,
    topConnector: element.topConnector,
    bottomConnector: element.bottomConnector === true || isDownArrow(next),
    style: getBoxStyle(element.boxStyle),
  });

  const lines = [...box.lines];
  if (element.comment !== undefined && x === 0) {
    const contentRows = Math.max(1, element.lines.length);
    const target = 1 + Math.floor(contentRows / 2);
    lines[target] = (lines[target] ?? "") + renderComment(element.comment);
  }

  const offset = x === 0 ? centeredOffset(box.width, innerWidth) : x;
  return lines.map((line) => indent(line, offset));
}

function layoutElement(
  element: DiagramElement,
  next: DiagramSlot,
  innerWidth: number,
): readonly string[] {
  switch (element.type) {
    case "title":
      return [renderTitle(element.text, innerWidth)];
    case "row": {
      const row = renderBoxRow(element.boxes, {
        spacing: element.spacing,
        merge: element.merge,
        style: getBoxStyle(element.boxStyle),
      });
      const offset = row.width < innerWidth ? Math.floor((innerWidth - row.width) / 2) : 0;
      return indentLines(row.lines, offset);
    }
    case "box":
      return layoutBox(element, next, innerWidth);
    case "spacer":
      return [""];
    case "text": {
      const comment = element.comment !== undefined ? renderComment(element.comment) : "";
      return [indent(element.text, element.x ?? 0) + comment];
    }
    case "arrow": {
      const direction = element.direction ?? "down";
      const x = element.x ?? 0;
      const vertical = direction === "down" || direction === "up";
      const column = vertical && x === 0 ? Math.floor(innerWidth / 2) : x;
      return renderArrow(direction, element.length ?? 1, column);
    }
    case "bar_chart":
      return indentLines(
        renderBarChart(element.data, {
          barWidth: element.barWidth,
          showValues: element.showValues,
          labelWidth: element.labelWidth,
        }),
        element.x ?? 0,
      );
    case "bar_chart_vertical":
      return indentLines(
        renderVerticalBarChart(element.data, {
          barHeight: element.barHeight,
          barWidth: element.barWidth,
          showValues: element.showValues,
          gap: element.gap,
        }),
        element.x ?? 0,
      );
    case "sparkline": {
      if (element.data.length === 0) return NO_LINES;
      const spark = renderSparkline(element.data);
      const line = element.label !== undefined ? `${element.label} ${spark}` : spark;
      return [indent(line, element.x ?? 0)];
    }
    case "progress":
      return [
        indent(
          renderProgress(element.value, {
            max: element.max,
            width: element.width,
            showPercent: element.showPercent,
            label: element.label,
          }),
          element.x ?? 0,
        ),
      ];
    case "shaded_box":
      return indentLines(
        renderShadedBox({
          width: element.width,
          height: element.height,
          title: element.title,
          palette: element.palette,
          direction: element.direction,
          contrast: element.contrast,
          boxStyle: element.boxStyle,
        }),
        element.x ?? 0,
      );
    case "table":
      return indentLines(
        renderTable(element.headers, element.rows, { boxStyle: element.boxStyle }),
        element.x ?? 0,
      );
    default:
      // Untyped callers can still pass unknown kinds; they draw nothing.
      return NO_LINES;
  }
}

/** Render `elements` into diagram lines, top to bottom. */
export function renderDiagram(
  elements: readonly DiagramElement[],
  opts: DiagramOptions = {},
): readonly string[] {
  return renderDiagramSlots(elements, opts);
}

/** renderDiagram() over a list that may hold skipped positions. */
export function renderDiagramSlots(
  slots: readonly DiagramSlot[],
  opts: DiagramOptions = {},
): readonly string[] {
  const width = Math.max(0, opts.width ?? DEFAULT_DIAGRAM_WIDTH);
  const frame = opts.frame === true;
  const innerWidth = frame ? Math.max(0, width - FRAME_CHROME) : width;

  const lines: string[] = [];
  for (let i = 0; i < slots.length; i++) {
    const element = slots[i];
    if (element === undefined) continue;
    lines.push(...layoutElement(element, peek(slots, i), innerWidth));
  }
  return frame ? renderFrame(lines, innerWidth) : Object.freeze(lines);
}

/** renderDiagram() joined into one newline-separated block. */
export function renderDiagramText(
  elements: readonly DiagramElement[],
  opts: DiagramOptions = {},
): string {
  return renderDiagram(elements, opts).join("\n");
}
