/**
 * packages/core/src/renderer/primitives.ts - Single-purpose line renderers.
 *
 * Boxes, title bars, the dashed outer frame, side comments and arrows. Every
 * function returns fresh lines; nothing here reads or writes shared state.
 */

import { charCount, center, indent, maxCharCount, padEnd, truncate } from "../layout/textMeasure.js";
import { ARROW, COMMENT_MARKER, FRAME, TITLE_RULE } from "./blockGlyphs.js";
import { type BoxGlyphSet, getBoxStyle } from "./boxGlyphs.js";

export type BoxRenderOptions = Readonly<{
  /** Total width including borders and padding (default: fit content) */
  width?: number | undefined;
  /** Blank cells between each vertical border and the content (default: 1) */
  padding?: number | undefined;
  /** Replace the top border midpoint with a downward T-junction */
  topConnector?: boolean | undefined;
  /** Replace the bottom border midpoint with an upward T-junction */
  bottomConnector?: boolean | undefined;
  style?: BoxGlyphSet | undefined;
}>;

export type RenderedBox = Readonly<{
  lines: readonly string[];
  /** Width shared by every line of the box. */
  width: number;
}>;

export type ArrowDirection = "down" | "up" | "left" | "right";

export const DEFAULT_BOX_PADDING = 1;

/**
 * Border row for a box of `total` cells. With a junction, the run between the
 * corners is split into floor((total - 3) / 2) cells on the left and the rest
 * on the right.
 */
function borderRow(
  total: number,
  leftCorner: string,
  rightCorner: string,
  h: string,
  junction: string | undefined,
): string {
  if (junction === undefined || total < 3) {
    return leftCorner + h.repeat(Math.max(0, total - 2)) + rightCorner;
  }
  const span = total - 3;
  const half = Math.floor(span / 2);
  const remainder = span - half;
  return leftCorner + h.repeat(half) + junction + h.repeat(remainder) + rightCorner;
}

export function renderBox(content: readonly string[], opts: BoxRenderOptions = {}): RenderedBox {
  const glyphs = opts.style ?? getBoxStyle(undefined);
  const padding = Math.max(0, opts.padding ?? DEFAULT_BOX_PADDING);
  const source = content.length > 0 ? content : [""];
  const innerWidth =
    opts.width === undefined ? maxCharCount(source) : Math.max(0, opts.width - 2 - 2 * padding);
  const total = innerWidth + 2 + 2 * padding;
  const gutter = " ".repeat(padding);

  const lines: string[] = [];
  lines.push(
    borderRow(total, glyphs.tl, glyphs.tr, glyphs.h, opts.topConnector ? glyphs.tDown : undefined),
  );
  for (const raw of source) {
    const text = center(truncate(raw, innerWidth), innerWidth);
    lines.push(`${glyphs.v}${gutter}${text}${gutter}${glyphs.v}`);
  }
  lines.push(
    borderRow(total, glyphs.bl, glyphs.br, glyphs.h, opts.bottomConnector ? glyphs.tUp : undefined),
  );
  return Object.freeze({ lines: Object.freeze(lines), width: total });
}

/** Interior row of `width` cells, used to stretch boxes to a common height. */
export function blankBoxRow(width: number, style?: BoxGlyphSet): string {
  const glyphs = style ?? getBoxStyle(undefined);
  return glyphs.v + " ".repeat(Math.max(0, width - 2)) + glyphs.v;
}

/**
 * One-line title bar: ` text ` centered on a rule of `width` cells.
 * A label that does not fit is returned bare.
 */
export function renderTitle(text: string, width: number): string {
  const label = ` ${text} `;
  if (charCount(label) >= width) return text;
  return center(label, width, TITLE_RULE);
}

/**
 * Dashed frame around `content`. Each content line is padded or truncated to
 * `innerWidth`, so every framed line is `innerWidth + 4` cells.
 */
export function renderFrame(content: readonly string[], innerWidth: number): readonly string[] {
  const inner = Math.max(0, innerWidth);
  const rule = FRAME.h.repeat(inner + 2);
  const blank = `${FRAME.v}${" ".repeat(inner + 2)}${FRAME.v}`;
  const out: string[] = [`${FRAME.tl}${rule}${FRAME.tr}`, blank];
  for (const line of content) {
    out.push(`${FRAME.v} ${padEnd(truncate(line, inner), inner)} ${FRAME.v}`);
  }
  out.push(blank, `${FRAME.bl}${rule}${FRAME.br}`);
  return Object.freeze(out);
}

/** Side annotation appended after a diagram line. */
export function renderComment(text: string): string {
  return `  ${COMMENT_MARKER} ${text}`;
}

/**
 * Arrow segment. Vertical arrows emit `length` stems plus the head at the
 * leading edge, each line indented by `x`; horizontal arrows are one line.
 */
export function renderArrow(direction: ArrowDirection, length: number, x = 0): readonly string[] {
  const n = Math.max(0, length);
  switch (direction) {
    case "down": {
      const stems = Array.from({ length: n }, () => indent(ARROW.stem, x));
      return Object.freeze([...stems, indent(ARROW.down, x)]);
    }
    case "up": {
      const stems = Array.from({ length: n }, () => indent(ARROW.stem, x));
      return Object.freeze([indent(ARROW.up, x), ...stems]);
    }
    case "right":
      return Object.freeze([indent(ARROW.shaft.repeat(n) + ARROW.right, x)]);
    case "left":
      return Object.freeze([indent(ARROW.left + ARROW.shaft.repeat(n), x)]);
  }
}
