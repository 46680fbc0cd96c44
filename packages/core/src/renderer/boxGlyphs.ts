/**
 * packages/core/src/renderer/boxGlyphs.ts - Border glyph sets.
 *
 * Every style supplies the full set of eleven glyphs used by boxes, tables and
 * shaded boxes; partial styles are not representable.
 */

export type BoxStyleName = "light" | "heavy" | "double" | "rounded";

export type BoxGlyphSet = Readonly<{
  h: string;
  v: string;
  tl: string;
  tr: string;
  bl: string;
  br: string;
  /** T-junction opening downward, used on top borders. */
  tDown: string;
  /** T-junction opening upward, used on bottom borders. */
  tUp: string;
  /** T-junction opening right, used on left edges. */
  tRight: string;
  /** T-junction opening left, used on right edges. */
  tLeft: string;
  cross: string;
}>;

export const DEFAULT_BOX_STYLE: BoxStyleName = "light";

export const BOX_STYLES: Readonly<Record<BoxStyleName, BoxGlyphSet>> = Object.freeze({
  light: Object.freeze({
    h: "─",
    v: "│",
    tl: "┌",
    tr: "┐",
    bl: "└",
    br: "┘",
    tDown: "┬",
    tUp: "┴",
    tRight: "├",
    tLeft: "┤",
    cross: "┼",
  }),
  heavy: Object.freeze({
    h: "━",
    v: "┃",
    tl: "┏",
    tr: "┓",
    bl: "┗",
    br: "┛",
    tDown: "┳",
    tUp: "┻",
    tRight: "┣",
    tLeft: "┫",
    cross: "╋",
  }),
  double: Object.freeze({
    h: "═",
    v: "║",
    tl: "╔",
    tr: "╗",
    bl: "╚",
    br: "╝",
    tDown: "╦",
    tUp: "╩",
    tRight: "╠",
    tLeft: "╣",
    cross: "╬",
  }),
  rounded: Object.freeze({
    h: "─",
    v: "│",
    tl: "╭",
    tr: "╮",
    bl: "╰",
    br: "╯",
    tDown: "┬",
    tUp: "┴",
    tRight: "├",
    tLeft: "┤",
    cross: "┼",
  }),
});

export function isBoxStyleName(v: unknown): v is BoxStyleName {
  return v === "light" || v === "heavy" || v === "double" || v === "rounded";
}

/**
 * Look up a glyph set by name. Unknown names resolve to the light style.
 */
export function getBoxStyle(name: string | undefined): BoxGlyphSet {
  return isBoxStyleName(name) ? BOX_STYLES[name] : BOX_STYLES[DEFAULT_BOX_STYLE];
}
