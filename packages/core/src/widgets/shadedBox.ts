/**
 * packages/core/src/widgets/shadedBox.ts - Gradient-shaded box.
 *
 * Each interior cell gets a raw shade in [0, 1] from a directional field, the
 * shade is pushed toward or away from 0.5 by the contrast curve, and the result
 * picks a character from a light-to-dark palette.
 */

import { center, truncate } from "../layout/textMeasure.js";
import { type BoxGlyphSet, getBoxStyle } from "../renderer/boxGlyphs.js";
import { type Palette, getPalette } from "../theme/palettes.js";
import { clamp01 } from "./format.js";

export type ShadeDirection = "horizontal" | "vertical" | "radial" | "diagonal" | "diagonal_reverse";

/** Shade at interior cell (x, y) of a width × height region, in [0, 1]. */
export type ShadeField = (x: number, y: number, width: number, height: number) => number;

export type ShadedBoxOptions = Readonly<{
  /** Interior width in cells (default: 20) */
  width?: number | undefined;
  /** Interior height in rows (default: 5) */
  height?: number | undefined;
  /** Label centered in the top border */
  title?: string | undefined;
  palette?: string | undefined;
  direction?: string | undefined;
  /** 0.5 leaves shades unchanged; lower flattens, higher sharpens (default: 0.5) */
  contrast?: number | undefined;
  boxStyle?: string | undefined;
}>;

export const DEFAULT_SHADE_WIDTH = 20;
export const DEFAULT_SHADE_HEIGHT = 5;
export const DEFAULT_CONTRAST = 0.5;

function ramp(position: number, size: number): number {
  return size > 1 ? position / (size - 1) : 0;
}

export const SHADE_FIELDS: Readonly<Record<ShadeDirection, ShadeField>> = Object.freeze({
  horizontal: (x, _y, w) => ramp(x, w),
  vertical: (_x, y, _w, h) => ramp(y, h),
  diagonal: (x, y, w, h) => (ramp(x, w) + ramp(y, h)) / 2,
  diagonal_reverse: (x, y, w, h) => (1 - ramp(x, w) + ramp(y, h)) / 2,
  radial: (x, y, w, h) => {
    const dx = (x - (w - 1) / 2) / (w / 2);
    const dy = (y - (h - 1) / 2) / (h / 2);
    return Math.min(1, Math.sqrt(dx * dx + dy * dy));
  },
});

export function isShadeDirection(v: unknown): v is ShadeDirection {
  return typeof v === "string" && Object.prototype.hasOwnProperty.call(SHADE_FIELDS, v);
}

/** Unknown directions resolve to the horizontal field. */
export function getShadeField(direction: string | undefined): ShadeField {
  return isShadeDirection(direction) ? SHADE_FIELDS[direction] : SHADE_FIELDS.horizontal;
}

/**
 * Contrast curve around the midpoint. Below 0.5 the distance from 0.5 is
 * scaled by `2 * contrast`; from 0.5 up it is scaled by `2 * (contrast - 0.5) + 1`.
 */
export function applyContrast(value: number, contrast: number): number {
  const factor = contrast < 0.5 ? 2 * contrast : 2 * (contrast - 0.5) + 1;
  return clamp01(0.5 + (value - 0.5) * factor);
}

export function paletteIndex(value: number, paletteLength: number): number {
  const top = Math.max(0, paletteLength - 1);
  const index = Math.floor(clamp01(value) * top);
  return Math.max(0, Math.min(top, index));
}

function shadeChar(palette: Palette, value: number): string {
  return palette[paletteIndex(value, palette.length)] ?? " ";
}

function topBorder(glyphs: BoxGlyphSet, width: number, title: string | undefined): string {
  if (title === undefined || title.length === 0) {
    return glyphs.tl + glyphs.h.repeat(width) + glyphs.tr;
  }
  const label = truncate(` ${title} `, width);
  return glyphs.tl + center(label, width, glyphs.h) + glyphs.tr;
}

export function renderShadedBox(opts: ShadedBoxOptions = {}): readonly string[] {
  const width = Math.max(1, opts.width ?? DEFAULT_SHADE_WIDTH);
  const height = Math.max(1, opts.height ?? DEFAULT_SHADE_HEIGHT);
  const glyphs = getBoxStyle(opts.boxStyle);
  const palette = getPalette(opts.palette);
  const field = getShadeField(opts.direction);
  const contrast = opts.contrast ?? DEFAULT_CONTRAST;

  const lines: string[] = [topBorder(glyphs, width, opts.title)];
  for (let y = 0; y < height; y++) {
    let row = "";
    for (let x = 0; x < width; x++) {
      row += shadeChar(palette, applyContrast(field(x, y, width, height), contrast));
    }
    lines.push(glyphs.v + row + glyphs.v);
  }
  lines.push(glyphs.bl + glyphs.h.repeat(width) + glyphs.br);
  return Object.freeze(lines);
}
