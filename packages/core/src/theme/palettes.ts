/**
 * packages/core/src/theme/palettes.ts - Shading palettes, light to dark.
 */

export type PaletteName = "blocks" | "ascii" | "dots" | "braille" | "mixed";

export type Palette = readonly string[];

export const DEFAULT_PALETTE: PaletteName = "blocks";

export const PALETTES: Readonly<Record<PaletteName, Palette>> = Object.freeze({
  blocks: Object.freeze([" ", "░", "▒", "▓", "█"]),
  ascii: Object.freeze([" ", ".", ":", "-", "=", "+", "*", "#", "%", "@"]),
  dots: Object.freeze([" ", "·", "∙", "•", "●"]),
  braille: Object.freeze(["⠀", "⠁", "⠃", "⠇", "⡇", "⡏", "⡟", "⡿", "⣿"]),
  mixed: Object.freeze([" ", ".", ":", "░", "▒", "▓", "█"]),
});

export function isPaletteName(v: unknown): v is PaletteName {
  return typeof v === "string" && Object.prototype.hasOwnProperty.call(PALETTES, v);
}

/** Unknown names resolve to the default palette. */
export function getPalette(name: string | undefined): Palette {
  return isPaletteName(name) ? PALETTES[name] : PALETTES[DEFAULT_PALETTE];
}
