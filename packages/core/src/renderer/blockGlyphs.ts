/**
 * packages/core/src/renderer/blockGlyphs.ts - Block ramps and fixed glyphs.
 */

/** Horizontal fill ramp, full block down to one eighth. A remainder r uses index 8 - r. */
export const FILL_RAMP = Object.freeze(["█", "▉", "▊", "▋", "▌", "▍", "▎", "▏"]);

/** Vertical ramp, one eighth up to a full block. */
export const SPARK_RAMP = Object.freeze(["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"]);

/** Ramp index drawn for a series with no spread. */
export const SPARK_FLAT_INDEX = 4;

export const FULL_BLOCK = "█";
export const LIGHT_SHADE = "░";

export const ARROW = Object.freeze({
  down: "▼",
  up: "▲",
  left: "◀",
  right: "▶",
  stem: "│",
  shaft: "─",
});

export const MERGE = Object.freeze({
  v: "│",
  h: "─",
  left: "└",
  right: "┘",
  junction: "┬",
});

export const FRAME = Object.freeze({
  tl: "┌",
  tr: "┐",
  bl: "└",
  br: "┘",
  h: "╌",
  v: "╎",
});

export const TITLE_RULE = "═";
export const BASELINE = "─";
export const COMMENT_MARKER = "←";
