import { padStart } from "../layout/textMeasure.js";
import { FULL_BLOCK, LIGHT_SHADE } from "../renderer/blockGlyphs.js";
import { clamp01 } from "./format.js";

export type ProgressOptions = Readonly<{
  /** Value at 100% (default: 100) */
  max?: number | undefined;
  /** Cells between the brackets (default: 20) */
  width?: number | undefined;
  /** Append the rounded percentage (default: true) */
  showPercent?: boolean | undefined;
  label?: string | undefined;
}>;

export const DEFAULT_PROGRESS_MAX = 100;
export const DEFAULT_PROGRESS_WIDTH = 20;

/** Completed fraction; a non-positive max reads as no progress. */
export function progressRatio(value: number, max: number): number {
  if (!(max > 0)) return 0;
  return clamp01(value / max);
}

export function renderProgress(value: number, opts: ProgressOptions = {}): string {
  const width = Math.max(0, opts.width ?? DEFAULT_PROGRESS_WIDTH);
  const ratio = progressRatio(value, opts.max ?? DEFAULT_PROGRESS_MAX);
  const filled = Math.floor(ratio * width);
  const bar = `[${FULL_BLOCK.repeat(filled)}${LIGHT_SHADE.repeat(width - filled)}]`;
  const label = opts.label !== undefined && opts.label.length > 0 ? `${opts.label} ` : "";
  const percent =
    (opts.showPercent ?? true) ? ` ${padStart(String(Math.round(ratio * 100)), 3)}%` : "";
  return label + bar + percent;
}
