import { SPARK_FLAT_INDEX, SPARK_RAMP } from "../renderer/blockGlyphs.js";

const TOP_LEVEL = SPARK_RAMP.length - 1;

/**
 * Ramp index per value after min-max normalization. A series with no spread
 * maps every value to the flat index.
 */
export function sparklineIndices(data: readonly number[]): readonly number[] {
  if (data.length === 0) return Object.freeze([]);
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of data) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const range = max - min;
  if (!(range > 0)) return Object.freeze(data.map(() => SPARK_FLAT_INDEX));
  return Object.freeze(
    data.map((value) => {
      const index = Math.floor(((value - min) / range) * TOP_LEVEL);
      return Math.max(0, Math.min(TOP_LEVEL, index));
    }),
  );
}

/** One glyph per value, no separators. */
export function renderSparkline(data: readonly number[]): string {
  return sparklineIndices(data)
    .map((index) => SPARK_RAMP[index] ?? "")
    .join("");
}
