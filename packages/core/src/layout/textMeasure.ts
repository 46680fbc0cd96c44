/**
 * packages/core/src/layout/textMeasure.ts - Monospace text measurement.
 *
 * Diagrams are written into a single spreadsheet column with a fixed-width
 * font, so every Unicode code point counts as one cell. All padding and
 * truncation in the renderers goes through these helpers rather than
 * String.prototype.padEnd, which counts UTF-16 code units.
 */

/** Number of monospace cells occupied by `text`. */
export function charCount(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}

/** Longest line in cells; 0 for an empty list. */
export function maxCharCount(lines: readonly string[]): number {
  let max = 0;
  for (const line of lines) {
    const n = charCount(line);
    if (n > max) max = n;
  }
  return max;
}

/** Keep at most `width` cells of `text`. */
export function truncate(text: string, width: number): string {
  if (width <= 0) return "";
  if (charCount(text) <= width) return text;
  return Array.from(text).slice(0, width).join("");
}

export function padEnd(text: string, width: number, fill = " "): string {
  const missing = width - charCount(text);
  return missing > 0 ? text + fill.repeat(missing) : text;
}

export function padStart(text: string, width: number, fill = " "): string {
  const missing = width - charCount(text);
  return missing > 0 ? fill.repeat(missing) + text : text;
}

/**
 * Split `pad` cells of free space around centered content. The left side gets
 * the smaller half on odd remainders.
 */
export function splitPad(pad: number): Readonly<{ left: number; right: number }> {
  const total = Math.max(0, pad);
  const left = Math.floor(total / 2);
  return { left, right: total - left };
}

/** Center `text` in `width` cells; text wider than `width` is returned unchanged. */
export function center(text: string, width: number, fill = " "): string {
  const { left, right } = splitPad(width - charCount(text));
  return fill.repeat(left) + text + fill.repeat(right);
}

export function indent(text: string, x: number): string {
  return x > 0 ? " ".repeat(x) + text : text;
}
