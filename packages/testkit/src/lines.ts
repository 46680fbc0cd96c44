import { AssertionError } from "node:assert";

function cellWidth(line: string): number {
  return Array.from(line).length;
}

function render(lines: readonly string[]): string {
  return lines.map((line, i) => `${String(i).padStart(3)} |${line}|`).join("\n");
}

/**
 * Compare diagram lines exactly, printing both blocks with row numbers and
 * edge markers so trailing spaces are visible on failure.
 */
export function assertLines(actual: readonly string[], expected: readonly string[]): void {
  const same =
    actual.length === expected.length && actual.every((line, i) => line === expected[i]);
  if (same) return;
  throw new AssertionError({
    message: `diagram lines differ\n--- actual\n${render(actual)}\n--- expected\n${render(expected)}`,
    actual,
    expected,
    operator: "assertLines",
  });
}

/** Every line has the same width in monospace cells. */
export function assertRectangular(lines: readonly string[]): void {
  const widths = lines.map(cellWidth);
  const first = widths[0];
  if (first === undefined || widths.every((w) => w === first)) return;
  throw new AssertionError({
    message: `expected rectangular block, got widths [${widths.join(", ")}]\n${render(lines)}`,
    actual: widths,
    expected: widths.map(() => first),
    operator: "assertRectangular",
  });
}
