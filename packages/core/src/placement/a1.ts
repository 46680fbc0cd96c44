/**
 * packages/core/src/placement/a1.ts - A1 anchor parsing.
 *
 * A diagram is written downward from a single anchor cell. Anchors accept an
 * optional sheet prefix (`Sheet1!B3`, `'My sheet'!B3`); a bare column means
 * row 1 and a bare row means column A. Indices are zero-based.
 */

import { CellsketchError } from "../errors.js";

export type GridAnchor = Readonly<{
  sheetName?: string | undefined;
  row: number;
  column: number;
}>;

const CELL_RE = /^([A-Za-z]*)(\d*)$/;

/** Column letters to a zero-based index: A=0, Z=25, AA=26. */
export function columnToIndex(column: string): number {
  let result = 0;
  for (const ch of column.toUpperCase()) {
    result = result * 26 + (ch.charCodeAt(0) - 64);
  }
  return result - 1;
}

/** Zero-based index to column letters: 0=A, 26=AA. */
export function indexToColumn(index: number): string {
  let n = Math.trunc(index) + 1;
  let out = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

function unquoteSheetName(name: string): string {
  if (name.length >= 2 && name.startsWith("'") && name.endsWith("'")) {
    return name.slice(1, -1).replace(/''/g, "'");
  }
  return name;
}

export function parseA1Anchor(a1: string): GridAnchor {
  const trimmed = a1.trim();
  const bang = trimmed.lastIndexOf("!");
  const sheetName = bang >= 0 ? unquoteSheetName(trimmed.slice(0, bang)) : undefined;
  const cell = bang >= 0 ? trimmed.slice(bang + 1) : trimmed;
  // A range anchors at its first cell.
  const start = cell.split(":")[0] ?? "";

  const m = CELL_RE.exec(start);
  const letters = m?.[1] ?? "";
  const digits = m?.[2] ?? "";
  if (m === null || (letters.length === 0 && digits.length === 0)) {
    throw new CellsketchError("CSK_INVALID_ANCHOR", `Invalid A1 anchor: "${a1}"`);
  }
  const rowNumber = digits.length > 0 ? Number.parseInt(digits, 10) : 1;
  if (rowNumber < 1) {
    throw new CellsketchError("CSK_INVALID_ANCHOR", `Invalid A1 anchor: "${a1}" (rows start at 1)`);
  }
  return {
    sheetName: sheetName !== undefined && sheetName.length > 0 ? sheetName : undefined,
    row: rowNumber - 1,
    column: letters.length > 0 ? columnToIndex(letters) : 0,
  };
}
