/**
 * packages/core/src/placement/requests.ts - Sheets batchUpdate requests for a diagram.
 *
 * Builds the request bodies that write one diagram line per row into a single
 * column, switch it to a monospace font, size the column and rows, and
 * optionally hide gridlines. Nothing here talks to the network; the caller
 * sends `requests` in one batchUpdate.
 */

import { maxCharCount } from "../layout/textMeasure.js";
import type { GridAnchor } from "./a1.js";

export type PlacementOptions = Readonly<{
  sheetId: number;
  anchor: GridAnchor;
  /** Default: "Roboto Mono" */
  fontFamily?: string | undefined;
  /** Points (default: 10) */
  fontSize?: number | undefined;
  /** Default: 18 */
  rowHeightPx?: number | undefined;
  /** Pixels per monospace cell (default: 8) */
  charWidthPx?: number | undefined;
  /** Extra column pixels beyond the longest line (default: 12) */
  paddingPx?: number | undefined;
  /** Default: true */
  hideGridlines?: boolean | undefined;
}>;

export type GridRange = Readonly<{
  sheetId: number;
  startRowIndex: number;
  endRowIndex: number;
  startColumnIndex: number;
  endColumnIndex: number;
}>;

export type DimensionRange = Readonly<{
  sheetId: number;
  dimension: "ROWS" | "COLUMNS";
  startIndex: number;
  endIndex: number;
}>;

export type SheetsRequest =
  | Readonly<{
      updateCells: Readonly<{
        start: Readonly<{ sheetId: number; rowIndex: number; columnIndex: number }>;
        rows: readonly Readonly<{
          values: readonly Readonly<{ userEnteredValue: Readonly<{ stringValue: string }> }>[];
        }>[];
        fields: "userEnteredValue";
      }>;
    }>
  | Readonly<{
      repeatCell: Readonly<{
        range: GridRange;
        cell: Readonly<{
          userEnteredFormat: Readonly<{
            textFormat: Readonly<{ fontFamily: string; fontSize: number }>;
            wrapStrategy: "OVERFLOW_CELL";
          }>;
        }>;
        fields: string;
      }>;
    }>
  | Readonly<{
      updateDimensionProperties: Readonly<{
        range: DimensionRange;
        properties: Readonly<{ pixelSize: number }>;
        fields: "pixelSize";
      }>;
    }>
  | Readonly<{
      updateSheetProperties: Readonly<{
        properties: Readonly<{ sheetId: number; gridProperties: Readonly<{ hideGridlines: boolean }> }>;
        fields: "gridProperties.hideGridlines";
      }>;
    }>;

export const DEFAULT_FONT_FAMILY = "Roboto Mono";
export const DEFAULT_FONT_SIZE = 10;
export const DEFAULT_ROW_HEIGHT_PX = 18;
export const DEFAULT_CHAR_WIDTH_PX = 8;
export const DEFAULT_COLUMN_PADDING_PX = 12;

/** Column width that fits the longest line. */
export function columnWidthPx(
  lines: readonly string[],
  charWidthPx = DEFAULT_CHAR_WIDTH_PX,
  paddingPx = DEFAULT_COLUMN_PADDING_PX,
): number {
  return Math.ceil(maxCharCount(lines) * charWidthPx) + paddingPx;
}

export function buildPlacementRequests(
  lines: readonly string[],
  opts: PlacementOptions,
): readonly SheetsRequest[] {
  const { sheetId } = opts;
  const { row, column } = opts.anchor;
  const rowCount = Math.max(1, lines.length);

  const requests: SheetsRequest[] = [
    {
      updateCells: {
        start: { sheetId, rowIndex: row, columnIndex: column },
        rows: lines.map((line) => ({ values: [{ userEnteredValue: { stringValue: line } }] })),
        fields: "userEnteredValue",
      },
    },
    {
      repeatCell: {
        range: {
          sheetId,
          startRowIndex: row,
          endRowIndex: row + rowCount,
          startColumnIndex: column,
          endColumnIndex: column + 1,
        },
        cell: {
          userEnteredFormat: {
            textFormat: {
              fontFamily: opts.fontFamily ?? DEFAULT_FONT_FAMILY,
              fontSize: opts.fontSize ?? DEFAULT_FONT_SIZE,
            },
            wrapStrategy: "OVERFLOW_CELL",
          },
        },
        fields: "userEnteredFormat(textFormat,wrapStrategy)",
      },
    },
    {
      updateDimensionProperties: {
        range: { sheetId, dimension: "COLUMNS", startIndex: column, endIndex: column + 1 },
        properties: { pixelSize: columnWidthPx(lines, opts.charWidthPx, opts.paddingPx) },
        fields: "pixelSize",
      },
    },
    {
      updateDimensionProperties: {
        range: { sheetId, dimension: "ROWS", startIndex: row, endIndex: row + rowCount },
        properties: { pixelSize: opts.rowHeightPx ?? DEFAULT_ROW_HEIGHT_PX },
        fields: "pixelSize",
      },
    },
  ];

  if (opts.hideGridlines ?? true) {
    requests.push({
      updateSheetProperties: {
        properties: { sheetId, gridProperties: { hideGridlines: true } },
        fields: "gridProperties.hideGridlines",
      },
    });
  }
  return Object.freeze(requests);
}
