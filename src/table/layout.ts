/**
 * Wrap a row-major table at planned widths and pad it for rendering.
 */

import { ColumnNotWideEnoughError } from "../errors.js";
import { displayWidth, wrapText } from "../wrap/wrap-engine.js";
import type { WrapOptionsVarWidths } from "../wrap/wrap-options.js";
import type { Table } from "./table.js";

function widthAt(widths: readonly number[], colIdx: number): number {
  const width = widths[colIdx];
  if (width === undefined) {
    throw new RangeError(`no width for column ${colIdx}`);
  }
  return width;
}

/**
 * Wrap every cell. The result holds the wrapped lines of each cell.
 */
export function wrapTable(
  table: Table<string>,
  widths: readonly number[],
  options: WrapOptionsVarWidths,
): Table<string[]> {
  return table.map((text, _rowIdx, colIdx) => wrapText(text, options.asWidth(widthAt(widths, colIdx))));
}

/**
 * Throw for the first cell of the row with a line wider than its column.
 */
export function ensureRowWithinWidths(
  rowIdx: number,
  wrappedRow: readonly (readonly string[])[],
  widths: readonly number[],
): void {
  wrappedRow.forEach((lines, colIdx) => {
    const width = widthAt(widths, colIdx);
    if (lines.some((line) => displayWidth(line) > width)) {
      throw new ColumnNotWideEnoughError({ row: rowIdx, column: colIdx });
    }
  });
}

/**
 * Pad every line to `width` and add blank lines up to `maxLines`. Lines that
 * are already too wide are left as they are.
 */
export function fillCell(lines: readonly string[], width: number, maxLines: number): string[] {
  const filled = lines.map((line) => line + " ".repeat(Math.max(0, width - displayWidth(line))));
  while (filled.length < maxLines) {
    filled.push(" ".repeat(width));
  }
  return filled;
}

/**
 * Fill every cell so that all cells of a row have the row's height.
 */
export function fillTable(table: Table<string[]>, widths: readonly number[]): Table<string[]> {
  const rowHeights = Array.from({ length: table.nrows() }, (_, rowIdx) =>
    (table.row(rowIdx) ?? []).reduce((max, lines) => Math.max(max, lines.length), 0),
  );
  return table.map((lines, rowIdx, colIdx) =>
    fillCell(lines, widthAt(widths, colIdx), rowHeights[rowIdx] ?? lines.length),
  );
}
