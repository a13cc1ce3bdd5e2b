/**
 * Table renderers: turn a wrapped and filled table into text, and report how
 * many columns of width their borders and padding take.
 */

import { InvalidLayoutError } from "../errors.js";
import type { Table } from "../table/table.js";
import type { LayoutName } from "../types/index.js";

export interface TableRenderer {
  /** Width taken by the layout rather than the content, for a table of `ncols` columns */
  layoutWidth(ncols: number): number;
  /** Render a filled table; every cell of a row has the same number of lines */
  renderTable(filledTable: Table<string[]>, widths: readonly number[]): string;
}

export const LAYOUT_NAMES: readonly LayoutName[] = ["null", "plain", "grid_no_header", "grid"];

/**
 * Physical lines of one table row, each as the list of its cell segments.
 */
function physicalLines(filledTable: Table<string[]>, rowIdx: number, widths: readonly number[]): string[][] {
  const row = filledTable.row(rowIdx) ?? [];
  const height = row.reduce((max, lines) => Math.max(max, lines.length), 0);
  const lines: string[][] = [];
  for (let l = 0; l < height; l++) {
    lines.push(row.map((cell, colIdx) => cell[l] ?? " ".repeat(widths[colIdx] ?? 0)));
  }
  return lines;
}

/**
 * Renders nothing and takes no width. Used where only the planning matters.
 */
export class NullTableRenderer implements TableRenderer {
  layoutWidth(_ncols: number): number {
    return 0;
  }

  renderTable(_filledTable: Table<string[]>, _widths: readonly number[]): string {
    return "";
  }
}

/**
 * Cells separated by two spaces, no borders.
 */
export class PlainTableRenderer implements TableRenderer {
  private static readonly GAP = "  ";

  layoutWidth(ncols: number): number {
    return PlainTableRenderer.GAP.length * Math.max(0, ncols - 1);
  }

  renderTable(filledTable: Table<string[]>, widths: readonly number[]): string {
    const lines: string[] = [];
    for (let rowIdx = 0; rowIdx < filledTable.nrows(); rowIdx++) {
      for (const segments of physicalLines(filledTable, rowIdx, widths)) {
        lines.push(segments.join(PlainTableRenderer.GAP));
      }
    }
    return lines.join("\n");
  }
}

interface RuleGlyphs {
  left: string;
  fill: string;
  cross: string;
  right: string;
}

const TOP: RuleGlyphs = { left: "┌", fill: "─", cross: "┬", right: "┐" };
const MIDDLE: RuleGlyphs = { left: "├", fill: "─", cross: "┼", right: "┤" };
const HEADER: RuleGlyphs = { left: "╞", fill: "═", cross: "╪", right: "╡" };
const BOTTOM: RuleGlyphs = { left: "└", fill: "─", cross: "┴", right: "┘" };

/**
 * Box-drawing grid with one space of padding on each side of a cell. With
 * `header` set, the rule under the first row is doubled.
 */
export class GridTableRenderer implements TableRenderer {
  private readonly header: boolean;

  constructor(options: { header?: boolean } = {}) {
    this.header = options.header ?? false;
  }

  layoutWidth(ncols: number): number {
    return 3 * ncols + 1;
  }

  renderTable(filledTable: Table<string[]>, widths: readonly number[]): string {
    const lines: string[] = [this.createRule(TOP, widths)];
    const nrows = filledTable.nrows();
    for (let rowIdx = 0; rowIdx < nrows; rowIdx++) {
      for (const segments of physicalLines(filledTable, rowIdx, widths)) {
        lines.push(`│ ${segments.join(" │ ")} │`);
      }
      if (rowIdx < nrows - 1) {
        lines.push(this.createRule(this.header && rowIdx === 0 ? HEADER : MIDDLE, widths));
      }
    }
    lines.push(this.createRule(BOTTOM, widths));
    return lines.join("\n");
  }

  private createRule(glyphs: RuleGlyphs, widths: readonly number[]): string {
    const parts = widths.map((width) => glyphs.fill.repeat(width + 2));
    return `${glyphs.left}${parts.join(glyphs.cross)}${glyphs.right}`;
  }
}

function isLayoutName(name: string): name is LayoutName {
  return LAYOUT_NAMES.some((layout) => layout === name);
}

export function createTableRenderer(layout: string): TableRenderer {
  if (!isLayoutName(layout)) {
    throw new InvalidLayoutError(layout);
  }
  switch (layout) {
    case "null":
      return new NullTableRenderer();
    case "plain":
      return new PlainTableRenderer();
    case "grid_no_header":
      return new GridTableRenderer();
    case "grid":
      return new GridTableRenderer({ header: true });
  }
}
