/**
 * Line-count cost of a column at a candidate width.
 */

import type { Table } from "../table/table.js";
import { tryWrap } from "../wrap/wrap-engine.js";
import type { WrapOptionsVarWidths } from "../wrap/wrap-options.js";
import { LineCounts } from "./line-counts.js";

export class ColumnCostEvaluator {
  private readonly table: Table<string>;
  private readonly options: WrapOptionsVarWidths;
  private wraps = 0;

  /**
   * @param transposedTable - column-major table: row `j` holds column `j`
   */
  constructor(transposedTable: Table<string>, options: WrapOptionsVarWidths) {
    this.table = transposedTable;
    this.options = options;
  }

  /** Number of rows of the untransposed table. */
  get nrows(): number {
    return this.table.ncols();
  }

  /** Column wraps performed so far. */
  get evaluations(): number {
    return this.wraps;
  }

  /**
   * Display widths of the wrapped lines of every cell in the column.
   */
  wrapColumn(colIdx: number, width: number): number[][] {
    const column = this.table.row(colIdx);
    if (!column) {
      throw new RangeError(`column ${colIdx} out of range`);
    }
    this.wraps++;
    const opts = this.options.asWidth(width);
    return column.map((text) => tryWrap(text, opts));
  }

  /**
   * Lines taken by each cell of the column at `width`. A width the planner
   * proposes (`userDefined` false) that lets any line overflow is infeasible.
   */
  cost(colIdx: number, width: number, userDefined: boolean): LineCounts {
    const wrapped = this.wrapColumn(colIdx, width);
    if (!userDefined && wrapped.some((lines) => lines.some((w) => w > width))) {
      return LineCounts.infinite();
    }
    return LineCounts.of(wrapped.map((lines) => lines.length));
  }

  /**
   * First row whose wrapped lines overflow `width`, if any.
   */
  firstOverflowRow(colIdx: number, width: number): number | undefined {
    const rowIdx = this.wrapColumn(colIdx, width).findIndex((lines) => lines.some((w) => w > width));
    return rowIdx < 0 ? undefined : rowIdx;
  }
}
