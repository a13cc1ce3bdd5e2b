/**
 * Row-major 2D store of cells.
 */

/**
 * Thrown when a flat cell list cannot be cut into rows of equal length.
 */
export class NotTableError extends Error {
  override readonly name = "NotTableError";

  constructor(ncells: number, nrows: number) {
    super(`${ncells} cells cannot be laid out in ${nrows} rows`);
  }
}

export class Table<T> {
  private cellList: T[];
  private rowCount: number;

  private constructor(cells: T[], nrows: number) {
    this.cellList = cells;
    this.rowCount = nrows;
  }

  /**
   * Build a table from row-major cells. `nrows` must divide `cells.length`.
   */
  static fromArray<T>(cells: T[], nrows: number): Table<T> {
    if (!Number.isInteger(nrows) || nrows <= 0 || cells.length % nrows !== 0) {
      throw new NotTableError(cells.length, nrows);
    }
    return new Table(cells, nrows);
  }

  static fromRows<T>(rows: T[][]): Table<T> {
    return Table.fromArray(rows.flat(), rows.length);
  }

  nrows(): number {
    return this.rowCount;
  }

  ncols(): number {
    return this.cellList.length / this.rowCount;
  }

  ncells(): number {
    return this.cellList.length;
  }

  cells(): readonly T[] {
    return this.cellList;
  }

  get(rowIdx: number, colIdx: number): T | undefined {
    const ncols = this.ncols();
    if (rowIdx < 0 || rowIdx >= this.rowCount || colIdx < 0 || colIdx >= ncols) {
      return undefined;
    }
    return this.cellList[rowIdx * ncols + colIdx];
  }

  row(rowIdx: number): readonly T[] | undefined {
    if (rowIdx < 0 || rowIdx >= this.rowCount) return undefined;
    const ncols = this.ncols();
    return this.cellList.slice(rowIdx * ncols, (rowIdx + 1) * ncols);
  }

  map<U>(fn: (cell: T, rowIdx: number, colIdx: number) => U): Table<U> {
    const ncols = this.ncols();
    const mapped = this.cellList.map((cell, k) => fn(cell, Math.floor(k / ncols), k % ncols));
    return new Table(mapped, this.rowCount);
  }

  /**
   * Transpose in place. Cell k of an r x c table lands at (k mod c, floor(k / c))
   * of the c x r result.
   */
  transpose(): void {
    const nrows = this.rowCount;
    const ncols = this.ncols();
    if (ncols === 0) {
      throw new RangeError("cannot transpose a table without columns");
    }
    const transposed = new Array<T>(this.cellList.length);
    this.cellList.forEach((cell, k) => {
      const targetRow = k % ncols;
      const targetCol = Math.floor(k / ncols);
      transposed[targetRow * nrows + targetCol] = cell;
    });
    this.cellList = transposed;
    this.rowCount = ncols;
  }
}
