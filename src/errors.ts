/**
 * Typed error hierarchy for tabwrap.
 * Every failure the planner, reader or CLI reports is a TabwrapError with a code.
 */

export const ErrorCode = {
  EMPTY_TABLE: "TABWRAP_EMPTY_TABLE",
  IO: "TABWRAP_IO",
  INVALID_INPUT: "TABWRAP_INVALID_INPUT",
  INVALID_ARGUMENT: "TABWRAP_INVALID_ARGUMENT",
  WIDTH_MISMATCH: "TABWRAP_WIDTH_MISMATCH",
  TOTAL_WIDTH: "TABWRAP_TOTAL_WIDTH",
  COLUMN_NOT_WIDE: "TABWRAP_COLUMN_NOT_WIDE",
  INVALID_LAYOUT: "TABWRAP_INVALID_LAYOUT",
  INTERNAL: "TABWRAP_INTERNAL",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface TabwrapErrorOptions {
  code?: ErrorCodeType;
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base class of all tabwrap errors.
 */
export class TabwrapError extends Error {
  override readonly name: string = "TabwrapError";
  readonly code: ErrorCodeType;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options?: TabwrapErrorOptions) {
    super(message, { cause: options?.cause });
    this.code = options?.code ?? ErrorCode.INTERNAL;
    this.context = options?.context;
  }
}

export class EmptyTableError extends TabwrapError {
  override readonly name = "EmptyTableError";

  constructor() {
    super("The input table is empty.", { code: ErrorCode.EMPTY_TABLE });
  }
}

/**
 * The input stream or file could not be read.
 */
export class InputReadError extends TabwrapError {
  override readonly name = "InputReadError";

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`IO error occurs: ${detail}.`, { code: ErrorCode.IO, cause });
  }
}

/**
 * The decoded input is not valid UTF-8.
 */
export class InvalidInputError extends TabwrapError {
  override readonly name = "InvalidInputError";

  constructor(detail: string, cause?: unknown) {
    super(`The input is not valid utf-8: ${detail}`, { code: ErrorCode.INVALID_INPUT, cause });
  }
}

export class InvalidArgumentError extends TabwrapError {
  override readonly name = "InvalidArgumentError";

  constructor(message: string) {
    super(message, { code: ErrorCode.INVALID_ARGUMENT });
  }
}

/**
 * The width list and the table disagree on the number of columns.
 */
export class WidthListMismatchError extends TabwrapError {
  override readonly name = "WidthListMismatchError";
  readonly widthCount: number;
  readonly columnCount: number;

  constructor(widthCount: number, columnCount: number) {
    super(`len(WIDTH_LIST) (${widthCount}) != table ncols (${columnCount})`, {
      code: ErrorCode.WIDTH_MISMATCH,
      context: { widthCount, columnCount },
    });
    this.widthCount = widthCount;
    this.columnCount = columnCount;
  }
}

/**
 * The total width cannot cover the fixed widths plus the layout overhead.
 */
export class TotalWidthTooSmallError extends TabwrapError {
  override readonly name = "TotalWidthTooSmallError";
  readonly totalWidth: number;

  constructor(totalWidth: number) {
    super(
      `Table width ${totalWidth} is not large enough to facilitate the columns and/or table layout.`,
      { code: ErrorCode.TOTAL_WIDTH, context: { totalWidth } },
    );
    this.totalWidth = totalWidth;
  }
}

export interface CellCoordinate {
  row: number;
  column: number;
}

/**
 * Some wrapped line does not fit in its column. The coordinate is 0-based and
 * absent when the cause is a joint property of several columns.
 */
export class ColumnNotWideEnoughError extends TabwrapError {
  override readonly name = "ColumnNotWideEnoughError";
  readonly cell?: CellCoordinate;

  constructor(cell?: CellCoordinate) {
    super(
      cell
        ? `Column is not wide enough at row=${cell.row + 1} column=${cell.column + 1}.`
        : "Some columns are not wide enough.",
      { code: ErrorCode.COLUMN_NOT_WIDE, context: cell ? { ...cell } : undefined },
    );
    this.cell = cell;
  }
}

export class InvalidLayoutError extends TabwrapError {
  override readonly name = "InvalidLayoutError";
  readonly layout: string;

  constructor(layout: string) {
    super(`Invalid layout \`${layout}\``, { code: ErrorCode.INVALID_LAYOUT, context: { layout } });
    this.layout = layout;
  }
}

/**
 * A defect in the planner itself, e.g. backtracking into a null decision.
 */
export class PlannerInvariantError extends TabwrapError {
  override readonly name = "PlannerInvariantError";

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: ErrorCode.INTERNAL, context });
  }
}
