/**
 * End-to-end formatting: text in, rendered table out.
 */

import { TABWRAP_CONFIG } from "./config.js";
import { createTableRenderer } from "./display/table-renderers.js";
import { TabwrapError } from "./errors.js";
import { completeUserWidths } from "./planner/column-planner.js";
import { DEFAULT_READ_OPTIONS, readTable } from "./table/reader.js";
import { ensureRowWithinWidths, fillTable, wrapTable } from "./table/layout.js";
import type { ReadOptions, SearchStrategy, UserWidth } from "./types/index.js";
import { normalizeUserWidths } from "./utils/user-widths.js";
import { WrapOptionsVarWidths } from "./wrap/wrap-options.js";

export interface TabulateOptions {
  /** Column widths, `undefined` for columns to plan; padded or truncated to the table */
  widths?: readonly UserWidth[];
  /** Total table width; the terminal width when omitted */
  tableWidth?: number;
  layout?: string;
  /** Fail instead of warning when a cell does not fit its column */
  strict?: boolean;
  read?: Partial<ReadOptions>;
  breakWords?: boolean;
  search?: SearchStrategy;
  warn?: (message: string) => void;
}

export function tabulate(text: string, options: TabulateOptions = {}): string {
  const warn = options.warn ?? (() => {});
  const renderer = createTableRenderer(options.layout ?? TABWRAP_CONFIG.DEFAULT_LAYOUT);
  const table = readTable(text, { ...DEFAULT_READ_OPTIONS, ...options.read });
  const nrows = table.nrows();
  const ncols = table.ncols();
  const userWidths = normalizeUserWidths(options.widths ?? [], ncols, warn);
  const wrapOptions = new WrapOptionsVarWidths({ breakWords: options.breakWords ?? false });

  table.transpose();
  const widths = completeUserWidths(userWidths, options.tableWidth, table, renderer, wrapOptions, {
    strict: options.strict,
    search: options.search,
  });
  table.transpose();

  const wrapped = wrapTable(table, widths, wrapOptions);
  for (let rowIdx = 0; rowIdx < nrows; rowIdx++) {
    try {
      ensureRowWithinWidths(rowIdx, wrapped.row(rowIdx) ?? [], widths);
    } catch (error) {
      if (options.strict || !(error instanceof TabwrapError)) {
        throw error;
      }
      warn(error.message);
    }
  }
  return renderer.renderTable(fillTable(wrapped, widths), widths);
}
