/**
 * Column width planner.
 *
 * Chooses widths for the columns the user left undecided so that all widths
 * add up to the table width minus the layout overhead, every wrapped line
 * fits its column, and the table prints as few lines as possible.
 *
 * dp(w, k) is the best element-wise max of line counts over the fixed columns
 * and the first k undecided columns when those k columns share exactly w
 * columns of width. Only dp(., k - 1) is needed to compute dp(., k), so the
 * memo is double buffered; the decisions of every state are kept for the
 * final backtrack.
 */

import { TABWRAP_CONFIG } from "../config.js";
import {
  ColumnNotWideEnoughError,
  InvalidArgumentError,
  PlannerInvariantError,
  TotalWidthTooSmallError,
  WidthListMismatchError,
} from "../errors.js";
import type { TableRenderer } from "../display/table-renderers.js";
import type { Table } from "../table/table.js";
import type { SearchStrategy, UserWidth } from "../types/index.js";
import { createDebugLogger } from "../utils/debug.js";
import type { WrapOptionsVarWidths } from "../wrap/wrap-options.js";
import { ColumnCostEvaluator } from "./cost-evaluator.js";
import { solveFirstColumn, solveStepBisect, solveStepExhaustive, type StepSolver } from "./dp-step.js";
import { LineCounts } from "./line-counts.js";

export interface PlannerOptions {
  /** DP step solver, "bisect" by default */
  search?: SearchStrategy;
  /** Check user-fixed columns before planning and fail on the first overflowing cell */
  strict?: boolean;
  /**
   * Called once the memo dp(., position + 1) of an undecided column is
   * complete. `memo[w]` is the state for budget w. The array is a reused
   * buffer and is only valid during the call.
   */
  onColumnSolved?: (position: number, colIdx: number, memo: readonly LineCounts[]) => void;
}

const NULL_DECISION = -1;

const SOLVERS: Record<SearchStrategy, StepSolver> = {
  bisect: solveStepBisect,
  exhaustive: solveStepExhaustive,
};

const logger = createDebugLogger("ColumnPlanner");

/**
 * Decisions of every DP state in one flat arena, row `position` holding the
 * widths chosen for the position-th undecided column at budgets 0..=budget.
 */
class DecisionTable {
  private readonly decisions: Int32Array;
  private readonly stride: number;

  constructor(columns: number, budget: number) {
    this.stride = budget + 1;
    this.decisions = new Int32Array(columns * this.stride).fill(NULL_DECISION);
  }

  set(position: number, budget: number, width: number): void {
    this.decisions[position * this.stride + budget] = width;
  }

  get(position: number, budget: number): number {
    const width = this.decisions[position * this.stride + budget];
    if (width === undefined || width === NULL_DECISION) {
      throw new PlannerInvariantError(`null decision at column ${position}, budget ${budget}`, {
        position,
        budget,
      });
    }
    return width;
  }
}

function ensureWidth(width: number, name: string): void {
  if (!Number.isInteger(width) || width < 0) {
    throw new InvalidArgumentError(`${name} \`${width}\` is not a nonnegative integer`);
  }
}

/**
 * Element-wise max of the line counts of all fixed columns at their widths.
 */
function buildBaseline(evaluator: ColumnCostEvaluator, userWidths: readonly UserWidth[]): LineCounts {
  let baseline = LineCounts.zero(evaluator.nrows);
  userWidths.forEach((width, colIdx) => {
    if (width !== undefined) {
      baseline = baseline.maxWith(evaluator.cost(colIdx, width, true));
    }
  });
  return baseline;
}

function ensureFixedColumnsFit(evaluator: ColumnCostEvaluator, userWidths: readonly UserWidth[]): void {
  userWidths.forEach((width, colIdx) => {
    if (width === undefined) return;
    const row = evaluator.firstOverflowRow(colIdx, width);
    if (row !== undefined) {
      throw new ColumnNotWideEnoughError({ row, column: colIdx });
    }
  });
}

/**
 * Fill in the undecided (`undefined`) entries of `userWidths`.
 *
 * @param totalWidth - table width including the layout; the terminal width when omitted
 * @param transposedTable - column-major table: row `j` holds column `j`
 * @returns one width per column; fixed entries are returned unchanged
 */
export function completeUserWidths(
  userWidths: readonly UserWidth[],
  totalWidth: number | undefined,
  transposedTable: Table<string>,
  renderer: Pick<TableRenderer, "layoutWidth">,
  wrapOptions: WrapOptionsVarWidths,
  options: PlannerOptions = {},
): number[] {
  // Each row of the transposed table is one column
  const ncols = transposedTable.nrows();
  if (userWidths.length !== ncols) {
    throw new WidthListMismatchError(userWidths.length, ncols);
  }

  userWidths.forEach((width) => {
    if (width !== undefined) ensureWidth(width, "width");
  });

  const evaluator = new ColumnCostEvaluator(transposedTable, wrapOptions);
  if (options.strict) {
    ensureFixedColumnsFit(evaluator, userWidths);
  }

  const undecided: number[] = [];
  let sumFixed = 0;
  userWidths.forEach((width, colIdx) => {
    if (width === undefined) {
      undecided.push(colIdx);
    } else {
      sumFixed += width;
    }
  });
  if (undecided.length === 0) {
    // Nothing to plan: the table width plays no part
    return userWidths.map((width) => width ?? 0);
  }

  const total = totalWidth ?? TABWRAP_CONFIG.resolveTerminalWidth();
  ensureWidth(total, "table width");
  const layoutWidth = renderer.layoutWidth(ncols);
  if (total < sumFixed + layoutWidth) {
    throw new TotalWidthTooSmallError(total);
  }
  const budget = total - sumFixed - layoutWidth;
  const solveStep = SOLVERS[options.search ?? "bisect"];
  const startedAt = performance.now();

  const baseline = buildBaseline(evaluator, userWidths);
  const decisions = new DecisionTable(undecided.length, budget);
  let memo = new Array<LineCounts>(budget + 1).fill(LineCounts.infinite());
  let nextMemo = new Array<LineCounts>(budget + 1).fill(LineCounts.infinite());
  let scanned = 0;

  undecided.forEach((colIdx, position) => {
    // dp(0, k) stays infinite: no width left for this column
    nextMemo[0] = LineCounts.infinite();
    for (let w = 1; w <= budget; w++) {
      const step =
        position === 0
          ? solveFirstColumn(evaluator, colIdx, w, baseline)
          : solveStep({ evaluator, colIdx, budget: w, memo });
      nextMemo[w] = step.counts;
      decisions.set(position, w, step.decision);
      scanned += step.scanned;
    }
    [memo, nextMemo] = [nextMemo, memo];
    options.onColumnSolved?.(position, colIdx, memo);
  });

  const optimum = memo[budget] ?? LineCounts.infinite();
  logger.log(
    `budget=${budget} undecided=${undecided.length} evaluations=${evaluator.evaluations} ` +
      `scanned=${scanned} total=${optimum.total()} elapsed=${(performance.now() - startedAt).toFixed(1)}ms`,
  );
  if (optimum.isInfinite) {
    throw new ColumnNotWideEnoughError();
  }

  // Backtrack from the last undecided column with the full budget
  const planned = new Array<number>(undecided.length);
  let remaining = budget;
  for (let position = undecided.length - 1; position >= 0; position--) {
    const width = decisions.get(position, remaining);
    planned[position] = width;
    remaining -= width;
  }
  if (remaining !== 0) {
    throw new PlannerInvariantError(`backtrack left ${remaining} columns of width unassigned`, { remaining });
  }

  let next = 0;
  return userWidths.map((width) => width ?? planned[next++] ?? 0);
}
