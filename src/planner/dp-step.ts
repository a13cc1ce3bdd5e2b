/**
 * One state of the width DP: dp(w, k) for the k-th undecided column, given the
 * finished memo dp(., k - 1) of the column before it.
 *
 * Write cost(i) for the line counts of the current column at width i and
 * prev(i) for dp(w - i, k - 1). As i grows, cost(i).total() never increases
 * and prev(i).total() never decreases, so the lower bound
 * max(prev(i).total(), cost(i).total()) is valley shaped. The bisection
 * locates the bottom of that valley from scalar totals alone, then walks out
 * from it while the bound does not exceed the best total found.
 *
 * Both solvers pick the same state: the least candidate under
 * LineCounts.compare(), the narrowest width among equal ones.
 */

import { PlannerInvariantError } from "../errors.js";
import type { ColumnCostEvaluator } from "./cost-evaluator.js";
import { LineCounts } from "./line-counts.js";

export interface StepContext {
  evaluator: ColumnCostEvaluator;
  /** Column index in the untransposed table */
  colIdx: number;
  /** Budget w of this state, at least 1 */
  budget: number;
  /** dp(v, k - 1) for v in 0..=w */
  memo: readonly LineCounts[];
}

export interface StepResult {
  counts: LineCounts;
  /** Width given to the current column */
  decision: number;
  /** Widths tried around the valley bottom (bisect) or by the full scan (exhaustive) */
  scanned: number;
}

export type StepSolver = (ctx: StepContext) => StepResult;

function memoAt(memo: readonly LineCounts[], budget: number): LineCounts {
  const counts = memo[budget];
  if (counts === undefined) {
    throw new PlannerInvariantError(`memo has no entry for budget ${budget}`, { budget, size: memo.length });
  }
  return counts;
}

/**
 * dp(w, 1): the first undecided column takes the whole remaining budget on
 * top of the fixed columns' baseline.
 */
export function solveFirstColumn(
  evaluator: ColumnCostEvaluator,
  colIdx: number,
  budget: number,
  baseline: LineCounts,
): StepResult {
  if (baseline.isInfinite) {
    return { counts: LineCounts.infinite(), decision: budget, scanned: 0 };
  }
  const counts = evaluator.cost(colIdx, budget, false).maxWith(baseline);
  return { counts, decision: budget, scanned: 0 };
}

/**
 * Reference solver: try every width in [1, w].
 */
export function solveStepExhaustive({ evaluator, colIdx, budget, memo }: StepContext): StepResult {
  let best = LineCounts.infinite();
  let decision = 1;
  for (let i = 1; i <= budget; i++) {
    const prev = memoAt(memo, budget - i);
    // Skip the wrap: the candidate is infinite whatever the column costs
    if (prev.isInfinite) continue;
    const candidate = evaluator.cost(colIdx, i, false).maxWith(prev);
    if (candidate.compare(best) < 0) {
      best = candidate;
      decision = i;
    }
  }
  return { counts: best, decision, scanned: budget };
}

/**
 * Bisection solver; picks the same state as solveStepExhaustive().
 */
export function solveStepBisect({ evaluator, colIdx, budget, memo }: StepContext): StepResult {
  const costs = new Map<number, LineCounts>();
  const costAt = (i: number): LineCounts => {
    let counts = costs.get(i);
    if (counts === undefined) {
      counts = evaluator.cost(colIdx, i, false);
      costs.set(i, counts);
    }
    return counts;
  };
  const prevAt = (i: number): LineCounts => memoAt(memo, budget - i);
  const lowerBound = (i: number): number => {
    const prev = prevAt(i);
    if (prev.isInfinite) return Number.POSITIVE_INFINITY;
    return Math.max(prev.total(), costAt(i).total());
  };

  // Search: the largest i in [1, w] with prev(i).total() <= cost(i).total(),
  // counting an infinite cost as larger than anything finite.
  let lo = 1;
  let hi = budget;
  while (lo < hi) {
    const i = lo + Math.ceil((hi - lo) / 2);
    const prev = prevAt(i);
    if (prev.isInfinite) {
      hi = i - 1;
      continue;
    }
    const cost = costAt(i);
    if (cost.isInfinite || prev.total() <= cost.total()) {
      lo = i;
    } else {
      hi = i - 1;
    }
  }
  // The valley bottom is at lo or just past it
  let approx = lo;
  if (lo < budget && lowerBound(lo + 1) < lowerBound(lo)) {
    approx = lo + 1;
  }
  const bound = lowerBound(approx);
  if (bound === Number.POSITIVE_INFINITY) {
    return { counts: LineCounts.infinite(), decision: approx, scanned: 0 };
  }

  // Any width that beats or ties the best candidate has a bound no higher than
  // the best total, and the bound only grows moving away from approx.
  let best = prevAt(approx).maxWith(costAt(approx));
  let decision = approx;
  let scanned = 0;
  const consider = (i: number): boolean => {
    if (lowerBound(i) > best.total()) return false;
    scanned++;
    const candidate = prevAt(i).maxWith(costAt(i));
    const order = candidate.compare(best);
    if (order < 0 || (order === 0 && i < decision)) {
      best = candidate;
      decision = i;
    }
    return true;
  };
  for (let i = approx - 1; i >= 1; i--) {
    if (!consider(i)) break;
  }
  for (let i = approx + 1; i <= budget; i++) {
    if (!consider(i)) break;
  }
  return { counts: best, decision, scanned };
}
