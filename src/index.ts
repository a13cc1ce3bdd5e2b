export { tabulate, type TabulateOptions } from "./tabulate.js";
export { completeUserWidths, type PlannerOptions } from "./planner/column-planner.js";
export { ColumnCostEvaluator } from "./planner/cost-evaluator.js";
export { solveStepBisect, solveStepExhaustive, type StepContext, type StepResult, type StepSolver } from "./planner/dp-step.js";
export { LineCounts } from "./planner/line-counts.js";
export { NotTableError, Table } from "./table/table.js";
export { DEFAULT_READ_OPTIONS, readInput, readTable } from "./table/reader.js";
export { ensureRowWithinWidths, fillCell, fillTable, wrapTable } from "./table/layout.js";
export {
  createTableRenderer,
  GridTableRenderer,
  LAYOUT_NAMES,
  NullTableRenderer,
  PlainTableRenderer,
  type TableRenderer,
} from "./display/table-renderers.js";
export { displayWidth, tryWrap, wrapText } from "./wrap/wrap-engine.js";
export { WrapOptionsVarWidths } from "./wrap/wrap-options.js";
export { decodeEscapes } from "./utils/escape.js";
export { normalizeUserWidths, parseUserWidths } from "./utils/user-widths.js";
export { TABWRAP_CONFIG } from "./config.js";
export * from "./errors.js";
export type * from "./types/index.js";
