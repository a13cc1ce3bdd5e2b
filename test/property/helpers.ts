import { fc } from "./setup.js";

// Small enough that a brute force over every width split stays fast
export const MAX_NCOLS = 4;
export const MAX_NROWS = 3;
export const MAX_WORD_LEN = 5;
export const MAX_WORDS = 12;
export const MAX_SLACK = 8;

export const arbWord = fc
  .array(fc.constantFrom("a", "b", "c", "x", "y"), { minLength: 1, maxLength: MAX_WORD_LEN })
  .map((chars) => chars.join(""));

/** Words joined by single spaces; no words gives an empty cell. */
export const arbCell = fc.array(arbWord, { maxLength: MAX_WORDS }).map((words) => words.join(" "));

export const arbRows = fc
  .tuple(fc.integer({ min: 1, max: MAX_NROWS }), fc.integer({ min: 1, max: MAX_NCOLS }))
  .chain(([nrows, ncols]) =>
    fc.array(fc.array(arbCell, { minLength: ncols, maxLength: ncols }), {
      minLength: nrows,
      maxLength: nrows,
    }),
  );

/**
 * Narrowest width at which no word of the column overflows, at least 1.
 */
export function minimumWidth(rows: readonly (readonly string[])[], colIdx: number): number {
  let width = 1;
  for (const row of rows) {
    for (const word of (row[colIdx] ?? "").split(" ")) {
      width = Math.max(width, word.length);
    }
  }
  return width;
}

/**
 * Every way to write `total` as `parts` positive summands.
 */
export function* compositions(total: number, parts: number): Generator<number[]> {
  if (parts === 1) {
    if (total >= 1) yield [total];
    return;
  }
  for (let first = 1; first <= total - parts + 1; first++) {
    for (const rest of compositions(total - first, parts - 1)) {
      yield [first, ...rest];
    }
  }
}
