import { describe, it, expect } from "vitest";
import { ColumnNotWideEnoughError } from "../src/errors.js";
import { ensureRowWithinWidths, fillCell, fillTable, wrapTable } from "../src/table/layout.js";
import { Table } from "../src/table/table.js";
import { WrapOptionsVarWidths } from "../src/wrap/wrap-options.js";

describe("fillCell", () => {
  it("pads lines and adds blank lines", () => {
    expect(fillCell(["abcde"], 10, 2)).toEqual(["abcde     ", "          "]);
  });

  it("leaves lines wider than the column as they are", () => {
    expect(fillCell(["toolong"], 3, 1)).toEqual(["toolong"]);
  });

  it("pads by display width", () => {
    expect(fillCell(["日本"], 6, 1)).toEqual(["日本  "]);
  });
});

describe("wrapTable", () => {
  it("wraps each cell at its column width", () => {
    const table = Table.fromRows([["aa bb", "c"]]);
    const wrapped = wrapTable(table, [2, 3], new WrapOptionsVarWidths());
    expect(wrapped.cells()).toEqual([["aa", "bb"], ["c"]]);
  });

  it("needs a width for every column", () => {
    const table = Table.fromRows([["a", "b"]]);
    expect(() => wrapTable(table, [1], new WrapOptionsVarWidths())).toThrow(RangeError);
  });
});

describe("fillTable", () => {
  it("gives every cell of a row the row height", () => {
    const wrapped = Table.fromRows([
      [["aa", "bb"], ["c"]],
      [["d"], ["e"]],
    ]);
    expect(fillTable(wrapped, [2, 3]).cells()).toEqual([["aa", "bb"], ["c  ", "   "], ["d "], ["e  "]]);
  });
});

describe("ensureRowWithinWidths", () => {
  it("accepts a row that fits", () => {
    expect(() => ensureRowWithinWidths(0, [["ab"], ["c"]], [2, 1])).not.toThrow();
  });

  it("reports the first cell that overflows", () => {
    try {
      ensureRowWithinWidths(4, [["ab"], ["c"], ["dd"]], [2, 0, 1]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ColumnNotWideEnoughError);
      if (error instanceof ColumnNotWideEnoughError) {
        expect(error.cell).toEqual({ row: 4, column: 1 });
        expect(error.message).toBe("Column is not wide enough at row=5 column=2.");
      }
    }
  });
});
