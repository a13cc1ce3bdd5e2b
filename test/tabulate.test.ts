import { describe, it, expect, vi } from "vitest";
import { ColumnNotWideEnoughError, EmptyTableError, InvalidLayoutError } from "../src/errors.js";
import { tabulate } from "../src/tabulate.js";

const TEXT = "aa bb\tdd ee ff\nc\tg\n";

describe("tabulate", () => {
  it("renders a grid at the planned widths", () => {
    expect(tabulate(TEXT, { tableWidth: 20 })).toBe(
      [
        "┌───────┬──────────┐",
        "│ aa bb │ dd ee ff │",
        "├───────┼──────────┤",
        "│ c     │ g        │",
        "└───────┴──────────┘",
      ].join("\n"),
    );
  });

  it("renders the plain layout", () => {
    expect(tabulate(TEXT, { tableWidth: 15, layout: "plain" })).toBe(
      ["aa bb  dd ee ff", "c      g       "].join("\n"),
    );
  });

  it("wraps hyphenated words at the hyphen", () => {
    expect(tabulate("well-known\n", { tableWidth: 6, layout: "plain" })).toBe(["well- ", "known "].join("\n"));
  });

  it("renders nothing with the null layout", () => {
    expect(tabulate(TEXT, { tableWidth: 13, layout: "null" })).toBe("");
  });

  it("decodes escapes into multi-line cells", () => {
    const rendered = tabulate("x\\ny\n", { tableWidth: 5, layout: "plain", read: { backslashEscape: true } });
    expect(rendered).toBe(["x    ", "y    "].join("\n"));
  });

  it("warns about padded widths", () => {
    const warn = vi.fn();
    const rendered = tabulate("a\tb\n", { widths: [3], tableWidth: 20, layout: "plain", warn });
    expect(warn).toHaveBeenCalledWith("Padding USER_WIDTHS with `*`");
    expect(rendered).toBe(`a    ${"b".padEnd(15)}`);
  });

  it("warns about a fixed column that is too narrow", () => {
    const warn = vi.fn();
    const rendered = tabulate("ab\n", { widths: [1], layout: "plain", warn });
    expect(warn).toHaveBeenCalledWith("Column is not wide enough at row=1 column=1.");
    expect(rendered).toBe("ab");
  });

  it("fails on a fixed column that is too narrow in strict mode", () => {
    expect(() => tabulate("ab\n", { widths: [1], layout: "plain", strict: true })).toThrow(
      ColumnNotWideEnoughError,
    );
  });

  it("rejects empty input", () => {
    expect(() => tabulate("\n")).toThrow(EmptyTableError);
  });

  it("rejects an unknown layout", () => {
    expect(() => tabulate(TEXT, { layout: "fancy" })).toThrow(InvalidLayoutError);
  });
});
