import { describe, it, expect } from "vitest";
import {
  createTableRenderer,
  GridTableRenderer,
  NullTableRenderer,
  PlainTableRenderer,
} from "../src/display/table-renderers.js";
import { InvalidLayoutError } from "../src/errors.js";
import { Table } from "../src/table/table.js";

const filled = Table.fromRows([
  [["ab", "c "], ["x  ", "   "]],
  [["de", "  "], ["yz ", "   "]],
]);

describe("NullTableRenderer", () => {
  it("takes no width and renders nothing", () => {
    const renderer = new NullTableRenderer();
    expect(renderer.layoutWidth(3)).toBe(0);
    expect(renderer.renderTable(filled, [2, 3])).toBe("");
  });
});

describe("PlainTableRenderer", () => {
  it("separates columns by two spaces", () => {
    const renderer = new PlainTableRenderer();
    expect(renderer.layoutWidth(3)).toBe(4);
    expect(renderer.layoutWidth(1)).toBe(0);
  });

  it("renders every physical line", () => {
    expect(new PlainTableRenderer().renderTable(filled, [2, 3])).toBe(
      ["ab  x  ", "c      ", "de  yz ", "       "].join("\n"),
    );
  });
});

describe("GridTableRenderer", () => {
  it("takes three columns per cell plus one", () => {
    expect(new GridTableRenderer().layoutWidth(2)).toBe(7);
  });

  it("draws a grid without a header rule", () => {
    expect(new GridTableRenderer().renderTable(filled, [2, 3])).toBe(
      [
        "┌────┬─────┐",
        "│ ab │ x   │",
        "│ c  │     │",
        "├────┼─────┤",
        "│ de │ yz  │",
        "│    │     │",
        "└────┴─────┘",
      ].join("\n"),
    );
  });

  it("doubles the rule under the header row", () => {
    const table = Table.fromRows([[["ab"]], [["cd"]], [["ef"]]]);
    expect(new GridTableRenderer({ header: true }).renderTable(table, [2])).toBe(
      ["┌────┐", "│ ab │", "╞════╡", "│ cd │", "├────┤", "│ ef │", "└────┘"].join("\n"),
    );
  });
});

describe("createTableRenderer", () => {
  it("builds each layout", () => {
    expect(createTableRenderer("null")).toBeInstanceOf(NullTableRenderer);
    expect(createTableRenderer("plain")).toBeInstanceOf(PlainTableRenderer);
    expect(createTableRenderer("grid_no_header")).toBeInstanceOf(GridTableRenderer);
    expect(createTableRenderer("grid")).toBeInstanceOf(GridTableRenderer);
  });

  it("rejects an unknown layout", () => {
    expect(() => createTableRenderer("fancy")).toThrow(InvalidLayoutError);
    expect(() => createTableRenderer("fancy")).toThrow("Invalid layout `fancy`");
  });
});
