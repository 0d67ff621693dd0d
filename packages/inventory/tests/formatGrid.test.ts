import { describe, expect, it } from "vitest";
import { formatGrid } from "../src/index.js";

describe("formatGrid", () => {
  it("prints one line per row with empty cells as []", () => {
    const matrix = [
      ["a", null],
      ["a", "b"],
      [null, null],
    ];

    expect(formatGrid(matrix)).toBe("[a][a][]\n[][b][]");
  });

  it("uses the label function for occupied cells", () => {
    const matrix: Array<Array<{ code: number } | null>> = [[{ code: 7 }], [null]];

    expect(formatGrid(matrix, (cell) => `#${cell.code}`)).toBe("[#7][]");
  });

  it("prints nothing for an empty matrix", () => {
    expect(formatGrid([])).toBe("");
  });
});
