import { describe, expect, it } from "vitest";

import { cellAddress, columnLetter, formatCellRef, SheetGrid } from "@/lib/extraction/grid";

describe("cell addressing", () => {
  it("encodes columns in bijective base 26", () => {
    expect(columnLetter(0)).toBe("A");
    expect(columnLetter(25)).toBe("Z");
    expect(columnLetter(26)).toBe("AA");
    expect(columnLetter(701)).toBe("ZZ");
    expect(columnLetter(702)).toBe("AAA");
  });

  it("formats one-based row numbers", () => {
    expect(cellAddress(19, 5)).toBe("F20");
    expect(cellAddress(0, 26)).toBe("AA1");
  });

  it("prefixes the sheet name verbatim", () => {
    expect(formatCellRef({ sheetName: "RC works", row: 1, col: 2 })).toBe("RC works!C2");
  });
});

describe("SheetGrid", () => {
  const grid = new SheetGrid(
    "Drainage",
    [
      ["A", 1],
      ["B", 2, "x"],
    ],
    [[true]]
  );

  it("reports the widest row as the column count", () => {
    expect(grid.rowCount).toBe(2);
    expect(grid.colCount).toBe(3);
  });

  it("returns empty values outside the sheet", () => {
    expect(grid.valueAt(0, 2)).toBeNull();
    expect(grid.valueAt(5, 0)).toBeNull();
    expect(grid.valueAt(-1, 0)).toBeNull();
    expect(grid.isBold(0, 0)).toBe(true);
    expect(grid.isBold(1, 0)).toBe(false);
  });

  it("builds sheet-qualified addresses", () => {
    expect(grid.sheetCellAddress(1, 2)).toBe("Drainage!C2");
  });
});
