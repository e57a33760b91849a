import { describe, expect, it } from "vitest";

import {
  activeWindow,
  captureHeader,
  detectRange,
  enterRow,
  fuseDescription,
  initialScanState,
} from "@/lib/extraction/assembler";
import { SheetGrid } from "@/lib/extraction/grid";
import { SheetRow } from "@/lib/extraction/row";
import type { CellValue } from "@/types/pricelist";
import { testProfile } from "./fixtures";

const profile = testProfile({
  sheetName: "Drainage",
  category: "Drainage",
  rangeWindows: [{ startRow: 2, endRow: 6, minHeaderLength: 20 }],
});

function windowOf() {
  const window = profile.rangeWindows[0];
  if (!window) {
    throw new Error("profile has no range window");
  }
  return window;
}

function rowOf(values: CellValue[]) {
  return new SheetRow(new SheetGrid("Drainage", [values]), 0, profile);
}

describe("range windows", () => {
  it("tracks the window a row falls in and clears the header on crossing a boundary", () => {
    let state = enterRow(initialScanState(), profile, 1);
    expect(state.windowIndex).toBeNull();
    expect(activeWindow(state, profile)).toBeNull();

    state = enterRow(state, profile, 2);
    expect(state.windowIndex).toBe(0);
    state = { ...state, currentHeader: "Excavate trenches; depth to invert:" };

    const inside = enterRow(state, profile, 5);
    expect(inside.currentHeader).toBe("Excavate trenches; depth to invert:");

    const outside = enterRow(inside, profile, 6);
    expect(outside.windowIndex).toBeNull();
    expect(outside.currentHeader).toBeNull();
  });
});

describe("detectRange", () => {
  it("reads lower - upper bounds from the range columns", () => {
    expect(detectRange(rowOf([12, null, 0.5, "-", 0.75]), windowOf())).toEqual({
      text: "0.5-0.75",
      columns: [2, 3, 4],
    });
  });

  it("renders an ne lower bound as not exceeding", () => {
    expect(detectRange(rowOf([13, null, "ne", "-", 1.5]), windowOf())?.text).toBe("not exceeding 1.5");
  });

  it("requires the separator and both bounds", () => {
    expect(detectRange(rowOf([12, null, 0.5, "to", 0.75]), windowOf())).toBeNull();
    expect(detectRange(rowOf([12, null, null, "-", 0.75]), windowOf())).toBeNull();
  });
});

describe("captureHeader", () => {
  it("captures long keyword-bearing labels without a code", () => {
    expect(captureHeader(rowOf([null, "Excavate  trenches; depth to invert:"]), windowOf(), 0)).toBe(
      "Excavate trenches; depth to invert:"
    );
  });

  it("rejects short labels, labels without keywords and coded rows", () => {
    expect(captureHeader(rowOf([null, "Excavate trench"]), windowOf(), 0)).toBeNull();
    expect(captureHeader(rowOf([null, "Supply and lay pipes in runs"]), windowOf(), 0)).toBeNull();
    expect(captureHeader(rowOf(["4.1", "Excavate trenches; depth to invert:"]), windowOf(), 0)).toBeNull();
  });
});

describe("fuseDescription", () => {
  it("appends the range directly after a header ending in a colon", () => {
    expect(fuseDescription("Excavate trenches; depth to invert:", "0.5-0.75", windowOf())).toBe(
      "Excavate trenches; depth to invert: 0.5-0.75 m"
    );
    expect(fuseDescription("Excavate trench for pipes, depth:", "not exceeding 1.5", windowOf())).toBe(
      "Excavate trench for pipes, depth: not exceeding 1.5 m"
    );
  });

  it("adds a colon after a header ending with the window label", () => {
    expect(fuseDescription("Excavate trench depth to invert", "1-2", windowOf())).toBe(
      "Excavate trench depth to invert: 1-2 m"
    );
  });

  it("adds the window label otherwise", () => {
    expect(fuseDescription("Excavate trench", "1-2", windowOf())).toBe("Excavate trench; depth to invert: 1-2 m");
  });
});
