import { describe, expect, it } from "vitest";

import { toPricelistCsv, toPricelistJson } from "@/lib/export";
import { toPricelistRow } from "@/lib/mappers";
import type { CanonicalRecord } from "@/types/pricelist";

const record: CanonicalRecord = {
  id: "GW_0a1b2c3d",
  code: "GW0001",
  description: "Excavate trench, 1m deep",
  unit: "m",
  rate: 12.5,
  rateProvenance: { sheetName: "Groundworks", row: 1, col: 5 },
  rateTarget: { sheetName: "Groundworks", row: 1, col: 5 },
  category: "Groundworks",
  subcategory: "Trench Excavation",
  sourceCell: { sheetName: "Groundworks", row: 1, col: 0 },
  keywords: ["1m", "trench", "trench_excavation"],
};

describe("toPricelistRow", () => {
  it("flattens a canonical record with sheet-qualified references", () => {
    expect(toPricelistRow(record)).toEqual({
      id: "GW_0a1b2c3d",
      code: "GW0001",
      description: "Excavate trench, 1m deep",
      unit: "m",
      category: "Groundworks",
      subcategory: "Trench Excavation",
      rate: 12.5,
      cellRate_reference: "Groundworks!F2",
      cellRate_rate: 12.5,
      excelCellReference: "Groundworks!A2",
      sourceSheetName: "Groundworks",
      keywords: "1m|trench|trench_excavation",
    });
  });

  it("fills unpriced records with zero rates and blank subcategories", () => {
    const row = toPricelistRow({
      ...record,
      rate: null,
      rateProvenance: null,
      rateTarget: null,
      subcategory: null,
      keywords: [],
    });

    expect(row.rate).toBe(0);
    expect(row.cellRate_rate).toBe(0);
    expect(row.cellRate_reference).toBe("");
    expect(row.subcategory).toBe("");
    expect(row.keywords).toBe("");
  });
});

describe("pricelist export", () => {
  it("renders CSV with a fixed header and quoted fields", () => {
    const lines = toPricelistCsv([toPricelistRow(record)]).split("\n");

    expect(lines[0]).toBe(
      "id,code,description,unit,category,subcategory,rate,cellRate_reference,cellRate_rate,excelCellReference,sourceSheetName,keywords"
    );
    expect(lines[1]).toBe(
      'GW_0a1b2c3d,GW0001,"Excavate trench, 1m deep",m,Groundworks,Trench Excavation,12.5,Groundworks!F2,12.5,Groundworks!A2,Groundworks,1m|trench|trench_excavation'
    );
  });

  it("renders JSON rows", () => {
    const parsed: unknown = JSON.parse(toPricelistJson([toPricelistRow(record)]));
    expect(parsed).toEqual([toPricelistRow(record)]);
  });
});
