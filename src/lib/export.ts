import * as XLSX from "xlsx";

import type { PricelistRow } from "@/types/pricelist";

export const PRICELIST_COLUMNS = [
  "id",
  "code",
  "description",
  "unit",
  "category",
  "subcategory",
  "rate",
  "cellRate_reference",
  "cellRate_rate",
  "excelCellReference",
  "sourceSheetName",
  "keywords",
] as const satisfies readonly (keyof PricelistRow)[];

export function toPricelistJson(rows: readonly PricelistRow[]): string {
  return JSON.stringify(rows, null, 2);
}

export function toPricelistCsv(rows: readonly PricelistRow[]): string {
  const sheet = XLSX.utils.json_to_sheet([...rows], { header: [...PRICELIST_COLUMNS] });
  return XLSX.utils.sheet_to_csv(sheet, { blankrows: false });
}
