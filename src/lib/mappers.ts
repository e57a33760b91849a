import { formatCellRef } from "@/lib/extraction/grid";
import type { CanonicalRecord, PricelistRow } from "@/types/pricelist";

export const KEYWORD_SEPARATOR = "|";

export function toPricelistRow(record: CanonicalRecord): PricelistRow {
  const rate = record.rate ?? 0;
  return {
    id: record.id,
    code: record.code,
    description: record.description,
    unit: record.unit,
    category: record.category,
    subcategory: record.subcategory ?? "",
    rate,
    cellRate_reference: record.rateTarget ? formatCellRef(record.rateTarget) : "",
    cellRate_rate: rate,
    excelCellReference: formatCellRef(record.sourceCell),
    sourceSheetName: record.sourceCell.sheetName,
    keywords: record.keywords.join(KEYWORD_SEPARATOR),
  };
}

export function toPricelistRows(records: readonly CanonicalRecord[]): PricelistRow[] {
  return records.map(toPricelistRow);
}
