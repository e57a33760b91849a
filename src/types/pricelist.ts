export type CellValue = string | number | null;

export interface CellRef {
  sheetName: string;
  row: number;
  col: number;
}

export interface RawRecord {
  code: string | null;
  description: string;
  unit: string;
  rate: number | null;
  rateProvenance: CellRef | null;
  /** Cell a rate update is written back to; the provenance cell when a rate was found. */
  rateTarget: CellRef | null;
  category: string;
  subcategory: string | null;
  sourceCell: CellRef;
  keywords: string[];
}

export interface CanonicalRecord extends RawRecord {
  id: string;
  code: string;
}

export type RowClassification =
  | { kind: "section_header"; text: string }
  | { kind: "data"; rule: "range" | "anchor" | "keyword" }
  | { kind: "skip"; reason: "sparse" | "no_signal" };

export interface ScanState {
  currentSection: string | null;
  currentHeader: string | null;
  windowIndex: number | null;
}

export interface ScanSummary {
  sheetName: string;
  category: string;
  rowsScanned: number;
  rowsSkipped: number;
  headerRows: number;
  dataRows: number;
  rejectedRows: number;
  records: number;
  recordsWithRates: number;
  recordsWithCellReferences: number;
}

export interface ReconcileSummary {
  inputRecords: number;
  outputRecords: number;
  duplicatesRemoved: number;
  byCategory: Record<string, number>;
}

/** Flat record consumed by the CSV/JSON writers and the rate write-back tooling. */
export interface PricelistRow {
  id: string;
  code: string;
  description: string;
  unit: string;
  category: string;
  subcategory: string;
  rate: number;
  cellRate_reference: string;
  cellRate_rate: number;
  excelCellReference: string;
  sourceSheetName: string;
  keywords: string;
}

export type Enricher = (records: readonly RawRecord[], sheetName: string) => Promise<RawRecord[]>;

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: "SHEET_NOT_FOUND" | "INVALID_PROFILE" | "INVALID_EXPANSIONS",
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}
