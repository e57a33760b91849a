import {
  activeWindow,
  captureHeader,
  detectRange,
  enterRow,
  initialScanState,
} from "@/lib/extraction/assembler";
import { classifyRow } from "@/lib/extraction/classifier";
import { extractRecord } from "@/lib/extraction/fields";
import type { Grid } from "@/lib/extraction/grid";
import type { SheetProfile } from "@/lib/extraction/profiles";
import { SheetRow } from "@/lib/extraction/row";
import { logger } from "@/lib/logger";
import type { RawRecord, ScanState, ScanSummary } from "@/types/pricelist";

export interface SheetScanResult {
  records: RawRecord[];
  summary: ScanSummary;
}

/**
 * Scans one sheet top to bottom. Rows depend on the header state left by the
 * rows above them, so the scan is strictly sequential within a sheet.
 */
export function scanSheet(grid: Grid, profile: SheetProfile): SheetScanResult {
  const records: RawRecord[] = [];
  const summary: ScanSummary = {
    sheetName: grid.sheetName,
    category: profile.category,
    rowsScanned: 0,
    rowsSkipped: 0,
    headerRows: 0,
    dataRows: 0,
    rejectedRows: 0,
    records: 0,
    recordsWithRates: 0,
    recordsWithCellReferences: 0,
  };

  let state: ScanState = initialScanState();

  for (let rowIndex = profile.startRow; rowIndex < grid.rowCount; rowIndex++) {
    summary.rowsScanned++;
    state = enterRow(state, profile, rowIndex);

    const row = new SheetRow(grid, rowIndex, profile);
    const window = activeWindow(state, profile);

    if (window) {
      const header = captureHeader(row, window, profile.codeColumn);
      if (header !== null) {
        state = { ...state, currentHeader: header };
        summary.headerRows++;
        continue;
      }
    }

    const classification = classifyRow(row, profile, { window });

    if (classification.kind === "skip") {
      summary.rowsSkipped++;
      continue;
    }

    if (classification.kind === "section_header") {
      state = { ...state, currentSection: classification.text };
      summary.headerRows++;
      continue;
    }

    summary.dataRows++;
    const range = window && classification.rule === "range" ? detectRange(row, window) : null;
    const record = extractRecord(row, profile, { state, window, range });

    if (!record) {
      summary.rejectedRows++;
      continue;
    }

    records.push(record);
    if (record.rate !== null) {
      summary.recordsWithRates++;
    }
    if (record.rateTarget !== null) {
      summary.recordsWithCellReferences++;
    }
  }

  summary.records = records.length;

  logger.info("Sheet scan completed", { ...summary });

  return { records, summary };
}
