import type ExcelJS from "exceljs";

import { scanSheet } from "@/lib/extraction/engine";
import { applyEnrichment } from "@/lib/extraction/enrichment";
import { expandShortDescriptions, loadDescriptionExpansions, type DescriptionExpansions } from "@/lib/extraction/expansions";
import type { SheetGrid } from "@/lib/extraction/grid";
import { loadSheetProfiles, type SheetProfile } from "@/lib/extraction/profiles";
import { reconcile } from "@/lib/extraction/reconcile";
import { gridFromWorkbook } from "@/lib/extraction/workbook";
import { logger } from "@/lib/logger";
import {
  ExtractionError,
  type CanonicalRecord,
  type Enricher,
  type RawRecord,
  type ReconcileSummary,
  type ScanSummary,
} from "@/types/pricelist";

export interface BuildPricelistOptions {
  profiles?: readonly SheetProfile[];
  enrich?: Enricher;
  batchSize?: number;
  /** Expand short descriptions from the dictionary before enrichment. Defaults to true. */
  expandDescriptions?: boolean;
  descriptionExpansions?: DescriptionExpansions;
  /** Extra category → code prefix overrides, applied over the profiles' own. */
  categoryPrefixes?: Record<string, string>;
}

export interface PricelistResult {
  records: CanonicalRecord[];
  sheets: ScanSummary[];
  skippedSheets: string[];
  reconciliation: ReconcileSummary;
}

function prefixOverrides(profiles: readonly SheetProfile[], extra: Record<string, string> = {}): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const profile of profiles) {
    if (profile.codePrefix) {
      overrides[profile.category] = profile.codePrefix;
    }
  }
  return { ...overrides, ...extra };
}

function readGrid(workbook: ExcelJS.Workbook, sheetName: string): SheetGrid | null {
  try {
    return gridFromWorkbook(workbook, sheetName);
  } catch (error) {
    if (error instanceof ExtractionError && error.code === "SHEET_NOT_FOUND") {
      logger.warn("Worksheet not found; skipping profile", error.context);
      return null;
    }
    throw error;
  }
}

async function extractSheet(
  grid: SheetGrid,
  profile: SheetProfile,
  options: BuildPricelistOptions
): Promise<{ records: RawRecord[]; summary: ScanSummary }> {
  const scan = scanSheet(grid, profile);
  const { summary } = scan;
  const records =
    options.expandDescriptions === false
      ? scan.records
      : expandShortDescriptions(scan.records, options.descriptionExpansions ?? loadDescriptionExpansions());
  if (!options.enrich || records.length === 0) {
    return { records, summary };
  }
  const enriched = await applyEnrichment(records, grid.sheetName, options.enrich, {
    batchSize: options.batchSize,
  });
  return { records: enriched, summary };
}

/**
 * Runs every configured sheet profile against the workbook, then reconciles
 * the per-sheet records into one canonical pricelist. Sheets are independent
 * and processed concurrently; profiles whose sheet is absent are skipped.
 */
export async function buildPricelist(
  workbook: ExcelJS.Workbook,
  options: BuildPricelistOptions = {}
): Promise<PricelistResult> {
  const profiles = options.profiles ?? loadSheetProfiles();
  const skippedSheets: string[] = [];
  const jobs: Promise<{ records: RawRecord[]; summary: ScanSummary }>[] = [];

  for (const profile of profiles) {
    const grid = readGrid(workbook, profile.sheetName);
    if (!grid) {
      skippedSheets.push(profile.sheetName);
      continue;
    }
    jobs.push(extractSheet(grid, profile, options));
  }

  const results = await Promise.all(jobs);
  const { records, summary } = reconcile(
    results.map((result) => result.records),
    { categoryPrefixes: prefixOverrides(profiles, options.categoryPrefixes) }
  );
  const sheets = results.map((result) => result.summary);

  logger.info("Pricelist extraction completed", {
    sheetsProcessed: sheets.length,
    skippedSheets,
    rowsScanned: sheets.reduce((total, sheet) => total + sheet.rowsScanned, 0),
    rowsSkipped: sheets.reduce((total, sheet) => total + sheet.rowsSkipped, 0),
    headerRows: sheets.reduce((total, sheet) => total + sheet.headerRows, 0),
    recordsWithRates: records.filter((record) => record.rate !== null).length,
    recordsWithCellReferences: records.filter((record) => record.rateTarget !== null).length,
    ...summary,
  });

  return { records, sheets, skippedSheets, reconciliation: summary };
}
