import { fuseDescription, type DetectedRange } from "@/lib/extraction/assembler";
import { generateKeywords } from "@/lib/extraction/keywords";
import type { RangeWindow, SheetProfile } from "@/lib/extraction/profiles";
import type { SheetRow } from "@/lib/extraction/row";
import {
  collapseWhitespace,
  expandAbbreviations,
  firstMatchingRule,
  isEmptyMarker,
  parseNumericCell,
} from "@/lib/extraction/text";
import { DEFAULT_UNIT, looksLikeUnit, normalizeUnit } from "@/lib/extraction/units";
import type { CellRef, RawRecord, ScanState } from "@/types/pricelist";

const MAX_RATE = 1_000_000;

export interface ExtractContext {
  state: ScanState;
  window: RangeWindow | null;
  range: DetectedRange | null;
}

export interface ExtractedRate {
  rate: number | null;
  rateProvenance: CellRef | null;
  rateTarget: CellRef | null;
}

export function extractCode(row: SheetRow, profile: SheetProfile): string | null {
  const code = collapseWhitespace(row.codeCell().text);
  if (isEmptyMarker(code) || looksLikeUnit(code, profile.unitMatch)) {
    return null;
  }
  return code;
}

/**
 * Joins the description columns, leaving out unit tokens and numbers large
 * enough to be rates, then expands the profile's abbreviations. Returns null
 * when the result is too short to stand as a description.
 */
export function extractDescription(row: SheetRow, profile: SheetProfile): string | null {
  const parts: string[] = [];

  for (const cell of row.candidateDescriptionCells()) {
    if (!cell.text || isEmptyMarker(cell.text) || looksLikeUnit(cell.text, profile.unitMatch)) {
      continue;
    }
    const numeric = parseNumericCell(cell.value);
    if (numeric !== null && numeric > profile.descriptionNumberThreshold) {
      continue;
    }
    parts.push(cell.text);
  }

  const description = expandAbbreviations(parts.join(" "), profile.abbreviationTable);
  return description.length >= profile.minDescriptionLength ? description : null;
}

export function extractUnit(row: SheetRow, profile: SheetProfile, description: string): string {
  for (const cell of row.unitCandidateCells()) {
    if (looksLikeUnit(cell.text, profile.unitMatch)) {
      return normalizeUnit(cell.text);
    }
  }

  const inferred = firstMatchingRule(description, profile.unitRules);
  return inferred ? normalizeUnit(inferred) : DEFAULT_UNIT;
}

/**
 * First plausible rate left to right across the profile's rate columns. When
 * none qualifies the write-back target still points at the sheet's usual rate
 * column.
 */
export function extractRate(
  row: SheetRow,
  profile: SheetProfile,
  excludedColumns: readonly number[] = []
): ExtractedRate {
  const minimumOk = (value: number) => (profile.allowZeroRate ? value >= 0 : value > 0);

  for (const cell of row.rateCandidateCells()) {
    if (excludedColumns.includes(cell.col)) {
      continue;
    }
    const value = parseNumericCell(cell.value);
    if (value !== null && minimumOk(value) && value < MAX_RATE) {
      const ref = row.ref(cell.col);
      return { rate: value, rateProvenance: ref, rateTarget: ref };
    }
  }

  if (row.width === 0) {
    return { rate: null, rateProvenance: null, rateTarget: null };
  }
  const targetCol = Math.min(profile.defaultRateColumn, row.width - 1);
  return { rate: null, rateProvenance: null, rateTarget: row.ref(targetCol) };
}

export function inferSubcategory(
  description: string,
  profile: SheetProfile,
  currentSection: string | null
): string | null {
  if (currentSection && currentSection !== profile.defaultSubcategory) {
    return currentSection;
  }
  return firstMatchingRule(description, profile.subcategoryRules) ?? profile.defaultSubcategory ?? null;
}

export function extractRecord(row: SheetRow, profile: SheetProfile, context: ExtractContext): RawRecord | null {
  const { state, window, range } = context;

  const description =
    range && window && state.currentHeader
      ? fuseDescription(state.currentHeader, range.text, window)
      : extractDescription(row, profile);

  if (!description || description.length < profile.minDescriptionLength) {
    return null;
  }

  const subcategory = inferSubcategory(description, profile, state.currentSection);
  const { rate, rateProvenance, rateTarget } = extractRate(row, profile, range?.columns ?? []);

  return Object.freeze({
    code: extractCode(row, profile),
    description,
    unit: extractUnit(row, profile, description),
    rate,
    rateProvenance,
    rateTarget,
    category: profile.category,
    subcategory,
    sourceCell: row.ref(profile.codeColumn),
    keywords: generateKeywords(description, subcategory, profile.keywordTerms),
  });
}
