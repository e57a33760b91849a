import { detectRange } from "@/lib/extraction/assembler";
import type { RangeWindow, SheetProfile } from "@/lib/extraction/profiles";
import type { SheetRow } from "@/lib/extraction/row";
import { isEmptyMarker } from "@/lib/extraction/text";
import { looksLikeUnit } from "@/lib/extraction/units";
import type { RowClassification } from "@/types/pricelist";

export interface ClassifyContext {
  /** Range window the row falls in, if any. */
  window: RangeWindow | null;
}

/**
 * Decides whether a row is a section header, a data row or noise. Rules are
 * evaluated in priority order and the first match wins, so a bold row is a
 * header even when it also carries a code and description.
 */
export function classifyRow(row: SheetRow, profile: SheetProfile, context: ClassifyContext): RowClassification {
  if (row.nonEmptyCount() < profile.minNonEmptyCells) {
    return { kind: "skip", reason: "sparse" };
  }

  if (profile.boldHeaders) {
    const header = boldHeaderText(row, profile);
    if (header !== null) {
      return { kind: "section_header", text: header };
    }
  }

  const hasCode = hasCodeValue(row);

  if (context.window && hasCode && detectRange(row, context.window)) {
    return { kind: "data", rule: "range" };
  }

  if (hasCode && hasAnchorDescription(row, profile)) {
    return { kind: "data", rule: "anchor" };
  }

  if (hasKeywordHit(row, profile)) {
    return { kind: "data", rule: "keyword" };
  }

  return { kind: "skip", reason: "no_signal" };
}

export function boldHeaderText(row: SheetRow, profile: SheetProfile): string | null {
  const filled = row.headerScanCells().filter((cell) => cell.text);
  if (filled.length === 0) {
    return null;
  }
  if (!filled.every((cell) => row.isBold(cell.col))) {
    return null;
  }

  const label = filled.find((cell) => !looksLikeUnit(cell.text, profile.unitMatch));
  return label ? label.text : null;
}

function hasCodeValue(row: SheetRow): boolean {
  const code = row.codeCell().text;
  return code.length > 0 && !isEmptyMarker(code);
}

function hasAnchorDescription(row: SheetRow, profile: SheetProfile): boolean {
  return row
    .anchorDescriptionCells()
    .some(
      (cell) =>
        typeof cell.value === "string" &&
        cell.text.length >= profile.minAnchorLength &&
        !looksLikeUnit(cell.text, profile.unitMatch)
    );
}

function hasKeywordHit(row: SheetRow, profile: SheetProfile): boolean {
  if (profile.keywords.length === 0) {
    return false;
  }
  return row.keywordScanCells().some((cell) => {
    const lowered = cell.text.toLowerCase();
    return lowered.length > 0 && profile.keywords.some((keyword) => lowered.includes(keyword));
  });
}
