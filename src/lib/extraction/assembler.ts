import type { RangeWindow, SheetProfile } from "@/lib/extraction/profiles";
import type { SheetRow } from "@/lib/extraction/row";
import { collapseWhitespace, formatBound, isEmptyMarker } from "@/lib/extraction/text";
import type { ScanState } from "@/types/pricelist";

const RANGE_SEPARATOR = "-";
const NOT_EXCEEDING = "ne";

export interface DetectedRange {
  text: string;
  columns: readonly number[];
}

export function initialScanState(): ScanState {
  return { currentSection: null, currentHeader: null, windowIndex: null };
}

export function windowIndexAt(profile: SheetProfile, rowIndex: number): number | null {
  const index = profile.rangeWindows.findIndex(
    (window) => rowIndex >= window.startRow && rowIndex < window.endRow
  );
  return index === -1 ? null : index;
}

/**
 * Moves the scan state onto `rowIndex`. Entering, leaving or switching range
 * windows clears the stored range header.
 */
export function enterRow(state: ScanState, profile: SheetProfile, rowIndex: number): ScanState {
  const windowIndex = windowIndexAt(profile, rowIndex);
  if (windowIndex === state.windowIndex) {
    return state;
  }
  return { ...state, windowIndex, currentHeader: null };
}

export function activeWindow(state: ScanState, profile: SheetProfile): RangeWindow | null {
  return state.windowIndex === null ? null : (profile.rangeWindows[state.windowIndex] ?? null);
}

/**
 * `lower - upper` across the window's three range columns, or
 * `ne - upper` for "not exceeding".
 */
export function detectRange(row: SheetRow, window: RangeWindow): DetectedRange | null {
  const [lowerCol, separatorCol, upperCol] = window.rangeColumns;
  const lower = row.cell(lowerCol);
  const separator = row.cell(separatorCol);
  const upper = row.cell(upperCol);

  if (separator.text !== RANGE_SEPARATOR || !lower.text || !upper.text) {
    return null;
  }

  const upperText = formatBound(upper.value);
  const text =
    lower.text.toLowerCase() === NOT_EXCEEDING
      ? `not exceeding ${upperText}`
      : `${formatBound(lower.value)}-${upperText}`;

  return { text, columns: window.rangeColumns };
}

/** Returns the header text when the row is a long, keyword-bearing label with no code before it. */
export function captureHeader(row: SheetRow, window: RangeWindow, codeColumn: number): string | null {
  for (const col of window.headerColumns) {
    const text = row.text(col);
    if (text.length < window.minHeaderLength) {
      continue;
    }
    const lowered = text.toLowerCase();
    if (!window.headerKeywords.some((keyword) => lowered.includes(keyword))) {
      continue;
    }
    const code = row.text(codeColumn);
    if (col !== codeColumn && code && !isEmptyMarker(code)) {
      continue;
    }
    return collapseWhitespace(text);
  }
  return null;
}

export function fuseDescription(header: string, range: string, window: RangeWindow): string {
  const trimmed = header.trim();
  if (trimmed.endsWith(":")) {
    return `${trimmed} ${range} m`;
  }
  if (trimmed.toLowerCase().endsWith(window.label.toLowerCase())) {
    return `${trimmed}: ${range} m`;
  }
  return `${trimmed}; ${window.label}: ${range} m`;
}
