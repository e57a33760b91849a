import type { CellRef, CellValue } from "@/types/pricelist";

const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

export interface Grid {
  readonly sheetName: string;
  readonly rowCount: number;
  readonly colCount: number;
  valueAt(row: number, col: number): CellValue;
  isBold(row: number, col: number): boolean;
  cellAddress(row: number, col: number): string;
  sheetCellAddress(row: number, col: number): string;
}

/**
 * Spreadsheet column name for a zero-based index: 0 → A, 25 → Z, 26 → AA, 701 → ZZ, 702 → AAA.
 */
export function columnLetter(col: number): string {
  if (col < 26) {
    return LETTERS[col] ?? "";
  }
  return columnLetter(Math.floor(col / 26) - 1) + LETTERS[col % 26];
}

export function cellAddress(row: number, col: number): string {
  return `${columnLetter(col)}${row + 1}`;
}

export function formatCellRef(ref: CellRef): string {
  return `${ref.sheetName}!${cellAddress(ref.row, ref.col)}`;
}

/**
 * Read-only view over one materialised sheet. Reads outside the sheet return
 * the empty value so callers never special-case sheet edges.
 */
export class SheetGrid implements Grid {
  readonly rowCount: number;
  readonly colCount: number;

  constructor(
    readonly sheetName: string,
    private readonly values: readonly (readonly CellValue[])[],
    private readonly bold: readonly (readonly boolean[])[] = []
  ) {
    this.rowCount = values.length;
    this.colCount = values.reduce((max, row) => Math.max(max, row.length), 0);
  }

  valueAt(row: number, col: number): CellValue {
    if (row < 0 || col < 0) {
      return null;
    }
    return this.values[row]?.[col] ?? null;
  }

  isBold(row: number, col: number): boolean {
    if (row < 0 || col < 0) {
      return false;
    }
    return this.bold[row]?.[col] ?? false;
  }

  cellAddress(row: number, col: number): string {
    return cellAddress(row, col);
  }

  sheetCellAddress(row: number, col: number): string {
    return formatCellRef({ sheetName: this.sheetName, row, col });
  }
}
