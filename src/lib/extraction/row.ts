import type { Grid } from "@/lib/extraction/grid";
import { cellText } from "@/lib/extraction/text";
import type { SheetProfile } from "@/lib/extraction/profiles";
import type { CellRef, CellValue } from "@/types/pricelist";

export interface RowCell {
  col: number;
  value: CellValue;
  text: string;
}

/**
 * Named access to one grid row, resolving the profile's column hints so the
 * classifier and extractor never index raw positions themselves.
 */
export class SheetRow {
  constructor(
    private readonly grid: Grid,
    readonly index: number,
    private readonly profile: SheetProfile
  ) {}

  get sheetName(): string {
    return this.grid.sheetName;
  }

  get width(): number {
    return this.grid.colCount;
  }

  value(col: number): CellValue {
    return this.grid.valueAt(this.index, col);
  }

  text(col: number): string {
    return cellText(this.value(col));
  }

  cell(col: number): RowCell {
    const value = this.value(col);
    return { col, value, text: cellText(value) };
  }

  isBold(col: number): boolean {
    return this.grid.isBold(this.index, col);
  }

  ref(col: number): CellRef {
    return { sheetName: this.grid.sheetName, row: this.index, col };
  }

  nonEmptyCount(): number {
    let count = 0;
    for (let col = 0; col < this.grid.colCount; col++) {
      if (this.text(col)) {
        count++;
      }
    }
    return count;
  }

  codeCell(): RowCell {
    return this.cell(this.profile.codeColumn);
  }

  headerScanCells(): RowCell[] {
    return this.cells(0, this.profile.headerScanColumns);
  }

  anchorDescriptionCells(): RowCell[] {
    return this.profile.anchorDescriptionColumns.map((col) => this.cell(col));
  }

  keywordScanCells(): RowCell[] {
    return this.cells(0, this.profile.keywordScanColumns);
  }

  candidateDescriptionCells(): RowCell[] {
    const { start, count } = this.profile.descriptionColumns;
    return this.cells(start, count);
  }

  unitCandidateCells(): RowCell[] {
    return this.profile.unitColumns.map((col) => this.cell(col));
  }

  rateCandidateCells(): RowCell[] {
    const { start, end } = this.profile.rateColumns;
    return this.cells(start, Math.max(0, end - start));
  }

  private cells(start: number, count: number): RowCell[] {
    const cells: RowCell[] = [];
    for (let col = start; col < start + count; col++) {
      cells.push(this.cell(col));
    }
    return cells;
  }
}
