import ExcelJS from "exceljs";

import { SheetGrid } from "@/lib/extraction/grid";
import { ExtractionError, type CellValue } from "@/types/pricelist";

export async function loadWorkbook(bytes: Uint8Array): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  // exceljs types its input as an ArrayBuffer
  const data = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(data).set(bytes);
  await workbook.xlsx.load(data);
  return workbook;
}

function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (typeof value === "boolean") {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  if ("error" in value) {
    return null;
  }
  if ("richText" in value) {
    return value.richText.map((run) => run.text).join("");
  }
  if ("formula" in value || "sharedFormula" in value) {
    return value.result === undefined ? null : toCellValue(value.result);
  }
  if ("hyperlink" in value) {
    return typeof value.text === "string" ? value.text : null;
  }
  return null;
}

export function gridFromWorksheet(worksheet: ExcelJS.Worksheet): SheetGrid {
  const values: CellValue[][] = [];
  const bold: boolean[][] = [];
  const columnCount = worksheet.columnCount;

  for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const rowValues: CellValue[] = [];
    const rowBold: boolean[] = [];
    for (let colNumber = 1; colNumber <= columnCount; colNumber++) {
      const cell = row.getCell(colNumber);
      // ExcelJS repeats the master value in every cell of a merged range
      if (cell.isMerged && cell.master !== cell) {
        rowValues.push(null);
        rowBold.push(false);
        continue;
      }
      rowValues.push(toCellValue(cell.value));
      rowBold.push(cell.font?.bold === true);
    }
    values.push(rowValues);
    bold.push(rowBold);
  }

  return new SheetGrid(worksheet.name, values, bold);
}

function findWorksheet(workbook: ExcelJS.Workbook, sheetName: string): ExcelJS.Worksheet | null {
  const wanted = sheetName.trim().toLowerCase();
  return workbook.worksheets.find((worksheet) => worksheet.name.trim().toLowerCase() === wanted) ?? null;
}

export function gridFromWorkbook(workbook: ExcelJS.Workbook, sheetName: string): SheetGrid {
  const worksheet = findWorksheet(workbook, sheetName);
  if (!worksheet) {
    throw new ExtractionError(`Worksheet "${sheetName}" not found`, "SHEET_NOT_FOUND", {
      sheetName,
      available: workbook.worksheets.map((sheet) => sheet.name),
    });
  }
  return gridFromWorksheet(worksheet);
}
