// src/lib/sheetReader.ts
import * as XLSX from "xlsx";
import * as ExcelJS from "exceljs";
import { SheetSource, openForRead, sourceLabel } from "./sheetSource";
import { SourceUnreadableError } from "./errors";

export type CellValue = string | number | boolean | Date | null;

/** 1-indexed, read-only view over the active worksheet of a workbook. */
export interface CellGrid {
  readonly maxRow: number;
  readonly maxColumn: number;
  value(row: number, column: number): CellValue;
}

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const CFB_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0];

function startsWith(bytes: Buffer, signature: number[]): boolean {
  return bytes.length >= signature.length && signature.every((b, i) => bytes[i] === b);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function loadWorkbook(bytes: Buffer, label: string): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(bytes);
  } catch (err) {
    throw new SourceUnreadableError(`Cannot open ${label}: ${describe(err)}`);
  }
  return workbook;
}

// Formulas give their cached result; rich text and hyperlinks give their text
function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return value;
  if ("formula" in value || "sharedFormula" in value) return toCellValue(value.result ?? null);
  if ("richText" in value) return value.richText.map((run) => run.text).join("");
  if ("hyperlink" in value) return value.text;
  return value.error;
}

function gridFromWorksheet(sheet: ExcelJS.Worksheet): CellGrid {
  return {
    maxRow: sheet.rowCount,
    maxColumn: sheet.columnCount,
    value(row: number, column: number): CellValue {
      if (row < 1 || column < 1) return null;
      const cell = sheet.findCell(row, column);
      if (!cell) return null;
      // only the top-left cell of a merged range holds the value
      if (cell.isMerged && cell.master.address !== cell.address) return null;
      return toCellValue(cell.value);
    },
  };
}

function legacyCellValue(cell: XLSX.CellObject | undefined): CellValue {
  if (!cell) return null;
  if (cell.t === "z") return null;
  // error cells keep their display text (#N/A, #DIV/0! ...)
  if (cell.t === "e") return cell.w ?? "#ERROR";
  return cell.v ?? null;
}

// BIFF workbooks: the reader does not report the active tab, so the first sheet is used
function gridFromLegacyWorkbook(bytes: Buffer, label: string): CellGrid {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: "buffer", cellFormula: false, cellHTML: false, cellDates: true });
  } catch (err) {
    throw new SourceUnreadableError(`Cannot open ${label}: ${describe(err)}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) throw new SourceUnreadableError(`${label} has no worksheet`);

  let maxRow = 0;
  let maxColumn = 0;
  const ref = sheet["!ref"];
  if (ref) {
    const range = XLSX.utils.decode_range(ref);
    maxRow = range.e.r + 1;
    maxColumn = range.e.c + 1;
  }
  // dimension records written by some tools understate the used range
  for (const key of Object.keys(sheet)) {
    if (key.startsWith("!")) continue;
    const addr = XLSX.utils.decode_cell(key);
    maxRow = Math.max(maxRow, addr.r + 1);
    maxColumn = Math.max(maxColumn, addr.c + 1);
  }

  return {
    maxRow,
    maxColumn,
    value(row: number, column: number): CellValue {
      if (row < 1 || column < 1) return null;
      const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r: row - 1, c: column - 1 })];
      return legacyCellValue(cell);
    },
  };
}

/**
 * Computed-values mode over the active worksheet: formulas come back as
 * their last cached result. Accepts OOXML (.xlsx) and legacy BIFF (.xls).
 */
export async function readCellGrid(source: SheetSource): Promise<CellGrid> {
  const label = sourceLabel(source);
  const bytes = openForRead(source);

  if (startsWith(bytes, CFB_SIGNATURE)) return gridFromLegacyWorkbook(bytes, label);
  if (!startsWith(bytes, ZIP_SIGNATURE)) {
    throw new SourceUnreadableError(`${label} is not a spreadsheet file`);
  }

  const workbook = await loadWorkbook(bytes, label);
  return gridFromWorksheet(activeWorksheet(workbook, label));
}

/**
 * Formulas-preserved mode for templates: untouched formulas and styles
 * survive a later save. Only OOXML is supported here.
 */
export async function openTemplateWorkbook(source: SheetSource): Promise<ExcelJS.Workbook> {
  const label = sourceLabel(source);
  const bytes = openForRead(source);

  if (!startsWith(bytes, ZIP_SIGNATURE)) {
    throw new SourceUnreadableError(`${label} is not an .xlsx workbook`);
  }
  return loadWorkbook(bytes, label);
}

export function activeWorksheet(workbook: ExcelJS.Workbook, label = "Workbook"): ExcelJS.Worksheet {
  const activeTab = workbook.views?.[0]?.activeTab ?? 0;
  const sheet = workbook.worksheets[activeTab] ?? workbook.worksheets[0];
  if (!sheet) throw new SourceUnreadableError(`${label} has no worksheet`);
  return sheet;
}

export async function saveWorkbook(workbook: ExcelJS.Workbook, filePath: string): Promise<void> {
  await workbook.xlsx.writeFile(filePath);
}
