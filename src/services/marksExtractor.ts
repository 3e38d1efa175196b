// src/services/marksExtractor.ts
import SHEET_LAYOUT from "../config/sheetLayout";
import type { CellGrid, CellValue } from "../lib/sheetReader";
import type { CellAdvisory, OutcomeColumn, OutcomeMaxima, StudentMark } from "../types/attainment";
import { cellText } from "./metadataExtractor";

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface ParsedMark {
  mark: number;
  // non-blank but not a number; coerced to 0
  malformed: boolean;
}

export function parseMark(value: CellValue): ParsedMark {
  if (value === null) return { mark: 0, malformed: false };
  if (typeof value === "number") {
    return Number.isFinite(value) ? { mark: value, malformed: false } : { mark: 0, malformed: true };
  }
  if (typeof value === "boolean") return { mark: value ? 1 : 0, malformed: false };
  if (value instanceof Date) return { mark: 0, malformed: true };

  const text = value.trim();
  if (text === "") return { mark: 0, malformed: false };
  if (NUMERIC.test(text)) return { mark: parseFloat(text), malformed: false };
  return { mark: 0, malformed: true };
}

function parseOutcomeNumber(value: CellValue): number | null {
  if (value === null || typeof value === "boolean") return null;
  const { mark, malformed } = parseMark(value);
  if (malformed || cellText(value) === "") return null;
  const outcome = Math.trunc(mark);
  return outcome > 0 ? outcome : null;
}

/**
 * Outcome subtotal columns: row 11 reads exactly "CO" and row 12 holds the
 * outcome number. Per-question columns never qualify.
 */
export function findOutcomeColumns(grid: CellGrid): OutcomeColumn[] {
  const columns: OutcomeColumn[] = [];
  for (let col = SHEET_LAYOUT.firstMarksColumn; col <= grid.maxColumn; col++) {
    const header = cellText(grid.value(SHEET_LAYOUT.headerRow, col)).toUpperCase();
    if (header !== "CO") continue;

    const outcome = parseOutcomeNumber(grid.value(SHEET_LAYOUT.outcomeRow, col));
    if (outcome !== null) columns.push({ column: col, outcome });
  }
  return columns;
}

export function findTotalColumn(grid: CellGrid): number | null {
  for (let col = SHEET_LAYOUT.firstMarksColumn; col <= grid.maxColumn; col++) {
    const header = cellText(grid.value(SHEET_LAYOUT.headerRow, col)).toUpperCase();
    if (header.includes("TOTAL")) return col;
  }
  return null;
}

function readMark(grid: CellGrid, row: number, column: number, advisories: CellAdvisory[]): number {
  const raw = grid.value(row, column);
  const { mark, malformed } = parseMark(raw);
  if (malformed) advisories.push({ kind: "non-numeric", row, column, rawValue: cellText(raw) });
  return mark;
}

export interface ExtractedStudents {
  students: Map<string, StudentMark>;
  advisories: CellAdvisory[];
}

export function extractStudentMarks(
  grid: CellGrid,
  outcomeColumns: readonly OutcomeColumn[] = findOutcomeColumns(grid),
  totalColumn: number | null = findTotalColumn(grid)
): ExtractedStudents {
  const students = new Map<string, StudentMark>();
  const advisories: CellAdvisory[] = [];

  for (let row = SHEET_LAYOUT.firstDataRow; row <= grid.maxRow; row++) {
    const regNo = cellText(grid.value(row, SHEET_LAYOUT.regNoColumn));
    const name = cellText(grid.value(row, SHEET_LAYOUT.nameColumn));
    if (!regNo || !name) continue;

    const outcomeMarks = new Map<number, number>();
    for (const { column, outcome } of outcomeColumns) {
      outcomeMarks.set(outcome, readMark(grid, row, column, advisories));
    }
    const total = totalColumn === null ? 0 : readMark(grid, row, totalColumn, advisories);

    // a repeated registration number keeps the later row
    if (students.has(regNo)) {
      advisories.push({ kind: "duplicate-registration", row, column: SHEET_LAYOUT.regNoColumn, rawValue: regNo });
    }
    students.set(regNo, { regNo, name, outcomeMarks, total });
  }

  return { students, advisories };
}

export interface ExtractedMaxima {
  maxima: OutcomeMaxima;
  advisories: CellAdvisory[];
}

export function extractOutcomeMaxima(
  grid: CellGrid,
  outcomeColumns: readonly OutcomeColumn[] = findOutcomeColumns(grid),
  totalColumn: number | null = findTotalColumn(grid)
): ExtractedMaxima {
  const advisories: CellAdvisory[] = [];
  const outcomeMax = new Map<number, number>();
  const row = SHEET_LAYOUT.maxMarksRow;

  for (const { column, outcome } of outcomeColumns) {
    outcomeMax.set(outcome, readMark(grid, row, column, advisories));
  }
  const totalMax = totalColumn === null ? 0 : readMark(grid, row, totalColumn, advisories);

  return { maxima: { outcomeMax, totalMax }, advisories };
}
