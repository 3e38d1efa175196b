// src/tests/helpers/sheetFixtures.ts
import fs from "fs";
import os from "os";
import path from "path";
import * as ExcelJS from "exceljs";
import SHEET_LAYOUT from "../../config/sheetLayout";
import type { CellGrid, CellValue } from "../../lib/sheetReader";
import { METADATA_FIELDS } from "../../types/attainment";
import type {
  AssessmentSheet,
  CellAdvisory,
  MetadataField,
  SheetMetadata,
  StudentMark,
} from "../../types/attainment";

type FixtureValue = string | number | null;

export interface FixtureColumn {
  header: FixtureValue; // row 11
  outcome?: FixtureValue; // row 12
  max?: FixtureValue; // row 13
}

export interface FixtureStudent {
  regNo: FixtureValue;
  name: FixtureValue;
  marks: FixtureValue[]; // one per fixture column, from column D
}

export interface FixtureSheet {
  // tabs placed before the marks tab, which is then saved as the active tab
  leadingTabs?: string[];
  metadata?: Partial<Record<MetadataField, FixtureValue>>;
  columns: FixtureColumn[];
  students: FixtureStudent[];
}

export const BASE_METADATA: SheetMetadata = {
  courseCode: "C211",
  courseName: "COMPUTER ARCHITECTURE",
  facultyName: "TEST FACULTY",
  academicYear: "2020-2021 (EVEN)",
  classInfo: "B.TECH.IT (2ND YEAR)",
  regulation: "R2017 - AUC",
  totalStudents: "5",
  assessmentName: "INTERNAL ASSESSMENT-1",
};

export function buildSheetWorkbook(fixture: FixtureSheet): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const leadingTabs = fixture.leadingTabs ?? [];
  for (const name of leadingTabs) {
    workbook.addWorksheet(name).getCell(SHEET_LAYOUT.metadataRows.courseCode, SHEET_LAYOUT.metadataColumn).value =
      `${name} page`;
  }
  const sheet = workbook.addWorksheet("Marks");
  if (leadingTabs.length) {
    workbook.views = [
      { x: 0, y: 0, width: 10000, height: 20000, firstSheet: 0, activeTab: leadingTabs.length, visibility: "visible" },
    ];
  }
  const metadata = { ...BASE_METADATA, ...fixture.metadata };

  const put = (row: number, col: number, value: FixtureValue | undefined) => {
    if (value !== null && value !== undefined) sheet.getCell(row, col).value = value;
  };

  for (const field of METADATA_FIELDS) {
    const row = SHEET_LAYOUT.metadataRows[field];
    put(row, 2, field);
    put(row, SHEET_LAYOUT.metadataColumn, metadata[field]);
  }

  fixture.columns.forEach((col, i) => {
    const c = SHEET_LAYOUT.firstMarksColumn + i;
    put(SHEET_LAYOUT.headerRow, c, col.header);
    put(SHEET_LAYOUT.outcomeRow, c, col.outcome);
    put(SHEET_LAYOUT.maxMarksRow, c, col.max);
  });

  fixture.students.forEach((student, i) => {
    const r = SHEET_LAYOUT.firstDataRow + i;
    put(r, 1, i + 1);
    put(r, SHEET_LAYOUT.regNoColumn, student.regNo);
    put(r, SHEET_LAYOUT.nameColumn, student.name);
    student.marks.forEach((mark, j) => put(r, SHEET_LAYOUT.firstMarksColumn + j, mark));
  });

  return workbook;
}

export async function buildSheetBuffer(fixture: FixtureSheet): Promise<Buffer> {
  return Buffer.from(await buildSheetWorkbook(fixture).xlsx.writeBuffer());
}

export async function writeSheetFile(dir: string, fileName: string, fixture: FixtureSheet): Promise<string> {
  const filePath = path.join(dir, fileName);
  fs.mkdirSync(dir, { recursive: true });
  await buildSheetWorkbook(fixture).xlsx.writeFile(filePath);
  return filePath;
}

// Q1 (CO1 question) | CO 1 | CO 2 | TOTAL
export const IA1_COLUMNS: FixtureColumn[] = [
  { header: "Q1", outcome: 1, max: 10 },
  { header: "CO", outcome: 1, max: 30 },
  { header: "CO", outcome: 2, max: 20 },
  { header: "TOTAL", max: 50 },
];

export const IA2_COLUMNS: FixtureColumn[] = [
  { header: "CO", outcome: 3, max: 30 },
  { header: "CO", outcome: 4, max: 20 },
  { header: "TOTAL", max: 50 },
];

export const MODEL_COLUMNS: FixtureColumn[] = [
  { header: "CO", outcome: 1, max: 20 },
  { header: "CO", outcome: 2, max: 20 },
  { header: "CO", outcome: 3, max: 20 },
  { header: "CO", outcome: 4, max: 20 },
  { header: "CO", outcome: 5, max: 20 },
  { header: "TOTAL", max: 100 },
];

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Attainment template: header text, a bold title and one formula per data row. */
export async function writeTemplateFile(filePath: string, formulaRows = 10): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Attainment");
  sheet.getCell("A1").value = "CO ATTAINMENT";
  sheet.getCell("A1").font = { bold: true, size: 14 };
  sheet.getCell(5, 2).value = "Reg No";
  sheet.getCell(5, 3).value = "Name";
  for (let r = 7; r < 7 + formulaRows; r++) {
    sheet.getCell(r, 22).value = { formula: `SUM(D${r},E${r})`, date1904: false };
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await workbook.xlsx.writeFile(filePath);
}

export function stubGrid(cells: Array<[number, number, CellValue]>): CellGrid {
  const values = new Map<string, CellValue>();
  let maxRow = 0;
  let maxColumn = 0;
  for (const [row, col, value] of cells) {
    values.set(`${row},${col}`, value);
    maxRow = Math.max(maxRow, row);
    maxColumn = Math.max(maxColumn, col);
  }
  return {
    maxRow,
    maxColumn,
    value: (row, col) => values.get(`${row},${col}`) ?? null,
  };
}

export function student(regNo: string, name: string, marks: Record<number, number>, total = 0): StudentMark {
  return {
    regNo,
    name,
    outcomeMarks: new Map<number, number>(Object.entries(marks).map(([k, v]) => [Number(k), v])),
    total,
  };
}

export function makeSheet(
  label: string,
  students: StudentMark[],
  options: {
    metadata?: Partial<SheetMetadata>;
    outcomeMax?: Record<number, number>;
    advisories?: CellAdvisory[];
  } = {}
): AssessmentSheet {
  return {
    label,
    metadata: { ...BASE_METADATA, ...options.metadata },
    outcomeColumns: [],
    totalColumn: null,
    students: new Map<string, StudentMark>(students.map((s) => [s.regNo, s])),
    maxima: {
      outcomeMax: new Map<number, number>(Object.entries(options.outcomeMax ?? {}).map(([k, v]) => [Number(k), v])),
      totalMax: 0,
    },
    advisories: options.advisories ?? [],
  };
}
