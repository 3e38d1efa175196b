// src/tests/sheetReader.test.ts
import fs from "fs";
import path from "path";
import * as ExcelJS from "exceljs";
import { SourceUnreadableError } from "../lib/errors";
import { fromBuffer, fromPath, sourceLabel } from "../lib/sheetSource";
import { activeWorksheet, openTemplateWorkbook, readCellGrid } from "../lib/sheetReader";
import { readAssessmentSheet } from "../services/assessmentSheet";
import { extractSheetMetadata } from "../services/metadataExtractor";
import {
  FixtureSheet,
  IA1_COLUMNS,
  buildSheetBuffer,
  makeTempDir,
  writeSheetFile,
  writeTemplateFile,
} from "./helpers/sheetFixtures";

const IA1: FixtureSheet = {
  columns: IA1_COLUMNS,
  students: [
    { regNo: "711719205001", name: "ABINAYA S", marks: [8, 26, 18, 44] },
    { regNo: "711719205002", name: "ADITHYA R", marks: [6, "N/A", 15, 15] },
  ],
};

describe("sheet sources", () => {
  it("labels path sources by file name", () => {
    expect(sourceLabel(fromPath("/tmp/uploads/ia1.xlsx"))).toBe("ia1.xlsx");
    expect(sourceLabel(fromBuffer(Buffer.from("x"), "ia1 upload"))).toBe("ia1 upload");
  });
});

describe("readCellGrid", () => {
  let dir: string;

  beforeAll(() => {
    dir = makeTempDir("sheet-reader-");
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads the same grid from a buffer and from a path", async () => {
    const buffer = await buildSheetBuffer(IA1);
    const filePath = await writeSheetFile(dir, "ia1.xlsx", IA1);

    const grids = [await readCellGrid(fromBuffer(buffer, "ia1.xlsx")), await readCellGrid(fromPath(filePath))];
    for (const grid of grids) {
      expect(grid.maxRow).toBe(15);
      expect(grid.maxColumn).toBe(7);
      expect(grid.value(2, 3)).toBe("C211");
      expect(grid.value(11, 5)).toBe("CO");
      expect(grid.value(12, 5)).toBe(1);
      expect(grid.value(14, 2)).toBe("711719205001");
      expect(grid.value(15, 5)).toBe("N/A");
      expect(grid.value(15, 6)).toBe(15);
      expect(grid.value(40, 40)).toBeNull();
      expect(grid.value(0, 1)).toBeNull();
    }
  });

  it("reads the active tab when it is not the first one", async () => {
    const buffer = await buildSheetBuffer({ ...IA1, leadingTabs: ["Cover", "Instructions"] });
    const grid = await readCellGrid(fromBuffer(buffer, "ia1.xlsx"));

    expect(grid.value(2, 3)).toBe("C211");
    expect(grid.value(14, 2)).toBe("711719205001");
  });

  it("returns cached formula results and header dates", async () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet("Marks");
    sheet.getCell(5, 3).value = new Date(Date.UTC(2021, 2, 15));
    sheet.getCell(14, 7).value = { formula: "SUM(E14:F14)", result: 44, date1904: false };
    const buffer = Buffer.from(await workbook.xlsx.writeBuffer());

    const grid = await readCellGrid(fromBuffer(buffer, "dated.xlsx"));

    expect(grid.value(14, 7)).toBe(44);
    expect(extractSheetMetadata(grid).academicYear).toBe("2021-03-15T00:00:00.000Z");
  });

  it("rejects bytes that are not a spreadsheet", async () => {
    const source = fromBuffer(Buffer.from("reg_no,name\n1,A\n"), "marks.csv");
    await expect(readCellGrid(source)).rejects.toThrow(SourceUnreadableError);
    await expect(readCellGrid(source)).rejects.toThrow("marks.csv is not a spreadsheet file");
  });

  it("reports a missing file", async () => {
    const missing = path.join(dir, "absent.xlsx");
    await expect(readCellGrid(fromPath(missing))).rejects.toThrow(`File not found: ${missing}`);
  });
});

describe("readAssessmentSheet", () => {
  it("takes a snapshot with marks, maxima and advisories", async () => {
    const sheet = await readAssessmentSheet(fromBuffer(await buildSheetBuffer(IA1), "ia1.xlsx"));

    expect(sheet.label).toBe("ia1.xlsx");
    expect(sheet.metadata.courseCode).toBe("C211");
    expect(sheet.metadata.assessmentName).toBe("INTERNAL ASSESSMENT-1");
    expect(sheet.outcomeColumns).toEqual([
      { column: 5, outcome: 1 },
      { column: 6, outcome: 2 },
    ]);
    expect(sheet.totalColumn).toBe(7);
    expect(sheet.maxima.outcomeMax).toEqual(new Map([[1, 30], [2, 20]]));
    expect(sheet.maxima.totalMax).toBe(50);
    expect(sheet.students.get("711719205001")?.outcomeMarks).toEqual(new Map([[1, 26], [2, 18]]));
    expect(sheet.students.get("711719205002")?.outcomeMarks).toEqual(new Map([[1, 0], [2, 15]]));
    expect(sheet.advisories).toEqual([{ kind: "non-numeric", row: 15, column: 5, rawValue: "N/A" }]);
    expect(Object.isFrozen(sheet)).toBe(true);
  });

  it("ignores cover tabs in front of the marks tab", async () => {
    const sheet = await readAssessmentSheet(
      fromBuffer(await buildSheetBuffer({ ...IA1, leadingTabs: ["Cover"] }), "ia1.xlsx")
    );

    expect(sheet.metadata.courseCode).toBe("C211");
    expect([...sheet.students.keys()]).toEqual(["711719205001", "711719205002"]);
  });
});

describe("openTemplateWorkbook", () => {
  it("opens an .xlsx template and picks its active sheet", async () => {
    const dir = makeTempDir("template-open-");
    const filePath = path.join(dir, "template.xlsx");
    await writeTemplateFile(filePath);

    const workbook = await openTemplateWorkbook(fromPath(filePath));
    const sheet = activeWorksheet(workbook);

    expect(sheet.name).toBe("Attainment");
    expect(sheet.getCell("A1").value).toBe("CO ATTAINMENT");
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rejects a non-xlsx template", async () => {
    await expect(openTemplateWorkbook(fromBuffer(Buffer.from("not a workbook"), "bad.xlsx"))).rejects.toThrow(
      "bad.xlsx is not an .xlsx workbook"
    );
  });
});
