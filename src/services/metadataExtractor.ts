// src/services/metadataExtractor.ts
import SHEET_LAYOUT from "../config/sheetLayout";
import type { CellGrid, CellValue } from "../lib/sheetReader";
import type { MetadataField, SheetMetadata } from "../types/attainment";

export function cellText(value: CellValue): string {
  if (value === null) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

/**
 * Reads the header block (column C, rows 2-9). Purely positional: a sheet
 * laid out differently yields empty or wrong values, never an error.
 */
export function extractSheetMetadata(grid: CellGrid): SheetMetadata {
  const read = (field: MetadataField) =>
    cellText(grid.value(SHEET_LAYOUT.metadataRows[field], SHEET_LAYOUT.metadataColumn));

  return {
    courseCode: read("courseCode"),
    courseName: read("courseName"),
    facultyName: read("facultyName"),
    academicYear: read("academicYear"),
    classInfo: read("classInfo"),
    regulation: read("regulation"),
    totalStudents: read("totalStudents"),
    assessmentName: read("assessmentName"),
  };
}
