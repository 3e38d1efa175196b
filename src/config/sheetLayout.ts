// src/config/sheetLayout.ts
import type { MetadataField } from "../types/attainment";

// Fixed positions (1-indexed) shared by every assessment score sheet
const SHEET_LAYOUT = Object.freeze({
  metadataColumn: 3,
  metadataRows: Object.freeze({
    courseCode: 2,
    courseName: 3,
    facultyName: 4,
    academicYear: 5,
    classInfo: 6,
    regulation: 7,
    totalStudents: 8,
    assessmentName: 9,
  } satisfies Record<MetadataField, number>),
  headerRow: 11, // "CO" / "TOTAL" / question labels
  outcomeRow: 12, // outcome number under each "CO" column
  maxMarksRow: 13,
  firstDataRow: 14,
  firstMarksColumn: 4,
  regNoColumn: 2,
  nameColumn: 3,
});

export default SHEET_LAYOUT;
