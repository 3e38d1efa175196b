// src/services/templateProjector.ts
import type { Worksheet } from "exceljs";
import {
  ASSESSMENT_TYPES,
  AssessmentRecords,
  ColumnMapping,
  MergedStudent,
} from "../types/attainment";

export interface ProjectionSummary {
  rowsWritten: number;
  firstRow: number;
  lastRow: number;
}

export function byRegistrationNumber(a: MergedStudent, b: MergedStudent): number {
  return a.regNo < b.regNo ? -1 : a.regNo > b.regNo ? 1 : 0;
}

/**
 * Writes one row per merged student, ascending by registration number,
 * from the mapping's start row. Each (outcome, assessment) pair has its own
 * column, so marks come from that assessment's records rather than the
 * merged view. Only the addressed cells change.
 */
export function projectStudents(
  worksheet: Worksheet,
  mapping: ColumnMapping,
  merged: ReadonlyMap<string, MergedStudent>,
  records: AssessmentRecords
): ProjectionSummary {
  const students = [...merged.values()].sort(byRegistrationNumber);

  students.forEach((student, idx) => {
    const row = mapping.dataStartRow + idx;
    worksheet.getCell(row, mapping.regNoColumn).value = student.regNo;
    worksheet.getCell(row, mapping.nameColumn).value = student.name;

    for (const { outcome, columns } of mapping.outcomeColumns) {
      for (const assessment of ASSESSMENT_TYPES) {
        const column = columns[assessment];
        if (column === undefined || column === null) continue;

        const mark = records.get(assessment)?.get(student.regNo)?.outcomeMarks.get(outcome);
        if (mark === undefined) continue;
        worksheet.getCell(row, column).value = mark;
      }
    }
  });

  return {
    rowsWritten: students.length,
    firstRow: mapping.dataStartRow,
    lastRow: mapping.dataStartRow + students.length - 1,
  };
}
