// src/services/assessmentSheet.ts
import { readCellGrid } from "../lib/sheetReader";
import { SheetSource, sourceLabel } from "../lib/sheetSource";
import type { AssessmentSheet } from "../types/attainment";
import { extractSheetMetadata } from "./metadataExtractor";
import {
  extractOutcomeMaxima,
  extractStudentMarks,
  findOutcomeColumns,
  findTotalColumn,
} from "./marksExtractor";

/** Opens the source once and takes a read-only snapshot of everything downstream needs. */
export async function readAssessmentSheet(source: SheetSource): Promise<AssessmentSheet> {
  const grid = await readCellGrid(source);
  const outcomeColumns = findOutcomeColumns(grid);
  const totalColumn = findTotalColumn(grid);

  const { maxima, advisories: maximaAdvisories } = extractOutcomeMaxima(grid, outcomeColumns, totalColumn);
  const { students, advisories: studentAdvisories } = extractStudentMarks(grid, outcomeColumns, totalColumn);

  return Object.freeze({
    label: sourceLabel(source),
    metadata: Object.freeze(extractSheetMetadata(grid)),
    outcomeColumns: Object.freeze([...outcomeColumns]),
    totalColumn,
    students,
    maxima,
    advisories: Object.freeze([...maximaAdvisories, ...studentAdvisories]),
  });
}
