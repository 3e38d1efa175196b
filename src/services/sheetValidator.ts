// src/services/sheetValidator.ts
import { SourceUnreadableError } from "../lib/errors";
import { SheetSource, sourceLabel } from "../lib/sheetSource";
import type { AssessmentSheet, CellAdvisory, MetadataField, ValidationResult } from "../types/attainment";
import { readAssessmentSheet } from "./assessmentSheet";
import { normalizeRegulation } from "./regulationClassifier";

// Must match across every sheet; a mismatch blocks generation
const REQUIRED_MATCH_FIELDS: MetadataField[] = ["courseCode", "courseName", "facultyName", "regulation"];

// Should match; a mismatch is only reported
const RECOMMENDED_MATCH_FIELDS: MetadataField[] = ["academicYear", "classInfo"];

const FIELD_LABELS: Record<MetadataField, string> = {
  courseCode: "course code",
  courseName: "course name",
  facultyName: "faculty name",
  academicYear: "academic year",
  classInfo: "class",
  regulation: "regulation",
  totalStudents: "total students",
  assessmentName: "assessment name",
};

function toResult(errors: string[], warnings: string[]): ValidationResult {
  return { isValid: errors.length === 0, errors, warnings };
}

function comparable(value: string): string {
  return value.trim().toUpperCase();
}

export interface LoadedSheets {
  sheets: AssessmentSheet[];
  result: ValidationResult;
}

/**
 * Gate step: every source must open. All failures are reported together,
 * and any failure means nothing else can be checked.
 */
export async function loadAssessmentSheets(sources: readonly SheetSource[]): Promise<LoadedSheets> {
  if (sources.length === 0) {
    return { sheets: [], result: toResult(["No files provided for validation"], []) };
  }

  const sheets: AssessmentSheet[] = [];
  const errors: string[] = [];
  for (const source of sources) {
    try {
      sheets.push(await readAssessmentSheet(source));
    } catch (err) {
      if (!(err instanceof SourceUnreadableError)) throw err;
      errors.push(`Error reading ${sourceLabel(source)}: ${err.message}`);
    }
  }

  return { sheets, result: toResult(errors, []) };
}

export function validateConsistency(sheets: readonly AssessmentSheet[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const [reference, ...others] = sheets;
  if (!reference) return toResult(errors, warnings);

  const describe = (field: MetadataField, other: AssessmentSheet) =>
    `'${reference.metadata[field]}' (in ${reference.label}) vs '${other.metadata[field]}' (in ${other.label})`;

  for (const other of others) {
    for (const field of REQUIRED_MATCH_FIELDS) {
      if (comparable(reference.metadata[field]) !== comparable(other.metadata[field])) {
        errors.push(`Mismatch in ${FIELD_LABELS[field]}: ${describe(field, other)}`);
      }
    }
  }

  for (const other of others) {
    for (const field of RECOMMENDED_MATCH_FIELDS) {
      if (comparable(reference.metadata[field]) !== comparable(other.metadata[field])) {
        warnings.push(`Difference in ${FIELD_LABELS[field]}: ${describe(field, other)}`);
      }
    }
  }

  return toResult(errors, warnings);
}

export function validateRegulation(
  sheets: readonly AssessmentSheet[],
  expectedRegulation: string
): ValidationResult {
  const errors: string[] = [];
  const expected = normalizeRegulation(expectedRegulation);

  for (const sheet of sheets) {
    const actual = normalizeRegulation(sheet.metadata.regulation);
    if (actual !== expected) {
      errors.push(`Regulation mismatch in ${sheet.label}: expected ${expected}, found ${actual}`);
    }
  }

  return toResult(errors, []);
}

/** Partial rosters are normal (absentees), so this only ever warns. */
export function validateStudentRoster(sheets: readonly AssessmentSheet[]): ValidationResult {
  const warnings: string[] = [];
  if (sheets.length < 2) return toResult([], warnings);

  const allRegNos = new Set<string>();
  for (const sheet of sheets) {
    for (const regNo of sheet.students.keys()) allRegNos.add(regNo);
  }

  const ordered = [...allRegNos].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  for (const regNo of ordered) {
    const missingFrom = sheets.filter((s) => !s.students.has(regNo)).map((s) => s.label);
    if (missingFrom.length) {
      warnings.push(`Student ${regNo} missing from: ${missingFrom.join(", ")}`);
    }
  }

  return toResult([], warnings);
}

export function validateMarksRange(sheet: AssessmentSheet): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const student of sheet.students.values()) {
    for (const [outcome, mark] of student.outcomeMarks) {
      const max = sheet.maxima.outcomeMax.get(outcome) ?? 0;
      if (mark < 0) {
        errors.push(`Negative marks for ${student.regNo} in CO${outcome}: ${mark} (in ${sheet.label})`);
      } else if (max > 0 && mark > max) {
        warnings.push(`Marks exceed max for ${student.regNo} in CO${outcome}: ${mark} > ${max} (in ${sheet.label})`);
      }
    }
  }

  return toResult(errors, warnings);
}

function describeAdvisory(advisory: CellAdvisory, label: string): string {
  switch (advisory.kind) {
    case "non-numeric":
      return `Non-numeric value '${advisory.rawValue}' at row ${advisory.row}, column ${advisory.column} in ${label} was treated as 0`;
    case "duplicate-registration":
      return `Registration number ${advisory.rawValue} repeated at row ${advisory.row} in ${label}; the later row was used`;
  }
}

export function collectCellAdvisories(sheet: AssessmentSheet): ValidationResult {
  return toResult(
    [],
    sheet.advisories.map((a) => describeAdvisory(a, sheet.label))
  );
}

/**
 * Everything after the readability gate. Problems are collected, not
 * fail-fast, so one pass reports every issue.
 */
export function validateSheets(
  sheets: readonly AssessmentSheet[],
  expectedRegulation?: string
): ValidationResult {
  const steps: ValidationResult[] = [validateConsistency(sheets)];

  if (expectedRegulation?.trim()) {
    steps.push(validateRegulation(sheets, expectedRegulation));
  }
  steps.push(validateStudentRoster(sheets));
  for (const sheet of sheets) {
    steps.push(validateMarksRange(sheet));
    steps.push(collectCellAdvisories(sheet));
  }

  return toResult(
    steps.flatMap((s) => s.errors),
    steps.flatMap((s) => s.warnings)
  );
}

export async function validateAll(
  sources: readonly SheetSource[],
  expectedRegulation?: string
): Promise<ValidationResult> {
  const { sheets, result } = await loadAssessmentSheets(sources);
  if (!result.isValid) return result;
  return validateSheets(sheets, expectedRegulation);
}
