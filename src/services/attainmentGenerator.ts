// src/services/attainmentGenerator.ts
import crypto from "crypto";
import fs from "fs";
import path from "path";
import {
  MissingInputError,
  UnknownCombinationError,
  ValidationFailedError,
} from "../lib/errors";
import { activeWorksheet, openTemplateWorkbook, saveWorkbook } from "../lib/sheetReader";
import { SheetSource, fromPath } from "../lib/sheetSource";
import type {
  AssessmentSheet,
  AssessmentType,
  ColumnMapping,
  StudentMark,
} from "../types/attainment";
import { getColumnMapping } from "../utils/columnMappingRegistry";
import type { TemplateRegistry } from "../utils/templateRegistry";
import { OutcomeMergePolicy, keepFirst, mergeAssessmentRecords } from "./mergeEngine";
import {
  detectAssessmentType,
  parseCategory,
  parseDeptType,
  parseRegulation,
} from "./regulationClassifier";
import { loadAssessmentSheets, validateSheets } from "./sheetValidator";
import { projectStudents } from "./templateProjector";

export interface GenerationRequest {
  regulation: string;
  category: string;
  deptType: string;
  inputs: Partial<Record<AssessmentType, SheetSource>>;
  registry: TemplateRegistry;
  outputDir: string;
  mergePolicy?: OutcomeMergePolicy;
  // overrides the registry's layout for this request
  columnMapping?: ColumnMapping;
  now?: Date;
}

export interface GenerationResult {
  file: string;
  fileName: string;
  studentsCount: number;
  rowsWritten: number;
  warnings: string[];
  courseCode: string;
  courseName: string;
}

const pad = (n: number) => String(n).padStart(2, "0");

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function keepFileNameChars(value: string): string {
  return value.replace(/[^\p{L}\p{N} _-]/gu, "");
}

export function buildOutputFileName(
  courseCode: string,
  courseName: string,
  regulation: string,
  now: Date
): string {
  const safeCode = keepFileNameChars(courseCode) || "UNKNOWN";
  const safeName = Array.from(keepFileNameChars(courseName)).slice(0, 50).join("") || "Course";
  return `${safeCode}_${safeName}_${regulation}_Attainment_${formatTimestamp(now)}.xlsx`;
}

const randomToken = () => crypto.randomBytes(4).toString("hex");

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/**
 * Claims the output name by creating it exclusively, so concurrent
 * generations never share a path. A taken name gets an 8-hex token.
 */
async function reserveOutputPath(outputDir: string, fileName: string): Promise<string> {
  let candidate = path.join(outputDir, fileName);
  for (;;) {
    try {
      const handle = await fs.promises.open(candidate, "wx");
      await handle.close();
      return candidate;
    } catch (err) {
      if (!isAlreadyExists(err)) throw err;
      candidate = path.join(outputDir, fileName.replace(/\.xlsx$/, `_${randomToken()}.xlsx`));
    }
  }
}

function slotWarnings(slots: readonly AssessmentType[], sheets: readonly AssessmentSheet[]): string[] {
  const warnings: string[] = [];
  sheets.forEach((sheet, i) => {
    const slot = slots[i];
    const detected = detectAssessmentType(sheet.metadata.assessmentName);
    if (detected !== "Unknown" && detected !== slot) {
      warnings.push(
        `${sheet.label} is named '${sheet.metadata.assessmentName}' (${detected}) but was supplied as ${slot}`
      );
    }
  });
  return warnings;
}

/**
 * Parse → validate → merge → project → save. Any failure throws and leaves
 * no artifact behind.
 */
export async function generateAttainmentSheet(request: GenerationRequest): Promise<GenerationResult> {
  const regulation = parseRegulation(request.regulation);
  if (!regulation) throw new UnknownCombinationError(`Unknown regulation: ${request.regulation}`);
  const category = parseCategory(request.category);
  if (!category) throw new UnknownCombinationError(`Unknown category: ${request.category} for ${regulation}`);
  const deptType = parseDeptType(request.deptType || "default");
  if (!deptType) throw new UnknownCombinationError(`Unknown department type: ${request.deptType}`);

  const { registry } = request;
  const slots = registry.requiredInputs(regulation, category);
  const sources = slots.map((slot) => {
    const source = request.inputs[slot];
    if (!source) throw new MissingInputError(`Missing file for ${slot}`);
    return source;
  });

  const loaded = await loadAssessmentSheets(sources);
  if (!loaded.result.isValid) {
    throw new ValidationFailedError(loaded.result.errors, loaded.result.warnings);
  }
  const { sheets } = loaded;

  const validation = validateSheets(sheets, regulation);
  if (!validation.isValid) {
    throw new ValidationFailedError(validation.errors, validation.warnings);
  }
  const warnings = [...validation.warnings, ...slotWarnings(slots, sheets)];

  const templatePath = registry.resolve(regulation, category, deptType);
  const mapping = request.columnMapping ?? getColumnMapping(regulation, category, deptType);

  const records = new Map<AssessmentType, ReadonlyMap<string, StudentMark>>();
  slots.forEach((slot, i) => records.set(slot, sheets[i].students));
  const merged = mergeAssessmentRecords(records, request.mergePolicy ?? keepFirst);

  const workbook = await openTemplateWorkbook(fromPath(templatePath));
  const summary = projectStudents(activeWorksheet(workbook), mapping, merged, records);

  const { courseCode, courseName } = sheets[0].metadata;
  const fileName = buildOutputFileName(courseCode, courseName, regulation, request.now ?? new Date());

  await fs.promises.mkdir(request.outputDir, { recursive: true });
  const file = await reserveOutputPath(request.outputDir, fileName);
  const partial = `${file}.${randomToken()}.partial`;
  try {
    await saveWorkbook(workbook, partial);
    await fs.promises.rename(partial, file);
  } catch (err) {
    await fs.promises.rm(partial, { force: true });
    await fs.promises.rm(file, { force: true });
    throw err;
  }

  console.log(`📄 Attainment sheet written: ${path.basename(file)} (${merged.size} students)`);

  return {
    file,
    fileName: path.basename(file),
    studentsCount: merged.size,
    rowsWritten: summary.rowsWritten,
    warnings,
    courseCode,
    courseName,
  };
}
