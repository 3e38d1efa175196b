// src/types/attainment.ts

export const REGULATIONS = ["R17", "R21", "R24"] as const;
export type Regulation = (typeof REGULATIONS)[number];

export const CATEGORIES = ["theory", "analytical", "integrated", "lab", "project"] as const;
export type Category = (typeof CATEGORIES)[number];

export const DEPT_TYPES = ["dept", "s&h", "default"] as const;
export type DeptType = (typeof DEPT_TYPES)[number];

export const ASSESSMENT_TYPES = [
  "IA1",
  "IA2",
  "Model",
  "Lab",
  "Review1",
  "Review2",
  "Review3",
  "Integrated",
] as const;
export type AssessmentType = (typeof ASSESSMENT_TYPES)[number];

export interface SheetMetadata {
  courseCode: string;
  courseName: string;
  facultyName: string;
  academicYear: string;
  classInfo: string;
  regulation: string;
  totalStudents: string;
  assessmentName: string;
}

export type MetadataField = keyof SheetMetadata;

export const METADATA_FIELDS = [
  "courseCode",
  "courseName",
  "facultyName",
  "academicYear",
  "classInfo",
  "regulation",
  "totalStudents",
  "assessmentName",
] as const satisfies readonly MetadataField[];

export interface OutcomeColumn {
  column: number;
  outcome: number;
}

export interface StudentMark {
  regNo: string;
  name: string;
  outcomeMarks: ReadonlyMap<number, number>;
  total: number;
}

export interface OutcomeMaxima {
  outcomeMax: ReadonlyMap<number, number>;
  totalMax: number;
}

export type CellAdvisory =
  | { kind: "non-numeric"; row: number; column: number; rawValue: string }
  | { kind: "duplicate-registration"; row: number; column: number; rawValue: string };

/** Read-only snapshot of one parsed input sheet. */
export interface AssessmentSheet {
  readonly label: string;
  readonly metadata: Readonly<SheetMetadata>;
  readonly outcomeColumns: readonly OutcomeColumn[];
  readonly totalColumn: number | null;
  readonly students: ReadonlyMap<string, StudentMark>;
  readonly maxima: OutcomeMaxima;
  readonly advisories: readonly CellAdvisory[];
}

/** Per-assessment records, iterated in caller order. */
export type AssessmentRecords = ReadonlyMap<AssessmentType, ReadonlyMap<string, StudentMark>>;

export interface MergedStudent {
  regNo: string;
  name: string;
  outcomeMarks: ReadonlyMap<number, number>;
}

export interface OutcomeColumnMap {
  outcome: number;
  // null: that assessment does not report this outcome
  columns: Readonly<Partial<Record<AssessmentType, number | null>>>;
}

export interface ColumnMapping {
  dataStartRow: number;
  regNoColumn: number;
  nameColumn: number;
  outcomeColumns: readonly OutcomeColumnMap[];
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
