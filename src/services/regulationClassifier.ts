// src/services/regulationClassifier.ts
import {
  AssessmentType,
  CATEGORIES,
  Category,
  DEPT_TYPES,
  DeptType,
  REGULATIONS,
  Regulation,
} from "../types/attainment";

/**
 * "R2017 - AUC" → "R17", "Regulation 2021" → "R21", "R17" → "R17".
 * Anything without a two-digit year is returned uppercased, unchanged,
 * and will fail the regulation comparison downstream.
 */
export function normalizeRegulation(text: string): string {
  const upper = String(text).toUpperCase();
  const match = upper.match(/R?(?:20)?(\d{2})/);
  return match ? `R${match[1]}` : upper;
}

/**
 * Ordered keyword rules, first match wins. The digit checks look at the
 * whole name, so "REVIEW OF UNIT 10" reads as Review1.
 */
export function detectAssessmentType(text: string): AssessmentType | "Unknown" {
  const name = String(text).toUpperCase();

  if (name.includes("INTERNAL") || name.includes("IA")) {
    if (name.includes("1")) return "IA1";
    if (name.includes("2")) return "IA2";
    return "Unknown";
  }
  if (name.includes("MODEL")) return "Model";
  if (name.includes("LAB") || name.includes("LABORATORY")) return "Lab";
  if (name.includes("PROJECT") || name.includes("REVIEW")) {
    if (name.includes("1")) return "Review1";
    if (name.includes("2")) return "Review2";
    if (name.includes("3")) return "Review3";
    return "Unknown";
  }
  if (name.includes("INTEGRATED")) return "Integrated";

  return "Unknown";
}

export function parseRegulation(text: string): Regulation | null {
  const upper = String(text).trim().toUpperCase();
  return REGULATIONS.find((r) => r === upper) ?? null;
}

export function parseCategory(text: string): Category | null {
  const lower = String(text).trim().toLowerCase();
  return CATEGORIES.find((c) => c === lower) ?? null;
}

export function parseDeptType(text: string): DeptType | null {
  const lower = String(text).trim().toLowerCase();
  return DEPT_TYPES.find((d) => d === lower) ?? null;
}
