// src/services/mergeEngine.ts
import type { AssessmentRecords, MergedStudent } from "../types/attainment";

/**
 * Decides the merged value when a later assessment reports an outcome the
 * student already has a value for.
 */
export type OutcomeMergePolicy = (existing: number, incoming: number) => number;

// Default. Open with stakeholders: "keep first" vs "take max" was never settled.
export const keepFirst: OutcomeMergePolicy = (existing) => existing;

export const keepHighest: OutcomeMergePolicy = (existing, incoming) => Math.max(existing, incoming);

export const MERGE_POLICIES = {
  "first-wins": keepFirst,
  highest: keepHighest,
} as const;

export type MergePolicyName = keyof typeof MERGE_POLICIES;

export function isMergePolicyName(value: string): value is MergePolicyName {
  return Object.keys(MERGE_POLICIES).includes(value);
}

/**
 * One entry per registration number, walking assessments in the map's
 * iteration order. The name comes from the first assessment that lists
 * the student.
 */
export function mergeAssessmentRecords(
  records: AssessmentRecords,
  policy: OutcomeMergePolicy = keepFirst
): Map<string, MergedStudent> {
  const working = new Map<string, { regNo: string; name: string; outcomeMarks: Map<number, number> }>();

  for (const students of records.values()) {
    for (const [regNo, student] of students) {
      let entry = working.get(regNo);
      if (!entry) {
        entry = { regNo, name: student.name, outcomeMarks: new Map() };
        working.set(regNo, entry);
      }

      for (const [outcome, mark] of student.outcomeMarks) {
        const existing = entry.outcomeMarks.get(outcome);
        entry.outcomeMarks.set(outcome, existing === undefined ? mark : policy(existing, mark));
      }
    }
  }

  const merged = new Map<string, MergedStudent>();
  for (const [regNo, entry] of working) {
    merged.set(regNo, Object.freeze({ ...entry }));
  }
  return merged;
}
