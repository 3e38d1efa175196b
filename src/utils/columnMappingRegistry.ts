// src/utils/columnMappingRegistry.ts
import { UnknownCombinationError } from "../lib/errors";
import type { Category, ColumnMapping, DeptType, OutcomeColumnMap, Regulation } from "../types/attainment";

const DATA_START_ROW = 7;
const REG_NO_COLUMN = 2;
const NAME_COLUMN = 3;

function layout(outcomeColumns: OutcomeColumnMap[]): ColumnMapping {
  return Object.freeze({
    dataStartRow: DATA_START_ROW,
    regNoColumn: REG_NO_COLUMN,
    nameColumn: NAME_COLUMN,
    outcomeColumns: Object.freeze(outcomeColumns.map((o) => Object.freeze({ ...o, columns: Object.freeze({ ...o.columns }) }))),
  });
}

// IA1 covers CO1-2, IA2 covers CO3-4, the end exam covers all five
const THEORY_R17 = layout([
  { outcome: 1, columns: { IA1: 4, Model: 5 } },
  { outcome: 2, columns: { IA1: 8, Model: 9 } },
  { outcome: 3, columns: { IA2: 12, Model: 13 } },
  { outcome: 4, columns: { IA2: 16, Model: 17 } },
  { outcome: 5, columns: { Model: 20 } },
]);

// R21 onwards: the integrated exam sits where the model exam did
const THEORY_R21 = layout([
  { outcome: 1, columns: { IA1: 4, Integrated: 5 } },
  { outcome: 2, columns: { IA1: 8, Integrated: 9 } },
  { outcome: 3, columns: { IA2: 12, Integrated: 13 } },
  { outcome: 4, columns: { IA2: 16, Integrated: 17 } },
  { outcome: 5, columns: { Integrated: 20 } },
]);

const LAB = layout([
  { outcome: 1, columns: { Lab: 4 } },
  { outcome: 2, columns: { Lab: 5 } },
  { outcome: 3, columns: { Lab: 6 } },
  { outcome: 4, columns: { Lab: 7 } },
  { outcome: 5, columns: { Lab: 8 } },
]);

const PROJECT = layout([
  { outcome: 1, columns: { Review1: 4, Review2: 8, Review3: 12 } },
  { outcome: 2, columns: { Review1: 5, Review2: 9, Review3: 13 } },
  { outcome: 3, columns: { Review1: 6, Review2: 10, Review3: 14 } },
  { outcome: 4, columns: { Review1: 7, Review2: 11, Review3: 15 } },
  { outcome: 5, columns: { Review1: null, Review2: null, Review3: null } },
]);

type MappingTable = Readonly<Partial<Record<Category, Readonly<Partial<Record<DeptType, ColumnMapping>>>>>>;

const R21_TABLE: MappingTable = {
  theory: { dept: THEORY_R21, "s&h": THEORY_R21 },
  analytical: { dept: THEORY_R21, "s&h": THEORY_R21 },
  integrated: { dept: THEORY_R21, "s&h": THEORY_R21 },
  lab: { default: LAB },
  project: { default: PROJECT },
};

export const COLUMN_MAPPINGS: Readonly<Record<Regulation, MappingTable>> = Object.freeze({
  R17: {
    theory: { dept: THEORY_R17, "s&h": THEORY_R17 },
    analytical: { dept: THEORY_R17, "s&h": THEORY_R17 },
    lab: { default: LAB },
    project: { default: PROJECT },
  },
  R21: R21_TABLE,
  R24: R21_TABLE,
});

export function getColumnMapping(regulation: Regulation, category: Category, deptType: DeptType): ColumnMapping {
  const byDept = COLUMN_MAPPINGS[regulation][category];
  const mapping = byDept?.[deptType] ?? byDept?.default;
  if (!mapping) {
    throw new UnknownCombinationError(`No column mapping for ${regulation}/${category}/${deptType}`);
  }
  return mapping;
}
