// src/utils/templateRegistry.ts
import fs from "fs";
import path from "path";
import { TemplateNotFoundError, UnknownCombinationError } from "../lib/errors";
import {
  AssessmentType,
  CATEGORIES,
  Category,
  DEPT_TYPES,
  DeptType,
  REGULATIONS,
  Regulation,
} from "../types/attainment";

type TemplateFiles = Readonly<Partial<Record<Category, Readonly<Partial<Record<DeptType, string>>>>>>;

const R21_THEORY = "Dept THEORY  template_R21 V1 AtSheet.xlsx";
const R21_ANALYTICAL = "Dept THEORY Analytical template_R21 V1 AtSheet.xlsx";
const R21_INTEGRATED = "Dept Integrated template_R21 V1 AtSheet.xlsx";

// R24 has no templates of its own yet and reuses the R21 files
const R21_FILES: TemplateFiles = {
  theory: { dept: R21_THEORY, "s&h": R21_THEORY },
  analytical: { dept: R21_ANALYTICAL, "s&h": R21_ANALYTICAL },
  integrated: { dept: R21_INTEGRATED, "s&h": R21_INTEGRATED },
  lab: { default: "LAB template_R21 V1AtSheet.xlsx" },
  project: { default: "Project template_R21 V1 AtSheet.xlsx" },
};

export const TEMPLATE_FILES: Readonly<Record<Regulation, TemplateFiles>> = Object.freeze({
  R17: {
    theory: {
      dept: "Dept THEORY template_ R17 V3 AtSheet.xlsx",
      "s&h": "S&H THEORY template _R17 V3 AtSheet.xlsx",
    },
    analytical: {
      dept: "Dept THEORY Analytical template_R17 V3 AtSheet.xlsx",
      "s&h": "S&H THEORY template Analytical_R17 V3 AtSheet.xlsx",
    },
    lab: { default: "LAB template_R17 V3 AtSheet.xlsx" },
    project: { default: "Project template_R17 V3 AtSheet.xlsx" },
  },
  R21: R21_FILES,
  R24: R21_FILES,
});

const REVIEWS: readonly AssessmentType[] = ["Review1", "Review2", "Review3"];
const R21_INPUTS: Readonly<Partial<Record<Category, readonly AssessmentType[]>>> = {
  theory: ["IA1", "IA2", "Integrated"],
  analytical: ["IA1", "IA2", "Integrated"],
  integrated: ["IA1", "IA2", "Integrated"],
  lab: ["Lab"],
  project: REVIEWS,
};

export const REQUIRED_INPUTS: Readonly<Record<Regulation, Readonly<Partial<Record<Category, readonly AssessmentType[]>>>>> =
  Object.freeze({
    R17: {
      theory: ["IA1", "IA2", "Model"],
      analytical: ["IA1", "IA2", "Model"],
      lab: ["Lab"],
      project: REVIEWS,
    },
    R21: R21_INPUTS,
    R24: R21_INPUTS,
  });

const REGULATION_FOLDERS: Readonly<Record<Regulation, string>> = {
  R17: "Reg_17",
  R21: "Reg_21",
  R24: "Reg_24",
};

export interface TemplateRegistry {
  resolve(regulation: Regulation, category: Category, deptType: DeptType): string;
  requiredInputs(regulation: Regulation, category: Category): AssessmentType[];
  regulations(): Regulation[];
  categories(regulation: Regulation): Category[];
  deptTypes(regulation: Regulation, category: Category): DeptType[];
}

export function createTemplateRegistry(templateDir: string): TemplateRegistry {
  return {
    resolve(regulation, category, deptType) {
      const byDept = TEMPLATE_FILES[regulation][category];
      if (!byDept) {
        throw new TemplateNotFoundError(`No ${category} template for ${regulation}`);
      }
      const fileName = byDept[deptType] ?? byDept.default;
      if (!fileName) {
        throw new TemplateNotFoundError(`Unknown department type: ${deptType} for ${regulation}/${category}`);
      }

      const templatePath = path.join(templateDir, REGULATION_FOLDERS[regulation], fileName);
      if (!fs.existsSync(templatePath)) {
        throw new TemplateNotFoundError(`Template not found: ${templatePath}`);
      }
      return templatePath;
    },

    requiredInputs(regulation, category) {
      const inputs = REQUIRED_INPUTS[regulation][category];
      if (!inputs) {
        throw new UnknownCombinationError(`Unknown category: ${category} for ${regulation}`);
      }
      return [...inputs];
    },

    regulations() {
      return [...REGULATIONS];
    },

    categories(regulation) {
      return CATEGORIES.filter((c) => TEMPLATE_FILES[regulation][c] !== undefined);
    },

    deptTypes(regulation, category) {
      const byDept = TEMPLATE_FILES[regulation][category];
      if (!byDept) return [];
      const available = DEPT_TYPES.filter((d) => byDept[d] !== undefined);
      if (available.length === 1 && available[0] === "default") return available;
      return available.filter((d) => d !== "default");
    },
  };
}
