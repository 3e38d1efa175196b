// src/routes/attainment.ts
import { Router, Request, Response } from "express";
import fs from "fs";
import path from "path";
import { asyncHandler } from "../middleware/asyncHandler";
import { uploadSheets } from "../middleware/upload";
import { UnknownCombinationError } from "../lib/errors";
import { SheetSource, fromBuffer } from "../lib/sheetSource";
import { generateAttainmentSheet } from "../services/attainmentGenerator";
import type { OutcomeMergePolicy } from "../services/mergeEngine";
import { parseCategory, parseRegulation } from "../services/regulationClassifier";
import { validateAll } from "../services/sheetValidator";
import { ASSESSMENT_TYPES, AssessmentType } from "../types/attainment";
import type { TemplateRegistry } from "../utils/templateRegistry";

export interface AttainmentRouterOptions {
  registry: TemplateRegistry;
  outputDir: string;
  mergePolicy: OutcomeMergePolicy;
}

function bodyField(req: Request, name: string, fallback = ""): string {
  const value: unknown = req.body?.[name];
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function uploadedFiles(req: Request): Express.Multer.File[] {
  return Array.isArray(req.files) ? req.files : [];
}

// Form field for an assessment's sheet, e.g. file_ia1, file_review2
export const inputFieldName = (type: AssessmentType) => `file_${type.toLowerCase()}`;

export function createAttainmentRouter({ registry, outputDir, mergePolicy }: AttainmentRouterOptions): Router {
  const router = Router();

  router.get("/regulations", (req, res) => {
    res.json({ regulations: registry.regulations() });
  });

  router.get("/categories/:regulation", (req, res) => {
    const regulation = parseRegulation(req.params.regulation);
    res.json({ categories: regulation ? registry.categories(regulation) : [] });
  });

  router.get("/dept-types/:regulation/:category", (req, res) => {
    const regulation = parseRegulation(req.params.regulation);
    const category = parseCategory(req.params.category);
    res.json({ deptTypes: regulation && category ? registry.deptTypes(regulation, category) : [] });
  });

  router.get("/required-inputs/:regulation/:category", (req, res) => {
    const regulation = parseRegulation(req.params.regulation);
    if (!regulation) throw new UnknownCombinationError(`Unknown regulation: ${req.params.regulation}`);
    const category = parseCategory(req.params.category);
    if (!category) throw new UnknownCombinationError(`Unknown category: ${req.params.category} for ${regulation}`);

    res.json({ inputs: registry.requiredInputs(regulation, category) });
  });

  router.post(
    "/validate",
    uploadSheets.any(),
    asyncHandler(async (req: Request, res: Response) => {
      const files = uploadedFiles(req);
      if (!files.length) {
        res.json({ valid: false, errors: ["No valid files uploaded"], warnings: [] });
        return;
      }

      const regulation = bodyField(req, "regulation");
      const result = await validateAll(
        files.map((f) => fromBuffer(f.buffer, f.originalname)),
        regulation || undefined
      );

      res.json({ valid: result.isValid, errors: result.errors, warnings: result.warnings });
    })
  );

  router.post(
    "/generate",
    uploadSheets.any(),
    asyncHandler(async (req: Request, res: Response) => {
      const files = uploadedFiles(req);
      const inputs: Partial<Record<AssessmentType, SheetSource>> = {};
      for (const type of ASSESSMENT_TYPES) {
        const file = files.find((f) => f.fieldname === inputFieldName(type));
        if (file) inputs[type] = fromBuffer(file.buffer, file.originalname);
      }

      const result = await generateAttainmentSheet({
        regulation: bodyField(req, "regulation", "R17"),
        category: bodyField(req, "category", "theory"),
        deptType: bodyField(req, "dept_type", "dept"),
        inputs,
        registry,
        outputDir,
        mergePolicy,
      });

      if (result.warnings.length) {
        console.warn(`⚠️ ${result.fileName} generated with ${result.warnings.length} warning(s)`);
      }

      res.status(201).json({
        message: `Successfully generated attainment sheet with ${result.studentsCount} students!`,
        fileName: result.fileName,
        downloadUrl: `${req.baseUrl}/download/${encodeURIComponent(result.fileName)}`,
        courseCode: result.courseCode,
        courseName: result.courseName,
        studentsCount: result.studentsCount,
        warnings: result.warnings.slice(0, 5),
        totalWarnings: result.warnings.length,
      });
    })
  );

  router.get("/download/:fileName", (req, res, next) => {
    const { fileName } = req.params;
    const filePath = path.join(outputDir, fileName);

    if (path.basename(fileName) !== fileName || !/\.xlsx$/i.test(fileName) || !fs.existsSync(filePath)) {
      return res.status(404).json({ message: "File not found. It may have been deleted." });
    }

    res.download(filePath, fileName, (err) => {
      if (err) next(err);
    });
  });

  return router;
}
