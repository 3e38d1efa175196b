// src/config/config.ts
import dotenv from "dotenv";
import path from "path";
import { isMergePolicyName, MergePolicyName } from "../services/mergeEngine";

dotenv.config();

function numberFromEnv(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function mergePolicyFromEnv(value: string | undefined): MergePolicyName {
  const name = (value || "first-wins").trim().toLowerCase();
  if (!isMergePolicyName(name)) {
    throw new Error(`Unknown MERGE_POLICY "${value}". Use "first-wins" or "highest".`);
  }
  return name;
}

const config = Object.freeze({
  port: numberFromEnv(process.env.PORT, 5000),
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  templateDir: path.resolve(process.env.TEMPLATE_DIR || "Attainment_Template"),
  outputDir: path.resolve(process.env.OUTPUT_DIR || "outputs"),
  maxUploadBytes: numberFromEnv(process.env.MAX_UPLOAD_MB, 16) * 1024 * 1024,
  fileMaxAgeHours: numberFromEnv(process.env.FILE_MAX_AGE_HOURS, 24),
  mergePolicy: mergePolicyFromEnv(process.env.MERGE_POLICY),
});

export default config;
