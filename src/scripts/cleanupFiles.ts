// src/scripts/cleanupFiles.ts
import fs from "fs";
import path from "path";
import config from "../config/config";

/** Removes plain files older than `maxAgeHours`; returns how many went. */
export const cleanupOldFiles = async (dir: string, maxAgeHours: number, now = Date.now()): Promise<number> => {
  if (!fs.existsSync(dir)) return 0;

  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  let removed = 0;

  for (const entry of await fs.promises.readdir(dir, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const filePath = path.join(dir, entry.name);

    try {
      const { mtimeMs } = await fs.promises.stat(filePath);
      if (now - mtimeMs <= maxAgeMs) continue;
      await fs.promises.unlink(filePath);
      removed++;
    } catch (err) {
      console.warn(`Could not remove ${filePath}:`, err);
    }
  }

  if (removed) console.log(`🗑️ Removed ${removed} file(s) older than ${maxAgeHours}h from ${dir}`);
  return removed;
};

if (require.main === module) {
  cleanupOldFiles(config.outputDir, config.fileMaxAgeHours)
    .then(() => process.exit(0))
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
