// src/middleware/upload.ts
import multer from "multer";
import path from "path";
import config from "../config/config";
import { UploadRejectedError } from "../lib/errors";

const storage = multer.memoryStorage();

// Sheets stay in memory; nothing is written to an upload folder
export const uploadSheets = multer({
  storage,
  limits: { fileSize: config.maxUploadBytes },
  fileFilter: (req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (![".xlsx", ".xls"].includes(ext)) {
      return cb(new UploadRejectedError(`Invalid file type for ${file.fieldname}. Only .xlsx and .xls allowed.`));
    }
    cb(null, true);
  },
});
