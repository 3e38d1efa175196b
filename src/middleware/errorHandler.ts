// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import multer from "multer";
import config from "../config/config";

export interface ApiError extends Error {
  statusCode?: number;
  details?: Record<string, unknown>;
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  next: NextFunction
) {
  if (err instanceof multer.MulterError && err.code === "LIMIT_FILE_SIZE") {
    const maxMb = Math.round(config.maxUploadBytes / (1024 * 1024));
    res.status(413).json({ success: false, message: `File too large. Maximum size is ${maxMb}MB.` });
    return;
  }

  const status = err.statusCode || 500;
  if (status >= 500) {
    console.error(`[ERROR] ${req.method} ${req.url}`, err);
  } else {
    console.warn(`[WARN] ${req.method} ${req.url}: ${err.message}`);
  }

  res.status(status).json({
    success: false,
    message: err.message || "Internal Server Error",
    ...(err.details && { details: err.details }),
  });
}
