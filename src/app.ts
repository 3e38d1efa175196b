// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";
import { MERGE_POLICIES } from "./services/mergeEngine";
import { createTemplateRegistry } from "./utils/templateRegistry";
import { AttainmentRouterOptions, createAttainmentRouter } from "./routes/attainment";

export function createApp(overrides: Partial<AttainmentRouterOptions> = {}) {
  const app = express();

  // Security & Performance Middleware
  app.use(
    helmet({
      contentSecurityPolicy: false,
    })
  );

  app.use(
    cors({
      origin: [config.frontendUrl, "http://127.0.0.1:3000"],
      credentials: true,
      exposedHeaders: ["Content-Disposition"],
    })
  );

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  app.use(
    "/attainment/generate",
    rateLimit({
      windowMs: 60 * 60 * 1000, // 1 hour
      max: 50,
      standardHeaders: true,
      legacyHeaders: false,
      message: { message: "Too many generation requests from this IP. Please try again later." },
    })
  );

  // Health check
  app.get("/health", (req, res) => {
    res.status(200).json({
      status: "OK",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use(
    "/attainment",
    createAttainmentRouter({
      registry: overrides.registry ?? createTemplateRegistry(config.templateDir),
      outputDir: overrides.outputDir ?? config.outputDir,
      mergePolicy: overrides.mergePolicy ?? MERGE_POLICIES[config.mergePolicy],
    })
  );

  app.use((req, res) => {
    res.status(404).json({
      message: `Route ${req.originalUrl} not found`,
      method: req.method,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}

const app = createApp();

export default app;
