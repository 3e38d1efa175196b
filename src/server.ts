// src/server.ts
import fs from "fs";
import app from "./app";
import config from "./config/config";
import { cleanupOldFiles } from "./scripts/cleanupFiles";

const startServer = async () => {
  try {
    await fs.promises.mkdir(config.outputDir, { recursive: true });
    await cleanupOldFiles(config.outputDir, config.fileMaxAgeHours);

    const server = app.listen(config.port, () => {
      console.log("=".repeat(60));
      console.log("CO-PO Attainment Sheet Generator");
      console.log(`Server running on http://localhost:${config.port}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Templates: ${config.templateDir}`);
      console.log(`Outputs: ${config.outputDir}`);
      console.log(`Merge policy: ${config.mergePolicy}`);
      console.log("=".repeat(60));
    });

    // Large workbooks take a while to parse and write
    server.timeout = 300000;
    server.keepAliveTimeout = 310000;
    server.headersTimeout = 320000;
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
