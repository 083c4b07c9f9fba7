// Load environment variables FIRST before any other imports
import dotenv from "dotenv";
dotenv.config();

import { createApp } from "./app.js";
import { getConfig } from "./config/env.js";
import { loadEngineConfig } from "./services/ruleRegistry.js";
import { ConfigError, errorMessage } from "./types/errors.js";
import { logger } from "./utils/logger.js";

async function start(): Promise<void> {
  const config = getConfig();

  logger.info("🔧 Loading bank rules and categories...");
  const engine = await loadEngineConfig(config);
  if (engine.rules.size === 0) {
    logger.error("❌ No bank configuration available; refusing to start");
    process.exit(1);
  }

  const app = createApp(engine, config);
  const server = app.listen(config.port, () => {
    logger.info(`🚀 Server is running on port ${config.port}`);
    logger.info(`📝 Environment: ${process.env.NODE_ENV || "development"}`);
    logger.info(`🔗 Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  process.on("SIGTERM", () => {
    logger.info("SIGTERM signal received: closing HTTP server");
    server.close(() => process.exit(0));
  });
}

start().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(`❌ Configuration error: ${error.message}`);
  } else {
    logger.error(`❌ Failed to start server: ${errorMessage(error)}`);
  }
  process.exit(1);
});
