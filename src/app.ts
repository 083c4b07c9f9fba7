import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import type { AppConfig } from "./config/env.js";
import { UploadController, type UploadControllerOptions } from "./controllers/uploadController.js";
import { createUploadRouter } from "./routes/upload.js";
import type { EngineConfig } from "./types/index.js";
import { logger } from "./utils/logger.js";

export function createApp(
  engine: EngineConfig,
  config: Pick<AppConfig, "frontendUrl" | "maxFileSizeMb" | "dateFallback">,
  controllerOptions: UploadControllerOptions = {}
): Express {
  const app: Express = express();
  const uploadController = new UploadController(engine, { fallback: config.dateFallback, ...controllerOptions });

  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
      optionsSuccessStatus: 200,
      exposedHeaders: ["Content-Type", "Content-Length"],
    })
  );

  app.use(express.json({ limit: `${config.maxFileSizeMb}mb` }));
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "ok", message: "Server is running", institutions: engine.rules.size });
  });

  // API routes
  app.use("/api", createUploadRouter(uploadController, config.maxFileSizeMb));

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("Error:", err);
    res.status(500).json({
      error: err.message || "Internal server error",
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Route not found" });
  });

  return app;
}
