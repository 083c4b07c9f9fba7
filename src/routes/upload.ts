import { Router, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import type { UploadController } from "../controllers/uploadController.js";
import { isSupportedFile } from "../services/textSource.js";
import { logger } from "../utils/logger.js";

export function createUploadRouter(uploadController: UploadController, maxFileSizeMb: number): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxFileSizeMb * 1024 * 1024,
    },
    fileFilter: (_req, file, cb) => {
      if (file.mimetype === "application/pdf" || file.mimetype === "text/plain" || isSupportedFile(file.originalname)) {
        cb(null, true);
      } else {
        cb(new Error("Invalid file type. Only PDF and TXT files are allowed."));
      }
    },
  });

  // GET /api/institutions - Banks the loaded rules can recognize
  router.get("/institutions", (req, res) => {
    uploadController.listInstitutions(req, res);
  });

  // POST /api/upload - Upload a statement and extract its transactions
  router.post("/upload", upload.single("file"), (req, res, next) => {
    uploadController.handleUpload(req, res).catch(next);
  });

  // POST /api/parse - Run the engine on already-extracted text
  router.post("/parse", (req, res, next) => {
    uploadController.handleParseText(req, res).catch(next);
  });

  // Error handling middleware for multer errors
  router.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("Upload route error:", err);
    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        res.status(400).json({ error: `File size exceeds ${maxFileSizeMb}MB limit` });
        return;
      }
      res.status(400).json({ error: `Upload error: ${err.message}` });
      return;
    }
    res.status(400).json({ error: err.message || "File upload failed" });
  });

  return router;
}
