import { Request, Response } from "express";
import { z } from "zod";
import { CSVGenerator } from "../services/csvGenerator.js";
import { JSONGenerator } from "../services/jsonGenerator.js";
import { XLSXGenerator } from "../services/xlsxGenerator.js";
import { toISODate } from "../services/dateFormat.js";
import { aliasesFor } from "../services/institutionDetector.js";
import { processStatementFile, processStatementText, type ProcessOptions } from "../services/statementProcessor.js";
import { isSupportedFile, StatementTextSource, type TextSource } from "../services/textSource.js";
import type { DateFallbackStrategy, DocumentResult, EngineConfig, ExportFormat } from "../types/index.js";
import { errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";

const ParseTextBodySchema = z.object({
  text: z.string().min(1, "text is required"),
  institution: z.string().min(1).optional(),
  fileName: z.string().min(1).optional(),
});

const FormatSchema = z.enum(["csv", "xlsx", "json"]).catch("csv");

export interface UploadControllerOptions {
  textSource?: TextSource;
  fallback?: DateFallbackStrategy;
  now?: () => Date;
}

export class UploadController {
  private readonly textSource: TextSource;
  private readonly csvGenerator = new CSVGenerator();
  private readonly xlsxGenerator = new XLSXGenerator();
  private readonly jsonGenerator = new JSONGenerator();

  constructor(
    private readonly config: EngineConfig,
    private readonly options: UploadControllerOptions = {}
  ) {
    this.textSource = options.textSource ?? new StatementTextSource();
  }

  private processOptions(): ProcessOptions {
    return { fallback: this.options.fallback, now: this.options.now?.() };
  }

  async handleUpload(req: Request, res: Response): Promise<void> {
    try {
      logger.info("=== Upload Request Received ===");

      const file = req.file;
      if (!file) {
        res.status(400).json({ error: "No file uploaded" });
        return;
      }
      logger.debug("File:", file.originalname, file.mimetype, file.size);

      if (!isSupportedFile(file.originalname)) {
        res.status(400).json({ error: "Unsupported file type" });
        return;
      }

      const result = await processStatementFile(
        file.originalname,
        file.buffer,
        this.config,
        this.textSource,
        this.processOptions()
      );
      this.sendResult(req, res, result);
    } catch (error) {
      this.sendServerError(res, error);
    }
  }

  async handleParseText(req: Request, res: Response): Promise<void> {
    try {
      const body = ParseTextBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: body.error.issues.map((issue) => issue.message).join("; ") });
        return;
      }

      const { text, institution, fileName = "statement.txt" } = body.data;
      if (institution && !this.config.rules.has(institution)) {
        res.status(400).json({ error: `Unknown institution: ${institution}` });
        return;
      }

      const result = processStatementText(fileName, text, this.config, { ...this.processOptions(), institution });
      this.sendResult(req, res, result);
    } catch (error) {
      this.sendServerError(res, error);
    }
  }

  listInstitutions(_req: Request, res: Response): void {
    const institutions = [...this.config.rules.keys()].map((name) => ({
      name,
      aliases: aliasesFor(name, this.config.rules),
    }));
    res.status(200).json({ institutions });
  }

  private sendResult(req: Request, res: Response, result: DocumentResult): void {
    if (result.status === "failed") {
      res.status(400).json({ error: result.error ?? "Failed to process file" });
      return;
    }

    if (result.status === "unrecognized") {
      res.status(422).json({
        error: "Could not recognize the bank for this statement. Check that a rule exists for it.",
        status: result.status,
      });
      return;
    }

    if (result.status === "no-matches") {
      res.status(422).json({
        error: `Recognized ${result.institution} but no transactions matched its pattern.`,
        status: result.status,
        institution: result.institution,
        skipped: result.skipped,
      });
      return;
    }

    const format: ExportFormat = FormatSchema.parse(
      typeof req.query.format === "string" ? req.query.format.toLowerCase() : undefined
    );

    // CSV is always included for preview
    const csv = this.csvGenerator.generateCSV(result.transactions);

    res.status(200).json({
      success: true,
      format,
      institution: result.institution,
      anchorDate: result.anchor ? toISODate(result.anchor) : null,
      transactionCount: result.transactions.length,
      transactions: this.jsonGenerator.toRecords(result.transactions),
      skipped: result.skipped,
      pageCount: result.pageCount ?? null,
      likelyScanned: result.likelyScanned ?? false,
      csv,
      ...(format === "xlsx" ? { xlsx: this.xlsxGenerator.generateXLSX(result.transactions).toString("base64") } : {}),
      ...(format === "json" ? { json: this.jsonGenerator.generateJSON(result.transactions) } : {}),
    });
  }

  private sendServerError(res: Response, error: unknown): void {
    logger.error("=== UPLOAD ERROR ===", error);
    res.status(500).json({ error: errorMessage(error) || "Failed to process file" });
  }
}
