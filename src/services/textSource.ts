import path from "path";
import { ParseError } from "../types/errors.js";
import { PDFParser, type ExtractedText } from "./pdfParser.js";

/** Turns one source document into a single newline-separated text blob. */
export interface TextSource {
  extractText(fileName: string, buffer: Buffer): Promise<ExtractedText>;
}

export const SUPPORTED_EXTENSIONS = [".pdf", ".txt"] as const;

export function isSupportedFile(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

export class StatementTextSource implements TextSource {
  constructor(private readonly pdfParser: PDFParser = new PDFParser()) {}

  async extractText(fileName: string, buffer: Buffer): Promise<ExtractedText> {
    const ext = path.extname(fileName).toLowerCase();

    if (ext === ".pdf") {
      return this.pdfParser.extractText(buffer, fileName);
    }

    if (ext === ".txt") {
      const text = buffer.toString("utf-8").replace(/\r\n/g, "\n");
      return { text, pageCount: 1, likelyScanned: false };
    }

    throw new ParseError(`Unsupported file type: ${fileName}`);
  }
}
