import { createRequire } from "module";
import type PdfParse from "pdf-parse";
import { ParseError, errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";

export interface ExtractedText {
  text: string;
  pageCount: number;
  likelyScanned: boolean;
}

// pdf-parse runs a self-test when loaded without a parent module, so load it through require
const require = createRequire(import.meta.url);
let pdfParse: typeof PdfParse | null = null;

function loadPdfParse(): typeof PdfParse {
  if (pdfParse) return pdfParse;
  const loaded: typeof PdfParse = require("pdf-parse");
  pdfParse = loaded;
  return loaded;
}

export class PDFParser {
  async extractText(buffer: Buffer, fileName = "document.pdf"): Promise<ExtractedText> {
    let text: string;
    let pageCount: number;

    try {
      const data = await loadPdfParse()(buffer);
      text = data.text;
      pageCount = data.numpages;
    } catch (error) {
      throw new ParseError(`Failed to parse PDF ${fileName}: ${errorMessage(error)}`, { cause: error });
    }

    logger.debug(`PDF text of ${fileName} (first 1000 chars):`, text.substring(0, 1000));
    logger.debug(`PDF text length: ${text.length}, pages: ${pageCount}`);

    const likelyScanned = this.isLikelyScannedPDF(text, pageCount);
    if (likelyScanned) {
      logger.warn(`⚠️  ${fileName} appears to be scanned/image-based; extracted text may be incomplete`);
    }

    return { text, pageCount, likelyScanned };
  }

  /**
   * Heuristics for an image-based PDF:
   * - under 20% of the ~1000 chars per page a text statement carries
   * - under half of the characters alphanumeric
   */
  isLikelyScannedPDF(text: string, numPages: number): boolean {
    const textLength = text.trim().length;
    const expectedTextLength = Math.max(numPages, 1) * 1000;

    if (textLength < expectedTextLength * 0.2) {
      logger.debug(`Text too short: ${textLength} chars for ${numPages} pages (expected ~${expectedTextLength})`);
      return true;
    }

    const alphanumericCount = (text.match(/[a-zA-Z0-9]/g) || []).length;
    const alphanumericRatio = alphanumericCount / textLength;
    if (alphanumericRatio < 0.5) {
      logger.debug(`Too much gibberish: only ${(alphanumericRatio * 100).toFixed(1)}% alphanumeric`);
      return true;
    }

    return false;
  }
}
