// ============================================
// Document Text Extraction — PDF pages and plain text files
// ============================================

import fs from "fs/promises";
import path from "path";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { logger } from "../lib/logger.js";
import { ingestionError } from "../lib/errors.js";

export type DocumentKind = "pdf" | "text";

export const SUPPORTED_EXTENSIONS: Record<string, DocumentKind> = {
  ".pdf": "pdf",
  ".txt": "text",
  ".md": "text",
};

export type ExtractedDocument = {
  kind: DocumentKind;
  /** Raw text, pages joined by a newline */
  text: string;
  pages: number;
};

/**
 * Document kind from a file name, or null when unsupported.
 */
export function getDocumentKind(filePath: string): DocumentKind | null {
  return SUPPORTED_EXTENSIONS[path.extname(filePath).toLowerCase()] ?? null;
}

/**
 * Extract raw text from a document on disk.
 */
export async function extractDocumentText(filePath: string): Promise<ExtractedDocument> {
  const kind = getDocumentKind(filePath);
  if (!kind) {
    throw ingestionError("EXTRACTION_FAILED", `Unsupported document type: ${path.basename(filePath)}`, undefined, {
      filePath,
    });
  }

  try {
    if (kind === "text") {
      const text = await fs.readFile(filePath, "utf-8");
      return { kind, text, pages: 1 };
    }

    const data = new Uint8Array(await fs.readFile(filePath));
    const { text, pages } = await extractPdfText(data);
    return { kind, text, pages };
  } catch (err) {
    logger.error("Text extraction failed", {
      stage: "ingest",
      filePath,
      error: err,
    });
    throw ingestionError("EXTRACTION_FAILED", `Could not extract text from ${path.basename(filePath)}`, err, {
      filePath,
    });
  }
}

/**
 * Extract text from PDF bytes, page by page.
 * Text items keep their line ends so the normalizer can rejoin wrapped lines.
 */
export async function extractPdfText(data: Uint8Array): Promise<{ text: string; pages: number }> {
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;

  try {
    const pageTexts: string[] = [];

    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();

      let pageText = "";
      for (const item of content.items) {
        if (!("str" in item)) continue;
        pageText += item.str;
        if (item.hasEOL) pageText += "\n";
      }
      pageTexts.push(pageText);
    }

    return { text: pageTexts.join("\n"), pages: pdf.numPages };
  } finally {
    await pdf.destroy();
  }
}
