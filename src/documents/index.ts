import * as cheerio from "cheerio";
import mammoth from "mammoth";
// The package entry point runs a debug read of a bundled sample when it is
// not require()d from another CommonJS module, so load the parser directly.
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { extname } from "path";
import { logger } from "../logger";

export type DocumentFormat = "text" | "html" | "docx" | "pdf";

export type DocumentErrorCode =
  | "unsupported_format"
  | "empty_document"
  | "extraction_failed";

export class DocumentError extends Error {
  constructor(
    readonly code: DocumentErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "DocumentError";
  }
}

export interface DocumentInput {
  data: Uint8Array;
  filename: string;
  mimeType?: string;
}

export interface DocumentText {
  text: string;
  format: DocumentFormat;
}

const DOCX_MIME =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  ".txt": "text",
  ".md": "text",
  ".markdown": "text",
  ".html": "html",
  ".htm": "html",
  ".docx": "docx",
  ".pdf": "pdf",
};

const MIME_FORMATS: Record<string, DocumentFormat> = {
  "text/plain": "text",
  "text/markdown": "text",
  "text/html": "html",
  [DOCX_MIME]: "docx",
  "application/pdf": "pdf",
};

export function detectFormat(
  filename: string,
  mimeType?: string,
): DocumentFormat | null {
  const byExtension = EXTENSION_FORMATS[extname(filename).toLowerCase()];
  if (byExtension) return byExtension;

  const mime = mimeType?.split(";")[0].trim().toLowerCase();
  return (mime && MIME_FORMATS[mime]) || null;
}

const BLOCK_ELEMENTS =
  "p, div, li, ul, ol, tr, section, article, header, footer, h1, h2, h3, h4, h5, h6";

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, noscript").remove();
  $("br").replaceWith("\n");
  $(BLOCK_ELEMENTS).each((_, element) => {
    $(element).append("\n");
  });
  return normalizeWhitespace($.root().text());
}

export function normalizeWhitespace(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

async function extractRaw(
  format: DocumentFormat,
  data: Uint8Array,
): Promise<string> {
  switch (format) {
    case "text":
      return new TextDecoder("utf-8").decode(data);
    case "html":
      return htmlToText(new TextDecoder("utf-8").decode(data));
    case "docx": {
      const result = await mammoth.extractRawText({
        buffer: Buffer.from(data),
      });
      for (const message of result.messages) {
        logger.debug(`docx: ${message.message}`);
      }
      return result.value;
    }
    case "pdf": {
      const result = await pdfParse(Buffer.from(data));
      logger.debug(`pdf: ${result.numpages} page(s)`);
      return result.text;
    }
  }
}

export async function extractDocumentText(
  input: DocumentInput,
): Promise<DocumentText> {
  const format = detectFormat(input.filename, input.mimeType);
  if (!format) {
    throw new DocumentError(
      "unsupported_format",
      `Unsupported document type: ${input.filename}${input.mimeType ? ` (${input.mimeType})` : ""}. Use .txt, .md, .html, .docx or .pdf`,
    );
  }

  let raw: string;
  try {
    raw = await extractRaw(format, input.data);
  } catch (error) {
    throw new DocumentError(
      "extraction_failed",
      `Error extracting text from ${input.filename}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const text = format === "html" ? raw : raw.trim();
  if (!text.trim()) {
    throw new DocumentError(
      "empty_document",
      `No text could be extracted from ${input.filename}`,
    );
  }

  logger.debug(`Extracted ${text.length} chars from ${input.filename} (${format})`);
  return { text, format };
}
