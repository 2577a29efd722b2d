import pdf from "pdf-parse/lib/pdf-parse.js";
import type { ParseResult } from "@docindex/types";
import { ExtractionError } from "@docindex/errors";
import type { IParser } from "./parser.interface.js";

export interface PdfData {
  text: string;
  numpages: number;
  info?: unknown;
}

export type PdfParseFn = (data: Buffer) => Promise<PdfData>;

const INFO_FIELDS = ["Title", "Author", "Subject", "Creator", "Producer"] as const;

function readInfo(info: unknown): Record<string, string> {
  const metadata: Record<string, string> = {};
  if (typeof info !== "object" || info === null) {
    return metadata;
  }
  for (const field of INFO_FIELDS) {
    const value: unknown = Reflect.get(info, field);
    if (typeof value === "string" && value.trim().length > 0) {
      metadata[field.toLowerCase()] = value.trim();
    }
  }
  return metadata;
}

/**
 * PDF text extraction via pdf-parse.
 * Image-only PDFs yield no text and are rejected.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = ["application/pdf"];
  private readonly parsePdf: PdfParseFn;

  constructor(parsePdf: PdfParseFn = (data) => pdf(data)) {
    this.parsePdf = parsePdf;
  }

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const buffer = typeof input === "string" ? Buffer.from(input, "latin1") : Buffer.from(input);

    let data: PdfData;
    try {
      data = await this.parsePdf(buffer);
    } catch (error: unknown) {
      throw new ExtractionError("PDF could not be parsed", { cause: error });
    }

    const text = data.text.replace(/\r\n?/g, "\n");
    if (text.trim().length === 0) {
      throw new ExtractionError(
        "PDF extraction produced empty text (may be scanned/image-based PDF)",
      );
    }

    return {
      text,
      pageCount: data.numpages,
      metadata: {
        mimeType,
        charCount: text.length,
        ...readInfo(data.info),
      },
    };
  }
}
