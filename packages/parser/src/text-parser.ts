import type { ParseResult } from "@docindex/types";
import { ExtractionError } from "@docindex/errors";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/csv",
  "text/html",
  "application/json",
  "application/xml",
];

const CHARS_PER_PAGE = 3000;

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

/**
 * Plain text, markdown and other text-based formats.
 * Bytes must be valid UTF-8; anything else is reported as a corrupt document.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const raw = typeof input === "string" ? input : this.decode(input);
    const text = raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");

    const cleanedText = mimeType === "text/html" ? this.stripHtml(text) : text;

    // Estimate page count (roughly 3000 chars per page)
    const pageCount = Math.max(1, Math.ceil(cleanedText.length / CHARS_PER_PAGE));

    return {
      text: cleanedText,
      pageCount,
      sectionCount: this.countSections(text, mimeType),
      metadata: {
        mimeType,
        charCount: cleanedText.length,
        wordCount: cleanedText.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }

  private decode(input: Uint8Array): string {
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(input);
    } catch (error: unknown) {
      throw new ExtractionError("Document is not valid UTF-8 text", { cause: error });
    }
  }

  private countSections(text: string, mimeType: string): number | undefined {
    if (mimeType === "text/markdown") {
      return text.match(/^#{1,6}\s/gm)?.length ?? 0;
    }
    if (mimeType === "text/html") {
      return text.match(/<h[1-6][\s>]/gi)?.length ?? 0;
    }
    return undefined;
  }

  /** Block-level tags become line breaks so paragraph boundaries survive. */
  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<\/(p|div|h[1-6]|li|tr|section|article|blockquote|pre)>/gi, "\n\n")
      .replace(/<[^>]+>/g, " ")
      .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
      .replace(/[ \t]+/g, " ")
      .replace(/ *\n */g, "\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }
}
