import type { ParseResult } from "@docindex/types";
import { UnsupportedMediaTypeError } from "@docindex/errors";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";

const textParser = new TextParser();
const pdfParser = new PdfParser();

const allParsers: IParser[] = [textParser, pdfParser];

/**
 * Select the appropriate parser based on mimeType.
 */
export function getParser(mimeType: string, parsers: IParser[] = allParsers): IParser {
  const parser = parsers.find((p) => p.supportedMimeTypes.includes(mimeType));

  if (!parser) {
    throw new UnsupportedMediaTypeError(mimeType);
  }

  return parser;
}

/** Extract the text of a document. Never touches storage. */
export async function extractText(
  bytes: Uint8Array,
  mediaType: string,
  parsers?: IParser[],
): Promise<ParseResult> {
  return getParser(mediaType, parsers).parse(bytes, mediaType);
}
