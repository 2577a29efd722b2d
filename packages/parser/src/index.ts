export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { PdfParser } from "./pdf-parser.js";
export type { PdfData, PdfParseFn } from "./pdf-parser.js";
export { getParser, extractText } from "./factory.js";
