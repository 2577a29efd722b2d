import { describe, it, expect, vi } from "vitest";
import { ExtractionError, UnsupportedMediaTypeError } from "@docindex/errors";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { extractText, getParser } from "./factory.js";

describe("TextParser", () => {
  const parser = new TextParser();

  it("supports text MIME types", () => {
    expect(parser.supportedMimeTypes).toContain("text/plain");
    expect(parser.supportedMimeTypes).toContain("text/markdown");
    expect(parser.supportedMimeTypes).toContain("text/csv");
    expect(parser.supportedMimeTypes).toContain("text/html");
    expect(parser.supportedMimeTypes).toContain("application/json");
  });

  it("parses plain text string", async () => {
    const result = await parser.parse("Hello world", "text/plain");

    expect(result.text).toBe("Hello world");
    expect(result.pageCount).toBe(1);
    expect(result.sectionCount).toBeUndefined();
    expect(result.metadata).toEqual({ mimeType: "text/plain", charCount: 11, wordCount: 2 });
  });

  it("parses Uint8Array input", async () => {
    const input = new TextEncoder().encode("Encoded text");
    const result = await parser.parse(input, "text/plain");

    expect(result.text).toBe("Encoded text");
  });

  it("rejects bytes that are not valid UTF-8", async () => {
    const input = new Uint8Array([0x48, 0xc3, 0x28]);

    await expect(parser.parse(input, "text/plain")).rejects.toBeInstanceOf(ExtractionError);
  });

  it("normalises line endings", async () => {
    const result = await parser.parse("a\r\nb\rc", "text/plain");

    expect(result.text).toBe("a\nb\nc");
  });

  it("estimates pages at 3000 characters each", async () => {
    const result = await parser.parse("x".repeat(3001), "text/plain");

    expect(result.pageCount).toBe(2);
  });

  it("counts markdown headings as sections", async () => {
    const result = await parser.parse("# Title\n\nIntro\n\n## Part\nBody", "text/markdown");

    expect(result.sectionCount).toBe(2);
  });

  it("strips HTML tags and keeps block breaks", async () => {
    const html = "<h1>Title</h1><p>Content with <b>bold</b> text</p>";
    const result = await parser.parse(html, "text/html");

    expect(result.text).toBe("Title\n\nContent with bold text");
    expect(result.sectionCount).toBe(1);
  });

  it("strips script and style tags from HTML", async () => {
    const html = '<script>alert("xss")</script><style>body{color:red}</style><p>Safe content</p>';
    const result = await parser.parse(html, "text/html");

    expect(result.text).toBe("Safe content");
  });

  it("decodes common entities", async () => {
    const result = await parser.parse("<p>A &amp; B &lt;3</p>", "text/html");

    expect(result.text).toBe("A & B <3");
  });

  it("returns empty text for an empty document", async () => {
    const result = await parser.parse(new Uint8Array(0), "text/plain");

    expect(result.text).toBe("");
    expect(result.pageCount).toBe(1);
  });
});

describe("PdfParser", () => {
  it("returns text, page count and info metadata", async () => {
    const parsePdf = vi.fn().mockResolvedValue({
      text: "Page one\r\nPage two",
      numpages: 2,
      info: { Title: " Report ", Author: 5 },
    });
    const parser = new PdfParser(parsePdf);

    const result = await parser.parse(new Uint8Array([1, 2, 3]), "application/pdf");

    expect(result.text).toBe("Page one\nPage two");
    expect(result.pageCount).toBe(2);
    expect(result.metadata).toEqual({ mimeType: "application/pdf", charCount: 17, title: "Report" });
    expect(parsePdf).toHaveBeenCalledWith(Buffer.from([1, 2, 3]));
  });

  it("wraps parse failures in ExtractionError", async () => {
    const parser = new PdfParser(() => Promise.reject(new Error("Invalid PDF structure")));

    await expect(parser.parse(new Uint8Array([0]), "application/pdf")).rejects.toThrow(
      "PDF could not be parsed",
    );
  });

  it("rejects PDFs without text", async () => {
    const parser = new PdfParser(() => Promise.resolve({ text: "  \n ", numpages: 3 }));

    await expect(parser.parse(new Uint8Array([0]), "application/pdf")).rejects.toBeInstanceOf(
      ExtractionError,
    );
  });
});

describe("getParser", () => {
  it("returns TextParser for text/plain", () => {
    expect(getParser("text/plain")).toBeInstanceOf(TextParser);
  });

  it("returns PdfParser for application/pdf", () => {
    expect(getParser("application/pdf")).toBeInstanceOf(PdfParser);
  });

  it("throws UnsupportedMediaTypeError for unknown types", () => {
    expect(() => getParser("image/png")).toThrow(UnsupportedMediaTypeError);
  });
});

describe("extractText", () => {
  it("decodes text documents", async () => {
    const result = await extractText(new TextEncoder().encode("hello"), "text/plain");

    expect(result.text).toBe("hello");
  });

  it("rejects unsupported media types", async () => {
    await expect(
      extractText(new Uint8Array([0]), "application/octet-stream"),
    ).rejects.toBeInstanceOf(UnsupportedMediaTypeError);
  });
});
