import { describe, it, expect } from "vitest";
import type { ParseResult } from "@ragsync/types";
import { ExtractionFailedError, UnsupportedDocumentKindError } from "@ragsync/errors";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { DocxParser } from "./docx-parser.js";
import { createParserRegistry, getParser } from "./factory.js";
import { resolveDocumentKind } from "./kind.js";
import { collapseWhitespace, normalizeText } from "./normalize-text.js";
import { TextNormalizer } from "./normalizer.js";
import type { IParser } from "./parser.interface.js";

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("TextParser", () => {
  const parser = new TextParser();

  it("parses plain text string", async () => {
    const result = await parser.parse("Hello world", "text/plain");

    expect(result.text).toBe("Hello world");
    expect(result.pageCount).toBe(1);
    expect(result.metadata).toEqual({ mimeType: "text/plain", charCount: 11 });
  });

  it("parses Uint8Array input", async () => {
    const result = await parser.parse(encode("Encoded text"));

    expect(result.text).toBe("Encoded text");
  });

  it("strips HTML tags, scripts and styles", async () => {
    const html =
      '<script>alert("x")</script><style>body{color:red}</style><h1>Title</h1><p>Some <b>bold</b> text</p>';
    const result = await parser.parse(html, "text/html");

    expect(normalizeText(result.text)).toBe("Title\n\nSome bold text");
  });

  it("estimates page count", async () => {
    const result = await parser.parse("x".repeat(9000));

    expect(result.pageCount).toBe(3);
  });
});

describe("collapseWhitespace", () => {
  it("collapses runs inside a paragraph", () => {
    expect(collapseWhitespace("  one\t two\nthree   ")).toBe("one two three");
  });

  it("keeps paragraph breaks as a single blank line", () => {
    expect(collapseWhitespace("first para\n\n\n  \nsecond\r\n\r\nthird")).toBe(
      "first para\n\nsecond\n\nthird",
    );
  });

  it("returns empty string for whitespace-only input", () => {
    expect(collapseWhitespace(" \n\n\t ")).toBe("");
  });
});

describe("normalizeText", () => {
  it("drops control characters and replacement characters", () => {
    expect(normalizeText("ab\u0000c\u0007 d�e")).toBe("abc de");
  });

  it("turns form feeds into spaces", () => {
    expect(normalizeText("end of page\fnext page")).toBe("end of page next page");
  });
});

describe("resolveDocumentKind", () => {
  it("prefers the declared kind", () => {
    expect(resolveDocumentKind({ declaredKind: "DOCX", mimeType: "application/pdf" })).toBe("docx");
  });

  it("rejects an unknown declared kind", () => {
    expect(() => resolveDocumentKind({ declaredKind: "pptx" })).toThrow(UnsupportedDocumentKindError);
  });

  it("maps MIME types", () => {
    expect(resolveDocumentKind({ mimeType: "application/pdf" })).toBe("pdf");
    expect(
      resolveDocumentKind({
        mimeType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
      }),
    ).toBe("docx");
    expect(resolveDocumentKind({ mimeType: "application/msword" })).toBe("docx");
    expect(resolveDocumentKind({ mimeType: "text/markdown" })).toBe("text");
    expect(resolveDocumentKind({ mimeType: "application/json" })).toBe("text");
  });

  it("falls back to the file extension", () => {
    expect(resolveDocumentKind({ mimeType: "application/octet-stream", filename: "Notes.TXT" })).toBe(
      "text",
    );
    expect(resolveDocumentKind({ filename: "report.pdf" })).toBe("pdf");
  });

  it("sniffs the leading bytes", () => {
    expect(resolveDocumentKind({ bytes: encode("%PDF-1.7\n...") })).toBe("pdf");
    expect(resolveDocumentKind({ bytes: new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x14]) })).toBe(
      "docx",
    );
    expect(resolveDocumentKind({ bytes: encode("just some words") })).toBe("text");
  });

  it("rejects binary content it cannot place", () => {
    expect(() =>
      resolveDocumentKind({ mimeType: "image/png", bytes: new Uint8Array([0x89, 0x50, 0x00, 0xff]) }),
    ).toThrow("Unsupported document kind: image/png");
  });
});

describe("getParser", () => {
  it("returns the parser registered for each kind", () => {
    expect(getParser("text")).toBeInstanceOf(TextParser);
    expect(getParser("pdf")).toBeInstanceOf(PdfParser);
    expect(getParser("docx")).toBeInstanceOf(DocxParser);
  });

  it("throws for a kind missing from a custom registry", () => {
    expect(() => getParser("pdf", new Map())).toThrow(UnsupportedDocumentKindError);
  });
});

class StubParser implements IParser {
  constructor(
    readonly kind: "pdf" | "docx",
    private readonly outcome: ParseResult | Error,
  ) {}

  async parse(): Promise<ParseResult> {
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

describe("TextNormalizer", () => {
  it("normalizes raw text without a declared kind", async () => {
    const normalizer = new TextNormalizer();
    const result = await normalizer.normalize({ content: "  Hello \n\n\n world  " });

    expect(result.kind).toBe("text");
    expect(result.text).toBe("Hello\n\nworld");
  });

  it("decodes text bytes and drops undecodable sequences", async () => {
    const normalizer = new TextNormalizer();
    const bytes = new Uint8Array([...encode("caf"), 0xff, ...encode(" ok")]);
    const result = await normalizer.normalize({ content: bytes, mimeType: "text/plain" });

    expect(result.text).toBe("caf ok");
  });

  it("runs the registered parser for the resolved kind", async () => {
    const pdf = new StubParser("pdf", {
      text: "Page one text.\n\nPage   two text.",
      pageCount: 2,
      metadata: { mimeType: "application/pdf" },
    });
    const normalizer = new TextNormalizer(createParserRegistry([pdf]));

    const result = await normalizer.normalize({ content: encode("%PDF-1.4"), filename: "a.pdf" });

    expect(result).toEqual({
      kind: "pdf",
      text: "Page one text.\n\nPage two text.",
      pageCount: 2,
      metadata: { mimeType: "application/pdf" },
    });
  });

  it("wraps parser failures in ExtractionFailedError with the diagnostic", async () => {
    const docx = new StubParser("docx", new Error("Corrupted zip: missing end of central directory"));
    const normalizer = new TextNormalizer(createParserRegistry([docx]));

    const error = await normalizer
      .normalize({ content: new Uint8Array([0x50, 0x4b, 0x03, 0x04]) })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExtractionFailedError);
    expect(error).toHaveProperty("kind", "docx");
    expect(error).toHaveProperty("diagnostic", "Corrupted zip: missing end of central directory");
  });

  it("fails real PDF extraction on bytes that are not a PDF", async () => {
    const normalizer = new TextNormalizer();

    await expect(
      normalizer.normalize({ content: encode("%PDF-garbage"), declaredKind: "pdf" }),
    ).rejects.toBeInstanceOf(ExtractionFailedError);
  });

  it("fails real DOCX extraction on bytes that are not a zip archive", async () => {
    const normalizer = new TextNormalizer();

    await expect(
      normalizer.normalize({ content: encode("not a zip"), declaredKind: "docx" }),
    ).rejects.toBeInstanceOf(ExtractionFailedError);
  });

  it("rejects unsupported kinds before parsing", async () => {
    const normalizer = new TextNormalizer();

    await expect(
      normalizer.normalize({ content: new Uint8Array([0x00, 0x01]), mimeType: "image/png" }),
    ).rejects.toBeInstanceOf(UnsupportedDocumentKindError);
  });
});
