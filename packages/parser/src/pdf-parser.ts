import { extractText } from "unpdf";
import type { ParseResult } from "@ragsync/types";
import type { IParser } from "./parser.interface.js";

/**
 * PDF text layer extraction via unpdf (serverless pdf.js build).
 * Pages are separated by a paragraph break.
 */
export class PdfParser implements IParser {
  readonly kind = "pdf" as const;

  async parse(input: Uint8Array | string): Promise<ParseResult> {
    // pdf.js takes ownership of the buffer it is given
    const data = typeof input === "string" ? new TextEncoder().encode(input) : new Uint8Array(input);
    const { totalPages, text } = await extractText(data, { mergePages: false });

    return {
      text: text.join("\n\n"),
      pageCount: totalPages,
      metadata: { mimeType: "application/pdf" },
    };
  }
}
