import mammoth from "mammoth";
import type { ParseResult } from "@ragsync/types";
import type { IParser } from "./parser.interface.js";

const DOCX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export class DocxParser implements IParser {
  readonly kind = "docx" as const;

  async parse(input: Uint8Array | string): Promise<ParseResult> {
    const buffer = typeof input === "string" ? Buffer.from(input) : Buffer.from(input);
    const result = await mammoth.extractRawText({ buffer });

    return {
      text: result.value,
      pageCount: 1,
      metadata: {
        mimeType: DOCX_MIME_TYPE,
        warnings: result.messages.map((m) => m.message),
      },
    };
  }
}
