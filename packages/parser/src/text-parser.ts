import type { ParseResult } from "@ragsync/types";
import type { IParser } from "./parser.interface.js";

const CHARS_PER_PAGE = 3000;

/**
 * Plain text, markdown, CSV and HTML.
 * Bytes are read as UTF-8; sequences that do not decode are dropped.
 */
export class TextParser implements IParser {
  readonly kind = "text" as const;

  async parse(input: Uint8Array | string, mimeType = "text/plain"): Promise<ParseResult> {
    const text = typeof input === "string" ? input : new TextDecoder("utf-8").decode(input);

    const cleanedText = mimeType === "text/html" ? this.stripHtml(text) : text;

    return {
      text: cleanedText,
      pageCount: Math.max(1, Math.ceil(cleanedText.length / CHARS_PER_PAGE)),
      metadata: {
        mimeType,
        charCount: cleanedText.length,
      },
    };
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<\/(p|div|h[1-6]|li|section|article)>/gi, "\n\n")
      .replace(/<[^>]+>/g, " ");
  }
}
