import type { DocumentKind, NormalizedDocument, ParseResult } from "@ragsync/types";
import { AppError, ExtractionFailedError } from "@ragsync/errors";
import { createParserRegistry, getParser, type ParserRegistry } from "./factory.js";
import { resolveDocumentKind, type KindHints } from "./kind.js";
import { normalizeText } from "./normalize-text.js";

export interface NormalizeInput extends Omit<KindHints, "bytes"> {
  content: Uint8Array | string;
}

/**
 * Turns document bytes into one normalized plain-text string.
 *
 * Extraction is all-or-nothing: either the whole document converts or an
 * error is thrown and no text is returned.
 */
export class TextNormalizer {
  private readonly registry: ParserRegistry;

  constructor(registry: ParserRegistry = createParserRegistry()) {
    this.registry = registry;
  }

  resolveKind(input: NormalizeInput): DocumentKind {
    return resolveDocumentKind({
      ...input,
      bytes: typeof input.content === "string" ? undefined : input.content,
      declaredKind: input.declaredKind ?? (typeof input.content === "string" ? "text" : undefined),
    });
  }

  async normalize(input: NormalizeInput): Promise<NormalizedDocument> {
    const kind = this.resolveKind(input);
    const parsed = await this.parse(kind, input);

    return {
      ...parsed,
      text: normalizeText(parsed.text),
      kind,
    };
  }

  private async parse(kind: DocumentKind, input: NormalizeInput): Promise<ParseResult> {
    const parser = getParser(kind, this.registry);

    try {
      return await parser.parse(input.content, input.mimeType);
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;
      const diagnostic = error instanceof Error ? error.message : String(error);
      throw new ExtractionFailedError(kind, diagnostic, { cause: error });
    }
  }
}
