import type { DocumentKind } from "@ragsync/types";
import { UnsupportedDocumentKindError } from "@ragsync/errors";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { DocxParser } from "./docx-parser.js";

export type ParserRegistry = ReadonlyMap<DocumentKind, IParser>;

/**
 * Build the kind → parser table. Entries in `overrides` replace the defaults.
 */
export function createParserRegistry(overrides: IParser[] = []): ParserRegistry {
  const registry = new Map<DocumentKind, IParser>();
  for (const parser of [new TextParser(), new PdfParser(), new DocxParser(), ...overrides]) {
    registry.set(parser.kind, parser);
  }
  return registry;
}

const defaultRegistry = createParserRegistry();

export function getParser(kind: DocumentKind, registry: ParserRegistry = defaultRegistry): IParser {
  const parser = registry.get(kind);

  if (!parser) {
    throw new UnsupportedDocumentKindError(kind);
  }

  return parser;
}
