import type { DocumentKind, ParseResult } from "@ragsync/types";

export interface IParser {
  readonly kind: DocumentKind;
  parse(input: Uint8Array | string, mimeType?: string): Promise<ParseResult>;
}
