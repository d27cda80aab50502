export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { PdfParser } from "./pdf-parser.js";
export { DocxParser } from "./docx-parser.js";
export { createParserRegistry, getParser } from "./factory.js";
export type { ParserRegistry } from "./factory.js";
export { resolveDocumentKind } from "./kind.js";
export type { KindHints } from "./kind.js";
export { collapseWhitespace, normalizeText, stripNonText } from "./normalize-text.js";
export { TextNormalizer } from "./normalizer.js";
export type { NormalizeInput } from "./normalizer.js";
