// Control characters other than whitespace, plus U+FFFD left by lossy decoding
const NON_TEXT_CHARS = /[\u0000-\u0008\u000E-\u001F\u007F\uFFFD]/g;
const PARAGRAPH_BREAK = /\n\s*\n/;

/**
 * Collapse whitespace inside each paragraph to single spaces and join paragraphs
 * with exactly one blank line. Leading/trailing whitespace is removed.
 */
export function collapseWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.replace(/\s+/g, " ").trim())
    .filter((paragraph) => paragraph.length > 0)
    .join("\n\n");
}

export function stripNonText(text: string): string {
  return text.replace(NON_TEXT_CHARS, "");
}

export function normalizeText(text: string): string {
  return collapseWhitespace(stripNonText(text));
}
