import type { ChunkResult, ChunkSizeUnit } from "@ragsync/types";

/** Rough estimate for English text. */
export const CHARS_PER_TOKEN = 4;

export function toChars(value: number, unit: ChunkSizeUnit): number {
  return unit === "tokens" ? value * CHARS_PER_TOKEN : value;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

export function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && isWhitespace(text[i])) i++;
  return i;
}

export function toChunkResult(content: string, index: number, startChar: number): ChunkResult {
  return {
    content,
    index,
    size: content.length,
    tokenCount: estimateTokens(content),
    metadata: { startChar, endChar: startChar + content.length },
  };
}
