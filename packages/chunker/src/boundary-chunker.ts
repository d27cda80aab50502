import type { ChunkResult, ChunkingConfig } from "@ragsync/types";
import type { IChunker } from "./chunker.interface.js";
import { isWhitespace, skipWhitespace, toChars, toChunkResult } from "./size.js";

const PARAGRAPH_BREAK = "\n\n";
const SENTENCE_END = /[.!?]/;

/**
 * Size-bounded chunker that snaps cuts to natural boundaries.
 *
 * Within `lookBack` of the size limit the cut prefers, in order, a paragraph
 * break, the end of a sentence, then any whitespace. Outside that window it
 * still backs off to the nearest earlier whitespace; only a single run of
 * non-whitespace longer than `maxSize` is cut mid-word.
 */
export class BoundaryChunker implements IChunker {
  readonly strategy = "boundary" as const;

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    const maxChars = Math.max(1, toChars(config.maxSize, config.unit));
    const overlapChars = Math.min(toChars(config.overlap, config.unit), maxChars - 1);
    const lookBackChars = Math.min(toChars(config.lookBack, config.unit), maxChars - 1);
    const results: ChunkResult[] = [];

    let start = skipWhitespace(content, 0);

    while (start < content.length) {
      const end = this.findCut(content, start, maxChars, lookBackChars);
      const segment = content.slice(start, end).trimEnd();

      if (segment.length > 0) {
        results.push(toChunkResult(segment, results.length, start));
      }

      if (end >= content.length) break;
      start = skipWhitespace(content, this.nextStart(content, start, end, overlapChars));
    }

    return results;
  }

  private findCut(text: string, start: number, maxChars: number, lookBack: number): number {
    const limit = start + maxChars;
    if (limit >= text.length) return text.length;

    const windowStart = Math.max(start + 1, limit - lookBack);

    const paragraph = text.lastIndexOf(PARAGRAPH_BREAK, limit);
    if (paragraph >= windowStart) return paragraph;

    for (let i = limit; i >= windowStart; i--) {
      if (isWhitespace(text[i]) && SENTENCE_END.test(text[i - 1] ?? "")) return i;
    }

    for (let i = limit; i > start; i--) {
      if (isWhitespace(text[i])) return i;
    }

    return limit;
  }

  /**
   * With overlap the next segment restarts before the cut, moved forward to
   * the next word start so it does not begin mid-word.
   */
  private nextStart(text: string, start: number, end: number, overlap: number): number {
    if (overlap <= 0) return end;

    let next = end - overlap;
    if (next <= start) return end;

    while (next < end && !isWhitespace(text[next - 1])) next++;
    return next;
  }
}
