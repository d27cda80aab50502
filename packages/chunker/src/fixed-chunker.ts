import type { ChunkResult, ChunkingConfig } from "@ragsync/types";
import type { IChunker } from "./chunker.interface.js";
import { toChars, toChunkResult } from "./size.js";

/**
 * Fixed-size windows with no boundary snapping.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed" as const;

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    const charsPerChunk = Math.max(1, toChars(config.maxSize, config.unit));
    const overlapChars = Math.min(toChars(config.overlap, config.unit), charsPerChunk - 1);
    const results: ChunkResult[] = [];

    let startChar = 0;

    while (startChar < content.length) {
      const endChar = Math.min(startChar + charsPerChunk, content.length);
      const window = content.slice(startChar, endChar);
      const chunk = window.trim();

      if (chunk.length > 0) {
        const leading = window.length - window.trimStart().length;
        results.push(toChunkResult(chunk, results.length, startChar + leading));
      }

      if (endChar === content.length) break;
      startChar = endChar - overlapChars;
    }

    return results;
  }
}
