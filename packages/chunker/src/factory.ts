import type { ChunkStrategy } from "@ragsync/types";
import type { IChunker } from "./chunker.interface.js";
import { BoundaryChunker } from "./boundary-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";

export function createChunker(strategy: ChunkStrategy): IChunker {
  switch (strategy) {
    case "boundary":
      return new BoundaryChunker();
    case "fixed":
      return new FixedChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
