import type { ChunkResult, ChunkingConfig, ChunkStrategy } from "@ragsync/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
