export type ChunkStrategy = "boundary" | "fixed";

export type ChunkSizeUnit = "chars" | "tokens";

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  /** Upper bound for every segment, in `unit`. */
  maxSize: number;
  overlap: number;
  /** How far back from the size limit a natural boundary is searched for, in `unit`. */
  lookBack: number;
  unit: ChunkSizeUnit;
}

export interface ChunkResult {
  content: string;
  index: number;
  /** Length of `content` in characters. */
  size: number;
  tokenCount: number;
  metadata: {
    startChar: number;
    endChar: number;
  };
}
