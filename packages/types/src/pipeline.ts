import type { ChunkMetadataRecord, DocumentKind } from "./document.js";

export interface ParseResult {
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface NormalizedDocument extends ParseResult {
  kind: DocumentKind;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorPoint {
  id: string;
  vector: number[];
  metadata: ChunkMetadataRecord;
}

export interface ListIdsOptions {
  pageToken?: string;
  limit: number;
}

export interface IdPage {
  ids: string[];
  nextPageToken?: string;
}
