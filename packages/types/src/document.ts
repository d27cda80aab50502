export type DocumentKind = "pdf" | "docx" | "text";

export type MetadataValue = string | number | boolean;

export type ChunkMetadataRecord = Record<string, MetadataValue>;

export interface TextSource {
  text: string;
}

export interface BinarySource {
  bytes: Uint8Array;
  kind?: DocumentKind;
  mimeType?: string;
  filename?: string;
}

export type DocumentSource = TextSource | BinarySource;

export interface IngestRequest {
  documentId: string;
  source: DocumentSource;
  metadata?: ChunkMetadataRecord;
  namespace?: string;
  /** Delete every chunk of the document before writing the new ones. */
  replace?: boolean;
}

export interface IngestResult {
  documentId: string;
  namespace: string;
  chunkCount: number;
  ids: string[];
  tokensUsed: number;
  dimensions: number;
  replacedChunks?: number;
}

export interface DeleteByDocumentResult {
  documentId: string;
  namespace: string;
  deleted: number;
  pages: number;
}

// Reserved metadata keys stamped on every chunk
export const DOCUMENT_ID_KEY = "document_id";
export const CHUNK_INDEX_KEY = "chunk_index";
export const CHUNK_TEXT_KEY = "text";
export const SOURCE_KIND_KEY = "source_kind";

const CHUNK_ID_SEPARATOR = "#";

export function chunkIdPrefix(documentId: string): string {
  return `${documentId}${CHUNK_ID_SEPARATOR}`;
}

export function chunkId(documentId: string, index: number): string {
  return `${chunkIdPrefix(documentId)}${String(index)}`;
}

/** True when `id` is exactly `<documentId>#<n>`. */
export function isChunkIdOf(id: string, documentId: string): boolean {
  const prefix = chunkIdPrefix(documentId);
  return id.startsWith(prefix) && /^\d+$/.test(id.slice(prefix.length));
}
