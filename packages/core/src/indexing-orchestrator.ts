import { PartialDeleteError, ProviderError, ValidationError } from "@ragsync/errors";
import type { IChunker } from "@ragsync/chunker";
import type { IEmbeddingProvider } from "@ragsync/embeddings";
import { createSilentLogger, type Logger } from "@ragsync/logger";
import { TextNormalizer, type NormalizeInput } from "@ragsync/parser";
import type {
  DeleteByDocumentResult,
  DocumentSource,
  IndexingConfig,
  IngestRequest,
  IngestResult,
  VectorPoint,
} from "@ragsync/types";
import {
  CHUNK_INDEX_KEY,
  CHUNK_TEXT_KEY,
  DOCUMENT_ID_KEY,
  SOURCE_KIND_KEY,
  chunkId,
  isChunkIdOf,
} from "@ragsync/types";
import type { IVectorStore } from "@ragsync/vector-store";
import { assertVectorDimensions } from "./dimension-contract.js";
import { embedInBatches } from "./embed-batches.js";
import { resolveNamespace } from "./namespace.js";

export interface IndexingDependencies {
  config: IndexingConfig;
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  normalizer?: TextNormalizer;
  logger?: Logger;
}

export interface UpsertPointsResult {
  namespace: string;
  count: number;
}

function requireDocumentId(documentId: string): string {
  const trimmed = documentId.trim();
  if (!trimmed) {
    throw new ValidationError("documentId is required", { documentId: "must be a non-empty string" });
  }
  return trimmed;
}

function toNormalizeInput(source: DocumentSource): NormalizeInput {
  if ("text" in source) {
    return { content: source.text, declaredKind: "text" };
  }
  return {
    content: source.bytes,
    declaredKind: source.kind,
    mimeType: source.mimeType,
    filename: source.filename,
  };
}

/**
 * Ingestion: Normalize -> Chunk -> Embed -> Check dimensions -> Upsert,
 * plus exhaustive per-document deletion.
 *
 * Upserts overwrite by chunk id (`<documentId>#<index>`), so re-ingesting a
 * document replaces its chunks in place. Chunks beyond the new chunk count
 * stay behind unless the request sets `replace`.
 */
export class IndexingOrchestrator {
  private readonly config: IndexingConfig;
  private readonly chunker: IChunker;
  private readonly embeddingProvider: IEmbeddingProvider;
  private readonly vectorStore: IVectorStore;
  private readonly normalizer: TextNormalizer;
  private readonly logger: Logger;

  constructor(deps: IndexingDependencies) {
    this.config = deps.config;
    this.chunker = deps.chunker;
    this.embeddingProvider = deps.embeddingProvider;
    this.vectorStore = deps.vectorStore;
    this.normalizer = deps.normalizer ?? new TextNormalizer();
    this.logger = deps.logger ?? createSilentLogger();
  }

  async ingest(request: IngestRequest): Promise<IngestResult> {
    const documentId = requireDocumentId(request.documentId);
    const namespace = resolveNamespace(request.namespace, this.config.defaultNamespace);
    const log = this.logger.child({ documentId, namespace });

    const document = await this.normalizer.normalize(toNormalizeInput(request.source));
    log.debug({ kind: document.kind, chars: document.text.length, pages: document.pageCount }, "Document normalized");

    const chunks = this.chunker.chunk(document.text, this.config.chunking);
    log.debug({ chunkCount: chunks.length }, "Document chunked");

    const embedded = await embedInBatches(
      this.embeddingProvider,
      chunks.map((c) => c.content),
      { dimensions: this.config.embedDim, batchSize: this.config.embedBatchSize, inputType: "document" },
    );
    assertVectorDimensions(embedded.embeddings, this.config.embedDim);

    const points: VectorPoint[] = chunks.map((chunk, i) => {
      const vector = embedded.embeddings[i];
      if (vector === undefined) {
        throw new ProviderError(`Missing embedding for chunk ${String(i)}`, this.embeddingProvider.name);
      }
      return {
        id: chunkId(documentId, chunk.index),
        vector,
        metadata: {
          ...request.metadata,
          [DOCUMENT_ID_KEY]: documentId,
          [CHUNK_INDEX_KEY]: chunk.index,
          [CHUNK_TEXT_KEY]: chunk.content,
          [SOURCE_KIND_KEY]: document.kind,
        },
      };
    });

    let replacedChunks: number | undefined;
    if (request.replace) {
      replacedChunks = (await this.deleteByDocument(documentId, namespace)).deleted;
    }

    if (points.length > 0) {
      await this.vectorStore.upsert(namespace, points);
    }

    log.info(
      { chunkCount: points.length, tokensUsed: embedded.tokensUsed, model: embedded.model },
      "Document ingested",
    );

    return {
      documentId,
      namespace,
      chunkCount: points.length,
      ids: points.map((p) => p.id),
      tokensUsed: embedded.tokensUsed,
      dimensions: this.config.embedDim,
      ...(replacedChunks !== undefined ? { replacedChunks } : {}),
    };
  }

  /**
   * Raw upsert of caller-embedded points. Ids must be `<document_id>#<n>` so
   * that stores listing by id prefix find them again on delete.
   */
  async upsertPoints(namespace: string | undefined, points: VectorPoint[]): Promise<UpsertPointsResult> {
    const ns = resolveNamespace(namespace, this.config.defaultNamespace);

    points.forEach((point, index) => {
      if (!point.id.trim()) {
        throw new ValidationError("Every point needs an id", { [`points[${String(index)}].id`]: "must be a non-empty string" });
      }
      const documentId = point.metadata[DOCUMENT_ID_KEY];
      if (typeof documentId !== "string" || !documentId.trim()) {
        throw new ValidationError(`Point "${point.id}" is missing metadata.${DOCUMENT_ID_KEY}`, {
          [`points[${String(index)}].metadata.${DOCUMENT_ID_KEY}`]: "must be a non-empty string",
        });
      }
      if (!isChunkIdOf(point.id, documentId)) {
        throw new ValidationError(`Point id "${point.id}" must have the form "${documentId}#<n>"`, {
          [`points[${String(index)}].id`]: `must be "${documentId}#" followed by a chunk number`,
        });
      }
    });
    assertVectorDimensions(
      points.map((p) => p.vector),
      this.config.embedDim,
    );

    if (points.length > 0) {
      await this.vectorStore.upsert(ns, points);
    }
    this.logger.info({ namespace: ns, count: points.length }, "Points upserted");
    return { namespace: ns, count: points.length };
  }

  /**
   * Deletes every chunk of a document, one page of ids at a time.
   *
   * The store's cursor is followed while it returns one. A full page without a
   * cursor restarts listing from the beginning, which only sees ids that are
   * still present. Stops at a short page, or when a restart returns nothing
   * new. A store failure surfaces as PartialDeleteError carrying the count so
   * far; calling again finishes the job.
   */
  async deleteByDocument(documentId: string, namespace?: string): Promise<DeleteByDocumentResult> {
    const docId = requireDocumentId(documentId);
    const ns = resolveNamespace(namespace, this.config.defaultNamespace);
    const limit = Math.max(1, Math.min(this.config.deletePageSize, this.vectorStore.maxPageSize));
    const filter = { [DOCUMENT_ID_KEY]: docId };
    const log = this.logger.child({ documentId: docId, namespace: ns });

    const deletedIds = new Set<string>();
    let pages = 0;
    let pageToken: string | undefined;

    try {
      for (;;) {
        const page = await this.vectorStore.listIdsByMetadata(ns, filter, { limit, pageToken });
        const fresh = page.ids.filter((id) => !deletedIds.has(id));

        if (fresh.length > 0) {
          await this.vectorStore.deleteByIds(ns, fresh);
          for (const id of fresh) deletedIds.add(id);
          pages += 1;
          log.debug({ page: pages, count: fresh.length }, "Deleted page of chunk ids");
        }

        if (page.nextPageToken !== undefined && page.nextPageToken !== pageToken) {
          pageToken = page.nextPageToken;
          continue;
        }
        if (page.ids.length < limit || fresh.length === 0) break;
        pageToken = undefined;
      }
    } catch (err) {
      log.warn({ deleted: deletedIds.size, err }, "Delete by document interrupted");
      throw new PartialDeleteError(docId, ns, deletedIds.size, { cause: err });
    }

    log.info({ deleted: deletedIds.size, pages }, "Document deleted");
    return { documentId: docId, namespace: ns, deleted: deletedIds.size, pages };
  }
}
