import { Pinecone } from "@pinecone-database/pinecone";
import type { Index } from "@pinecone-database/pinecone";
import { StoreError } from "@ragsync/errors";
import type {
  ChunkMetadataRecord,
  IdPage,
  ListIdsOptions,
  MetadataFilter,
  QueryMatch,
  VectorPoint,
  VectorQuery,
} from "@ragsync/types";
import { chunkIdPrefix, isChunkIdOf } from "@ragsync/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { documentIdFromFilter } from "./filter.js";
import { toStoreError } from "./store-error.js";

const UPSERT_BATCH_SIZE = 100;
const LIST_PAGE_LIMIT = 100; // Pinecone list() maximum

export interface PineconeStoreConfig {
  apiKey: string;
  indexName: string;
  /** Data-plane host; skips the control-plane lookup when set. */
  host?: string;
}

/**
 * Pinecone serverless index. Namespaces map one to one.
 *
 * Pinecone lists ids by prefix only, so listing by metadata is limited to
 * `document_id` equality and relies on chunk ids having the form
 * `<documentId>#<index>`. The prefix also matches other documents whose id
 * starts with `<documentId>#`; those ids are dropped from the page while the
 * cursor is still passed on.
 */
export class PineconeVectorStore implements IVectorStore {
  readonly name = "pinecone";
  readonly maxPageSize = LIST_PAGE_LIMIT;
  private client: Pinecone;
  private index: Index<ChunkMetadataRecord>;
  private indexName: string;

  constructor(config: PineconeStoreConfig) {
    this.client = new Pinecone({ apiKey: config.apiKey });
    this.indexName = config.indexName;
    this.index = this.client.index<ChunkMetadataRecord>(config.indexName, config.host);
  }

  async upsert(namespace: string, points: VectorPoint[]): Promise<void> {
    const ns = this.index.namespace(namespace);
    try {
      for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
        const batch = points.slice(i, i + UPSERT_BATCH_SIZE);
        await ns.upsert(batch.map((p) => ({ id: p.id, values: p.vector, metadata: p.metadata })));
      }
    } catch (err) {
      throw toStoreError(this.name, "upsert", err);
    }
  }

  async query(namespace: string, query: VectorQuery): Promise<QueryMatch[]> {
    try {
      const response = await this.index.namespace(namespace).query({
        vector: query.vector,
        topK: query.topK,
        filter: query.filter,
        includeValues: query.includeValues,
        includeMetadata: query.includeMetadata,
      });

      return response.matches.map((match) => ({
        id: match.id,
        score: match.score ?? 0,
        ...(query.includeMetadata && match.metadata ? { metadata: match.metadata } : {}),
        ...(query.includeValues ? { values: match.values } : {}),
      }));
    } catch (err) {
      throw toStoreError(this.name, "query", err);
    }
  }

  async listIdsByMetadata(
    namespace: string,
    filter: MetadataFilter,
    options: ListIdsOptions,
  ): Promise<IdPage> {
    const documentId = documentIdFromFilter(filter);
    if (documentId === undefined) {
      throw new StoreError(
        "Pinecone can only list ids by document_id equality",
        this.name,
        "listIdsByMetadata",
      );
    }

    try {
      const response = await this.index.namespace(namespace).listPaginated({
        prefix: chunkIdPrefix(documentId),
        limit: Math.min(options.limit, LIST_PAGE_LIMIT),
        paginationToken: options.pageToken,
      });

      const ids = (response.vectors ?? []).flatMap((v) =>
        v.id !== undefined && isChunkIdOf(v.id, documentId) ? [v.id] : [],
      );
      const next = response.pagination?.next;
      return next ? { ids, nextPageToken: next } : { ids };
    } catch (err) {
      throw toStoreError(this.name, "listIdsByMetadata", err);
    }
  }

  async deleteByIds(namespace: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    try {
      await this.index.namespace(namespace).deleteMany(ids);
    } catch (err) {
      throw toStoreError(this.name, "deleteByIds", err);
    }
  }

  async ensureIndex(dimensions: number): Promise<void> {
    let actual: number | undefined;
    try {
      const description = await this.client.describeIndex(this.indexName);
      actual = description.dimension;
    } catch (err) {
      throw toStoreError(this.name, "describeIndex", err);
    }

    if (actual !== undefined && actual !== dimensions) {
      throw new StoreError(
        `Index "${this.indexName}" has dimension ${String(actual)}, expected ${String(dimensions)}`,
        this.name,
        "describeIndex",
      );
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.index.describeIndexStats();
      return true;
    } catch {
      return false;
    }
  }
}
