import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import type {
  IdPage,
  ListIdsOptions,
  MetadataFilter,
  QueryMatch,
  VectorPoint,
  VectorQuery,
} from "@ragsync/types";
import { DOCUMENT_ID_KEY } from "@ragsync/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { NAMESPACE_KEY, toQdrantFilter } from "./qdrant-filter.js";
import { toStoreError } from "./store-error.js";

const BATCH_SIZE = 100;
const MAX_PAGE_SIZE = 1000;
const CHUNK_ID_KEY = "chunk_id";
const RESERVED_KEYS = new Set([NAMESPACE_KEY, CHUNK_ID_KEY]);

export interface QdrantStoreConfig {
  url: string;
  apiKey?: string;
  collectionName: string;
  timeoutMs?: number;
}

/**
 * Qdrant point ids must be UUIDs or integers, so chunk ids are mapped to a
 * name-based UUID of namespace + chunk id and kept verbatim in the payload.
 */
export function toPointId(namespace: string, chunkId: string): string {
  const hex = createHash("sha1").update(`${namespace}\u0000${chunkId}`).digest("hex");
  const variant = ((parseInt(hex.charAt(16), 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

function payloadMetadata(payload: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(payload).filter(([key]) => !RESERVED_KEYS.has(key)));
}

/**
 * Single Qdrant collection holding every namespace; the namespace is a
 * payload field added to each point and to every filter.
 */
export class QdrantVectorStore implements IVectorStore {
  readonly name = "qdrant";
  readonly maxPageSize = MAX_PAGE_SIZE;
  private client: QdrantClient;
  private collectionName: string;

  constructor(config: QdrantStoreConfig) {
    this.client = new QdrantClient({ url: config.url, apiKey: config.apiKey, timeout: config.timeoutMs });
    this.collectionName = config.collectionName;
  }

  async upsert(namespace: string, points: VectorPoint[]): Promise<void> {
    try {
      // Process in batches
      for (let i = 0; i < points.length; i += BATCH_SIZE) {
        const batch = points.slice(i, i + BATCH_SIZE);

        await this.client.upsert(this.collectionName, {
          wait: true,
          points: batch.map((p) => ({
            id: toPointId(namespace, p.id),
            vector: p.vector,
            payload: { ...p.metadata, [NAMESPACE_KEY]: namespace, [CHUNK_ID_KEY]: p.id },
          })),
        });
      }
    } catch (err) {
      throw toStoreError(this.name, "upsert", err);
    }
  }

  async query(namespace: string, query: VectorQuery): Promise<QueryMatch[]> {
    try {
      const results = await this.client.search(this.collectionName, {
        vector: query.vector,
        limit: query.topK,
        filter: toQdrantFilter(namespace, query.filter),
        with_payload: true,
        with_vector: query.includeValues,
      });

      return results.map((r) => {
        const payload = r.payload ?? {};
        const chunkId = payload[CHUNK_ID_KEY];
        return {
          id: typeof chunkId === "string" ? chunkId : String(r.id),
          score: r.score,
          ...(query.includeMetadata ? { metadata: payloadMetadata(payload) } : {}),
          ...(query.includeValues && isNumberArray(r.vector) ? { values: r.vector } : {}),
        };
      });
    } catch (err) {
      throw toStoreError(this.name, "query", err);
    }
  }

  async listIdsByMetadata(
    namespace: string,
    filter: MetadataFilter,
    options: ListIdsOptions,
  ): Promise<IdPage> {
    try {
      const response = await this.client.scroll(this.collectionName, {
        filter: toQdrantFilter(namespace, filter),
        limit: Math.min(options.limit, MAX_PAGE_SIZE),
        offset: options.pageToken,
        with_payload: [CHUNK_ID_KEY],
        with_vector: false,
      });

      const ids = response.points.flatMap((p) => {
        const chunkId = p.payload?.[CHUNK_ID_KEY];
        return typeof chunkId === "string" ? [chunkId] : [];
      });
      const next = response.next_page_offset;
      return next === undefined || next === null ? { ids } : { ids, nextPageToken: String(next) };
    } catch (err) {
      throw toStoreError(this.name, "listIdsByMetadata", err);
    }
  }

  async deleteByIds(namespace: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    try {
      await this.client.delete(this.collectionName, {
        wait: true,
        points: ids.map((id) => toPointId(namespace, id)),
      });
    } catch (err) {
      throw toStoreError(this.name, "deleteByIds", err);
    }
  }

  async ensureIndex(dimensions: number): Promise<void> {
    try {
      const collections = await this.client.getCollections();
      const exists = collections.collections.some((c) => c.name === this.collectionName);
      if (exists) return;

      await this.client.createCollection(this.collectionName, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
      });

      // Create payload indexes for filtering
      await this.client.createPayloadIndex(this.collectionName, {
        field_name: NAMESPACE_KEY,
        field_schema: "keyword",
      });
      await this.client.createPayloadIndex(this.collectionName, {
        field_name: DOCUMENT_ID_KEY,
        field_schema: "keyword",
      });
    } catch (err) {
      throw toStoreError(this.name, "ensureIndex", err);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
