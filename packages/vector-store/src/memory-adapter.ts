import type {
  IdPage,
  ListIdsOptions,
  MetadataFilter,
  QueryMatch,
  VectorPoint,
  VectorQuery,
} from "@ragsync/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { matchesFilter } from "./filter.js";

const DEFAULT_MAX_PAGE_SIZE = 1000;

export interface InMemoryVectorStoreOptions {
  maxPageSize?: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Process-local store for development and tests. Ranks by cosine similarity
 * and pages ids in key order, so cursors survive deletes.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly name = "memory";
  readonly maxPageSize: number;
  private namespaces = new Map<string, Map<string, VectorPoint>>();

  constructor(options: InMemoryVectorStoreOptions = {}) {
    this.maxPageSize = options.maxPageSize ?? DEFAULT_MAX_PAGE_SIZE;
  }

  private points(namespace: string): Map<string, VectorPoint> {
    let points = this.namespaces.get(namespace);
    if (!points) {
      points = new Map();
      this.namespaces.set(namespace, points);
    }
    return points;
  }

  upsert(namespace: string, points: VectorPoint[]): Promise<void> {
    const stored = this.points(namespace);
    for (const point of points) {
      stored.set(point.id, { id: point.id, vector: [...point.vector], metadata: { ...point.metadata } });
    }
    return Promise.resolve();
  }

  query(namespace: string, query: VectorQuery): Promise<QueryMatch[]> {
    const scored = [...this.points(namespace).values()]
      .filter((point) => matchesFilter(point.metadata, query.filter))
      .map((point) => ({ point, score: cosineSimilarity(query.vector, point.vector) }))
      .sort((a, b) => b.score - a.score || (a.point.id < b.point.id ? -1 : 1))
      .slice(0, query.topK);

    return Promise.resolve(
      scored.map(({ point, score }) => ({
        id: point.id,
        score,
        ...(query.includeMetadata ? { metadata: { ...point.metadata } } : {}),
        ...(query.includeValues ? { values: [...point.vector] } : {}),
      })),
    );
  }

  listIdsByMetadata(namespace: string, filter: MetadataFilter, options: ListIdsOptions): Promise<IdPage> {
    const limit = Math.min(options.limit, this.maxPageSize);
    const after = options.pageToken;
    const matching = [...this.points(namespace).values()]
      .filter((point) => matchesFilter(point.metadata, filter))
      .map((point) => point.id)
      .filter((id) => after === undefined || id > after)
      .sort();

    const ids = matching.slice(0, limit);
    const last = ids[ids.length - 1];
    return Promise.resolve(
      matching.length > limit && last !== undefined ? { ids, nextPageToken: last } : { ids },
    );
  }

  deleteByIds(namespace: string, ids: string[]): Promise<void> {
    const stored = this.points(namespace);
    for (const id of ids) stored.delete(id);
    return Promise.resolve();
  }

  ensureIndex(): Promise<void> {
    return Promise.resolve();
  }

  healthCheck(): Promise<boolean> {
    return Promise.resolve(true);
  }

  /** Number of points stored in `namespace`. */
  count(namespace: string): number {
    return this.namespaces.get(namespace)?.size ?? 0;
  }
}
