import type {
  IdPage,
  ListIdsOptions,
  MetadataFilter,
  QueryMatch,
  VectorPoint,
  VectorQuery,
} from "@ragsync/types";

export interface IVectorStore {
  readonly name: string;
  /** Largest page `listIdsByMetadata` will return. */
  readonly maxPageSize: number;

  /** Insert or overwrite by id. */
  upsert(namespace: string, points: VectorPoint[]): Promise<void>;
  /** Matches in the store's own ranking order, best first. */
  query(namespace: string, query: VectorQuery): Promise<QueryMatch[]>;
  /**
   * One page of ids whose metadata satisfies `filter`. `nextPageToken` is
   * key-based: it stays valid after the ids already returned are deleted.
   */
  listIdsByMetadata(namespace: string, filter: MetadataFilter, options: ListIdsOptions): Promise<IdPage>;
  deleteByIds(namespace: string, ids: string[]): Promise<void>;
  /** Create or verify the backing index for vectors of `dimensions`. */
  ensureIndex(dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
