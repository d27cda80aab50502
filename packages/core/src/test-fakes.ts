import { StoreError } from "@ragsync/errors";
import { HashingEmbeddingProvider } from "@ragsync/embeddings";
import type { EmbedOptions, EmbeddingInputType, IEmbeddingProvider } from "@ragsync/embeddings";
import type {
  EmbeddingResult,
  IdPage,
  IndexingConfig,
  ListIdsOptions,
  MetadataFilter,
  QueryMatch,
  VectorPoint,
  VectorQuery,
} from "@ragsync/types";
import { InMemoryVectorStore } from "@ragsync/vector-store";

export const testConfig: IndexingConfig = {
  embedDim: 16,
  defaultNamespace: "default",
  indexName: "rag-test",
  chunking: { strategy: "boundary", maxSize: 60, overlap: 0, lookBack: 20, unit: "chars" },
  embedBatchSize: 4,
  defaultTopK: 10,
  deletePageSize: 5,
  deleteMaxRetries: 2,
};

type VectorsFor = (texts: string[], dimensions: number) => number[][];

/** Hashing embedder that records every call; `vectorsFor` replaces its output. */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly calls: string[][] = [];
  readonly inputTypes: (EmbeddingInputType | undefined)[] = [];
  private readonly hashing = new HashingEmbeddingProvider();

  constructor(
    readonly maxBatchSize = 256,
    private readonly vectorsFor?: VectorsFor,
  ) {}

  async embed(texts: string[], dimensions: number, options?: EmbedOptions): Promise<EmbeddingResult> {
    this.calls.push([...texts]);
    this.inputTypes.push(options?.inputType);
    if (this.vectorsFor) {
      return { embeddings: this.vectorsFor(texts, dimensions), model: "fake", tokensUsed: texts.length, dimensions };
    }
    return this.hashing.embed(texts, dimensions);
  }

  healthCheck(): Promise<boolean> {
    return Promise.resolve(true);
  }
}

export interface RecordingStoreOptions {
  maxPageSize?: number;
  /** Drop the cursor from every page, as stores without one do. */
  withoutCursor?: boolean;
  /** 1-based deleteByIds call that fails. */
  failDeleteOnCall?: number;
}

/** In-memory store that counts calls and can simulate upstream behaviour. */
export class RecordingVectorStore extends InMemoryVectorStore {
  readonly calls = { upsert: 0, query: 0, list: 0, delete: 0 };
  readonly queries: VectorQuery[] = [];
  private readonly withoutCursor: boolean;
  private failDeleteOnCall: number | undefined;

  constructor(options: RecordingStoreOptions = {}) {
    super({ maxPageSize: options.maxPageSize });
    this.withoutCursor = options.withoutCursor ?? false;
    this.failDeleteOnCall = options.failDeleteOnCall;
  }

  override upsert(namespace: string, points: VectorPoint[]): Promise<void> {
    this.calls.upsert += 1;
    return super.upsert(namespace, points);
  }

  override query(namespace: string, query: VectorQuery): Promise<QueryMatch[]> {
    this.calls.query += 1;
    this.queries.push(query);
    return super.query(namespace, query);
  }

  override async listIdsByMetadata(
    namespace: string,
    filter: MetadataFilter,
    options: ListIdsOptions,
  ): Promise<IdPage> {
    this.calls.list += 1;
    const page = await super.listIdsByMetadata(namespace, filter, options);
    return this.withoutCursor ? { ids: page.ids } : page;
  }

  override deleteByIds(namespace: string, ids: string[]): Promise<void> {
    this.calls.delete += 1;
    if (this.calls.delete === this.failDeleteOnCall) {
      this.failDeleteOnCall = undefined;
      return Promise.reject(new StoreError("memory deleteByIds failed: injected", "memory", "deleteByIds"));
    }
    return super.deleteByIds(namespace, ids);
  }

  get upstreamCalls(): number {
    return this.calls.upsert + this.calls.query + this.calls.list + this.calls.delete;
  }
}
