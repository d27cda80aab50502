export type { IVectorStore } from "./vector-store.interface.js";
export { PineconeVectorStore } from "./pinecone-adapter.js";
export type { PineconeStoreConfig } from "./pinecone-adapter.js";
export { QdrantVectorStore, toPointId } from "./qdrant-adapter.js";
export type { QdrantStoreConfig } from "./qdrant-adapter.js";
export { toQdrantFilter } from "./qdrant-filter.js";
export { InMemoryVectorStore, cosineSimilarity } from "./memory-adapter.js";
export type { InMemoryVectorStoreOptions } from "./memory-adapter.js";
export { matchesFilter, filterClauses, documentIdFromFilter } from "./filter.js";
export type { FieldClause } from "./filter.js";
export { createVectorStore } from "./factory.js";
