import type { VectorStoreConfig } from "@ragsync/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { PineconeVectorStore } from "./pinecone-adapter.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./memory-adapter.js";

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "pinecone":
      if (!config.pinecone.apiKey) {
        throw new Error("Pinecone API key is required for Pinecone vector store");
      }
      return new PineconeVectorStore(config.pinecone);
    case "qdrant":
      if (!config.qdrant.url) {
        throw new Error("Qdrant URL is required for Qdrant vector store");
      }
      return new QdrantVectorStore({ ...config.qdrant, timeoutMs: config.timeoutMs });
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
