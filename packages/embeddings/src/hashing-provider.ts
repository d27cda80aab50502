import type { EmbeddingResult } from "@ragsync/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;
const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

function fnv1a(token: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

/**
 * Local feature-hashing embedder: each lowercase word is hashed into one of
 * `dimensions` buckets with a hash-derived sign, and the result is
 * L2-normalized. Deterministic and offline, for development and tests.
 * Text with no words embeds to the zero vector.
 */
export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "hashing";
  readonly maxBatchSize = 256;

  embed(texts: string[], dimensions: number): Promise<EmbeddingResult> {
    let tokensUsed = 0;

    const embeddings = texts.map((text) => {
      const vector = new Array<number>(dimensions).fill(0);
      const tokens = tokenize(text);
      tokensUsed += tokens.length;

      for (const token of tokens) {
        const hash = fnv1a(token);
        const bucket = hash % dimensions;
        vector[bucket] = (vector[bucket] ?? 0) + ((hash & 0x80000000) === 0 ? 1 : -1);
      }

      const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
      return norm === 0 ? vector : vector.map((v) => v / norm);
    });

    return Promise.resolve({ embeddings, model: "hashing-v1", tokensUsed, dimensions });
  }

  healthCheck(): Promise<boolean> {
    return Promise.resolve(true);
  }
}
