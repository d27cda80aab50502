import { z } from "zod";
import { ProviderError } from "@ragsync/errors";
import type { EmbeddingResult } from "@ragsync/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-error.js";

const DEFAULT_TIMEOUT_MS = 30_000;
const BATCH_SIZE = 64;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  timeoutMs?: number;
}

const bgeM3ResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().int().nonnegative().default(0),
});

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly maxBatchSize = BATCH_SIZE;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embed(texts: string[], dimensions: number): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], model: "bge-m3", tokensUsed: 0, dimensions };
    }

    try {
      const response = await fetch(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts, dimensions }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        throw new ProviderError(
          `BGE-M3 embedding failed: ${String(response.status)} ${response.statusText}`,
          this.name,
        );
      }

      const parsed = bgeM3ResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderError("BGE-M3 returned an unexpected response body", this.name, {
          cause: parsed.error,
        });
      }

      return {
        embeddings: parsed.data.embeddings,
        model: "bge-m3",
        tokensUsed: parsed.data.tokens_used,
        dimensions,
      };
    } catch (err) {
      throw toProviderError(this.name, err);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}
