import { ProviderError } from "@ragsync/errors";
import type { EmbeddingInputType, IEmbeddingProvider } from "@ragsync/embeddings";
import type { EmbeddingResult } from "@ragsync/types";

export interface EmbedBatchOptions {
  dimensions: number;
  /** Upper bound per call; the provider's own limit still applies. */
  batchSize: number;
  inputType?: EmbeddingInputType;
}

/**
 * Embeds `texts` in sequential slices no larger than either the configured
 * batch size or the provider's limit, concatenating results in input order.
 */
export async function embedInBatches(
  provider: IEmbeddingProvider,
  texts: string[],
  options: EmbedBatchOptions,
): Promise<EmbeddingResult> {
  const batchSize = Math.max(1, Math.min(options.batchSize, provider.maxBatchSize));
  const embeddings: number[][] = [];
  let tokensUsed = 0;
  let model = provider.name;

  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);
    const result = await provider.embed(batch, options.dimensions, { inputType: options.inputType });

    if (result.embeddings.length !== batch.length) {
      throw new ProviderError(
        `${provider.name} returned ${String(result.embeddings.length)} embeddings for ${String(batch.length)} texts`,
        provider.name,
      );
    }

    embeddings.push(...result.embeddings);
    tokensUsed += result.tokensUsed;
    model = result.model;
  }

  return { embeddings, model, tokensUsed, dimensions: options.dimensions };
}
