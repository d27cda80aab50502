import { AppError, ProviderError } from "@ragsync/errors";

export function toProviderError(provider: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new ProviderError(`Embedding request to ${provider} failed: ${reason}`, provider, { cause: err });
}
