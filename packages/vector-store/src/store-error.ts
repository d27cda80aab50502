import { AppError, StoreError } from "@ragsync/errors";

export function toStoreError(store: string, operation: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new StoreError(`${store} ${operation} failed: ${reason}`, store, operation, { cause: err });
}
