export { AppError } from "./app-error.js";
export type { AppErrorOptions, SerializedError } from "./app-error.js";

export {
  NotFoundError,
  ValidationError,
  UnsupportedDocumentKindError,
  ExtractionFailedError,
  DimensionMismatchError,
  InvalidQueryError,
  ProviderError,
  StoreError,
  PartialDeleteError,
  isUpstreamError,
} from "./errors.js";

export { withRetry, isTransient, backoffDelay } from "./retry.js";
export type { RetryOptions } from "./retry.js";
