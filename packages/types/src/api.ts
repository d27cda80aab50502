export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  requestId: string;
  details?: unknown;
}

export interface HealthStatus {
  ok: boolean;
  vectorStore: string;
  index: string;
  namespaceDefault: string;
  embedDim: number;
  embeddingProvider: string;
}
