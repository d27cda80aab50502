export { IndexingOrchestrator } from "./indexing-orchestrator.js";
export type { IndexingDependencies, UpsertPointsResult } from "./indexing-orchestrator.js";

export { RetrievalOrchestrator } from "./retrieval-orchestrator.js";
export type { RetrievalDependencies } from "./retrieval-orchestrator.js";

export { assertVectorDimensions } from "./dimension-contract.js";
export { embedInBatches } from "./embed-batches.js";
export type { EmbedBatchOptions } from "./embed-batches.js";
export { validateMetadataFilter } from "./filter-validator.js";
export { resolveNamespace, resolveTopK } from "./namespace.js";
