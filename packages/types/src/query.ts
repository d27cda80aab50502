import type { MetadataValue } from "./document.js";

export type ComparisonOperator = "$eq" | "$ne" | "$gt" | "$gte" | "$lt" | "$lte";

export type SetOperator = "$in" | "$nin";

export type FieldCondition =
  | MetadataValue
  | Partial<Record<ComparisonOperator, MetadataValue>>
  | Partial<Record<SetOperator, MetadataValue[]>>;

/** Field conditions are AND-ed together. */
export type MetadataFilter = Record<string, FieldCondition>;

export const FILTER_OPERATOR_ALLOWLIST = [
  "$eq",
  "$ne",
  "$gt",
  "$gte",
  "$lt",
  "$lte",
  "$in",
  "$nin",
] as const;

export interface QueryRequest {
  namespace?: string;
  text?: string;
  vector?: number[];
  topK?: number;
  filter?: MetadataFilter;
  includeValues?: boolean;
  includeMetadata?: boolean;
}

export interface QueryMatch {
  id: string;
  /** Store-defined similarity; higher is closer. */
  score: number;
  metadata?: Record<string, unknown>;
  values?: number[];
}

export interface QueryResult {
  namespace: string;
  matches: QueryMatch[];
}

export interface VectorQuery {
  vector: number[];
  topK: number;
  filter?: MetadataFilter;
  includeValues: boolean;
  includeMetadata: boolean;
}
