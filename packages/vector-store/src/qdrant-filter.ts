import type { QdrantClient, Schemas } from "@qdrant/js-client-rest";
import { StoreError } from "@ragsync/errors";
import type { MetadataFilter, MetadataValue } from "@ragsync/types";
import type { FieldClause } from "./filter.js";
import { filterClauses } from "./filter.js";

export type QdrantFilter = NonNullable<Parameters<QdrantClient["search"]>[1]["filter"]>;
type QdrantCondition = Schemas["Condition"];
interface QdrantRange {
  gt?: number;
  gte?: number;
  lt?: number;
  lte?: number;
}

export const NAMESPACE_KEY = "namespace";

function unsupported(clause: FieldClause, reason: string): StoreError {
  return new StoreError(
    `Cannot translate filter on "${clause.field}" (${clause.operator}): ${reason}`,
    "qdrant",
    "filter",
  );
}

function scalarOperand(clause: FieldClause): MetadataValue {
  if (Array.isArray(clause.operand)) throw unsupported(clause, "expected a single value");
  return clause.operand;
}

function rangeOperand(clause: FieldClause): QdrantRange {
  const value = clause.operand;
  if (typeof value !== "number") throw unsupported(clause, "range bounds must be numbers");
  switch (clause.operator) {
    case "$gt":
      return { gt: value };
    case "$gte":
      return { gte: value };
    case "$lt":
      return { lt: value };
    default:
      return { lte: value };
  }
}

function listOperand(clause: FieldClause): string[] | number[] {
  const values = clause.operand;
  if (!Array.isArray(values)) throw unsupported(clause, "expected a list");
  const strings = values.filter((v): v is string => typeof v === "string");
  if (strings.length === values.length) return strings;
  const numbers = values.filter((v): v is number => typeof v === "number");
  if (numbers.length === values.length) return numbers;
  throw unsupported(clause, "list values must be all strings or all numbers");
}

/**
 * Translates a metadata filter into a Qdrant filter scoped to `namespace`.
 * Every clause is AND-ed; `$ne` becomes a `must_not` match.
 */
export function toQdrantFilter(namespace: string, filter?: MetadataFilter): QdrantFilter {
  const must: QdrantCondition[] = [{ key: NAMESPACE_KEY, match: { value: namespace } }];
  const mustNot: QdrantCondition[] = [];

  for (const clause of filterClauses(filter ?? {})) {
    const key = clause.field;
    switch (clause.operator) {
      case "$eq":
        must.push({ key, match: { value: scalarOperand(clause) } });
        break;
      case "$ne":
        mustNot.push({ key, match: { value: scalarOperand(clause) } });
        break;
      case "$gt":
      case "$gte":
      case "$lt":
      case "$lte":
        must.push({ key, range: rangeOperand(clause) });
        break;
      case "$in":
        must.push({ key, match: { any: listOperand(clause) } });
        break;
      case "$nin":
        must.push({ key, match: { except: listOperand(clause) } });
        break;
      default:
        throw unsupported(clause, "unknown operator");
    }
  }

  return mustNot.length > 0 ? { must, must_not: mustNot } : { must };
}
