import type { ChunkMetadataRecord, FieldCondition, MetadataFilter, MetadataValue } from "@ragsync/types";
import { DOCUMENT_ID_KEY } from "@ragsync/types";

export type FilterOperand = MetadataValue | MetadataValue[];

export interface FieldClause {
  field: string;
  operator: string;
  operand: FilterOperand;
}

function isScalar(value: unknown): value is MetadataValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function conditionClauses(field: string, condition: FieldCondition): FieldClause[] {
  if (isScalar(condition)) {
    return [{ field, operator: "$eq", operand: condition }];
  }
  const clauses: FieldClause[] = [];
  for (const [operator, operand] of Object.entries(condition)) {
    if (operand !== undefined) clauses.push({ field, operator, operand });
  }
  return clauses;
}

/** Flattens a filter into one clause per field operator. All clauses must hold. */
export function filterClauses(filter: MetadataFilter): FieldClause[] {
  return Object.entries(filter).flatMap(([field, condition]) => conditionClauses(field, condition));
}

function compare(actual: MetadataValue | undefined, operand: FilterOperand, test: (a: number, b: number) => boolean): boolean {
  return typeof actual === "number" && typeof operand === "number" && test(actual, operand);
}

function clauseHolds(metadata: ChunkMetadataRecord, clause: FieldClause): boolean {
  const actual = metadata[clause.field];
  const { operand } = clause;

  switch (clause.operator) {
    case "$eq":
      return actual === operand;
    case "$ne":
      return actual !== operand;
    case "$gt":
      return compare(actual, operand, (a, b) => a > b);
    case "$gte":
      return compare(actual, operand, (a, b) => a >= b);
    case "$lt":
      return compare(actual, operand, (a, b) => a < b);
    case "$lte":
      return compare(actual, operand, (a, b) => a <= b);
    case "$in":
      return actual !== undefined && Array.isArray(operand) && operand.includes(actual);
    case "$nin":
      return Array.isArray(operand) && (actual === undefined || !operand.includes(actual));
    default:
      return false;
  }
}

export function matchesFilter(metadata: ChunkMetadataRecord, filter: MetadataFilter | undefined): boolean {
  if (!filter) return true;
  return filterClauses(filter).every((clause) => clauseHolds(metadata, clause));
}

/**
 * The document id when `filter` selects exactly one document and nothing else,
 * i.e. `{ document_id: "x" }` or `{ document_id: { $eq: "x" } }`.
 */
export function documentIdFromFilter(filter: MetadataFilter): string | undefined {
  const clauses = filterClauses(filter);
  const [clause] = clauses;
  if (clauses.length !== 1 || clause === undefined) return undefined;
  if (clause.field !== DOCUMENT_ID_KEY || clause.operator !== "$eq") return undefined;
  return typeof clause.operand === "string" ? clause.operand : undefined;
}
