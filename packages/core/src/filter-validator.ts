import { InvalidQueryError } from "@ragsync/errors";
import type {
  ComparisonOperator,
  FieldCondition,
  MetadataFilter,
  MetadataValue,
  SetOperator,
} from "@ragsync/types";
import { FILTER_OPERATOR_ALLOWLIST } from "@ragsync/types";

const COMPARISON_OPERATORS = new Set<string>(["$eq", "$ne", "$gt", "$gte", "$lt", "$lte"]);
const RANGE_OPERATORS = new Set<string>(["$gt", "$gte", "$lt", "$lte"]);
const SET_OPERATORS = new Set<string>(["$in", "$nin"]);

function isComparisonOperator(op: string): op is ComparisonOperator {
  return COMPARISON_OPERATORS.has(op);
}

function isSetOperator(op: string): op is SetOperator {
  return SET_OPERATORS.has(op);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

function invalid(field: string, reason: string): InvalidQueryError {
  return new InvalidQueryError(`Invalid filter on "${field}": ${reason}`, { details: { field } });
}

function validateCondition(field: string, condition: unknown): FieldCondition {
  if (isMetadataValue(condition)) return condition;

  if (!isPlainObject(condition)) {
    throw invalid(field, "expected a string, number, boolean or operator object");
  }

  const entries = Object.entries(condition);
  if (entries.length === 0) throw invalid(field, "operator object is empty");

  const comparisons: Partial<Record<ComparisonOperator, MetadataValue>> = {};
  const sets: Partial<Record<SetOperator, MetadataValue[]>> = {};

  for (const [op, operand] of entries) {
    if (isComparisonOperator(op)) {
      if (!isMetadataValue(operand)) throw invalid(field, `${op} expects a single value`);
      if (RANGE_OPERATORS.has(op) && typeof operand !== "number") {
        throw invalid(field, `${op} expects a number`);
      }
      comparisons[op] = operand;
    } else if (isSetOperator(op)) {
      if (!Array.isArray(operand) || operand.length === 0 || !operand.every(isMetadataValue)) {
        throw invalid(field, `${op} expects a non-empty list of values`);
      }
      sets[op] = operand;
    } else {
      throw invalid(field, `unsupported operator "${op}". Allowed: ${FILTER_OPERATOR_ALLOWLIST.join(", ")}`);
    }
  }

  const hasComparisons = Object.keys(comparisons).length > 0;
  const hasSets = Object.keys(sets).length > 0;
  if (hasComparisons && hasSets) throw invalid(field, "cannot mix comparison and list operators");
  return hasSets ? sets : comparisons;
}

/**
 * Allowlist-only filter validation.
 * Accepts `field -> value | { operator: operand }` with operators from
 * FILTER_OPERATOR_ALLOWLIST and rebuilds the filter from the parts it checked.
 */
export function validateMetadataFilter(filter: unknown): MetadataFilter {
  if (!isPlainObject(filter)) {
    throw new InvalidQueryError("filter must be an object of field conditions");
  }

  const validated: MetadataFilter = {};
  for (const [field, condition] of Object.entries(filter)) {
    if (field.trim() === "" || field.startsWith("$")) {
      throw invalid(field, "field names must be non-empty and must not start with $");
    }
    validated[field] = validateCondition(field, condition);
  }
  return validated;
}
