import { DimensionMismatchError, ValidationError } from "@ragsync/errors";

/**
 * Every vector must have exactly `expected` finite components. Callers run
 * this before any write so that a bad batch never lands partially.
 */
export function assertVectorDimensions(vectors: number[][], expected: number): void {
  vectors.forEach((vector, index) => {
    if (vector.length !== expected) {
      throw new DimensionMismatchError(expected, vector.length, { details: { index } });
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new ValidationError(`Vector ${String(index)} contains non-finite values`, {
        [`vectors[${String(index)}]`]: "must contain only finite numbers",
      });
    }
  });
}
