/** Blank or missing namespaces fall back to the configured default. */
export function resolveNamespace(namespace: string | undefined, fallback: string): string {
  const trimmed = namespace?.trim();
  return trimmed ? trimmed : fallback;
}

/** Non-integer, non-positive or missing values fall back to the default. */
export function resolveTopK(topK: number | undefined, fallback: number): number {
  return topK !== undefined && Number.isInteger(topK) && topK > 0 ? topK : fallback;
}
