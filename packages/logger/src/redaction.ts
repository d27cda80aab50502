/**
 * Secret redaction for log output.
 *
 * Provider credentials travel through config objects and client options, so the
 * paths below cover the top level, one level of nesting and the common request
 * header locations.
 */

export const REDACTED = "[REDACTED]";

export const SENSITIVE_KEYS: readonly string[] = [
  "apiKey",
  "api_key",
  "token",
  "secret",
  "password",
  "authorization",
  "cookie",
];

const HEADER_PATHS = [
  "headers.authorization",
  "headers.cookie",
  'headers["x-api-key"]',
  "req.headers.authorization",
  "req.headers.cookie",
  'req.headers["x-api-key"]',
];

/**
 * Build the JSON-path list passed to Pino's `redact` option.
 */
export function buildRedactPaths(keys: readonly string[] = SENSITIVE_KEYS): string[] {
  return [...keys, ...keys.map((key) => `*.${key}`), ...HEADER_PATHS];
}

export const REDACT_PATHS: string[] = buildRedactPaths();
