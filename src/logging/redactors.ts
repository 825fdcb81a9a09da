/**
 * Secret redaction for log output
 *
 * @module logging/redactors
 */

/**
 * Pino redaction paths. Values at these locations are replaced with
 * `[REDACTED]` before a line is written.
 */
export const REDACT_PATHS = [
  "env.OPENAI_API_KEY",
  "env.NEO4J_PASSWORD",

  "config.password",
  "config.apiKey",
  "config.neo4j.password",
  "config.openai.apiKey",

  "*.apiKey",
  "*.api_key",
  "*.password",
  "*.token",
  "*.secret",
  "*.accessToken",
  "*.authorization",
  "*.credentials",
];

export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  remove: false,
} as const;

/**
 * Patterns for values that look like credentials even outside known fields.
 * Used by tests to assert nothing leaked.
 */
export const SECRET_PATTERNS = {
  openai: /sk-(?:proj-)?[A-Za-z0-9_-]{20,}/,
  bearer: /Bearer\s+[A-Za-z0-9._-]{20,}/,
} as const;

/**
 * Check whether a string contains something shaped like a credential
 *
 * @example
 * ```typescript
 * looksLikeSecret("sk-proj-0123456789abcdefghijkl") // true
 * looksLikeSecret("Tom Hanks") // false
 * ```
 */
export function looksLikeSecret(value: string): boolean {
  return Object.values(SECRET_PATTERNS).some((pattern) => pattern.test(value));
}
