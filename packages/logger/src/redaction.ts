/**
 * Paths censored in every log line. Contract documents can carry auth
 * headers or tokens inside request bodies.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
  "password",
  "token",
  "secret",
  "authorization",
  "*.password",
  "*.token",
  "*.secret",
  "*.authorization",
  "headers.authorization",
  "headers.cookie",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
  return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}
