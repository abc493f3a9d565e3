/**
 * Secret-bearing keys stripped from every log line.
 *
 * Provider configs and SDK errors sometimes end up in log bindings, so the
 * same keys are covered one level deep as well.
 */
const SECRET_KEYS = [
  "apiKey",
  "api_key",
  "token",
  "authorization",
  "password",
  "secret",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export const REDACT_PATHS: string[] = [...SECRET_KEYS, ...SECRET_KEYS.map((key) => `*.${key}`)];
