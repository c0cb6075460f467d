/**
 * Redaction of secrets before anything leaves the process
 */

export const DEFAULT_SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "token",
  "access_token",
  "refresh_token",
  "id_token",
  "auth",
  "authorization",
  "password",
  "pwd",
  "passphrase",
  "secret",
  "client_secret",
  "secret_key",
  "private_key",
  "api_key",
  "apikey",
  "x-api-key",
  "x_api_key",
  "cookie",
  "set-cookie",
  "set_cookie",
  "session",
  "aws_access_key_id",
  "aws_secret_access_key",
  "aws_session_token",
]);

export const REDACTED = "[REDACTED]";
export const TRUNCATED_SUFFIX = "…[TRUNCATED]";

const BEARER_RE = /\bBearer\s+[A-Za-z0-9\-_.=]+/gi;

export interface RedactOptions {
  sensitiveKeys?: ReadonlySet<string>;
  /** Strings longer than this are cut */
  maxLength?: number;
}

/**
 * Normalise camelCase keys so `apiKey` matches `api_key`
 */
function normaliseKey(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

export function redactString(value: string, maxLength = 4000): string {
  const masked = value.replace(BEARER_RE, `Bearer ${REDACTED}`);
  if (masked.length > maxLength) {
    return masked.slice(0, maxLength) + TRUNCATED_SUFFIX;
  }
  return masked;
}

/**
 * Deep-copy `value`, masking values under sensitive keys and bearer tokens
 * inside strings
 */
export function redact(value: unknown, options: RedactOptions = {}): unknown {
  const sensitiveKeys = options.sensitiveKeys ?? DEFAULT_SENSITIVE_KEYS;
  const maxLength = options.maxLength ?? 4000;

  const walk = (input: unknown, ancestors: Set<object>): unknown => {
    if (typeof input === "string") return redactString(input, maxLength);
    if (input === null || typeof input !== "object") return input;
    if (input instanceof Date) return input.toISOString();
    if (ancestors.has(input)) return "[Circular]";
    ancestors.add(input);

    let out: unknown;
    if (Array.isArray(input)) {
      out = input.map((item) => walk(item, ancestors));
    } else {
      const record: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(input)) {
        record[key] = sensitiveKeys.has(normaliseKey(key)) ? REDACTED : walk(item, ancestors);
      }
      out = record;
    }
    // Only the current path counts; shared references elsewhere are copied again
    ancestors.delete(input);
    return out;
  };

  return walk(value, new Set());
}

/**
 * Redact a key/value map, keeping the map type
 */
export function redactRecord(
  record: Readonly<Record<string, unknown>>,
  options: RedactOptions = {}
): Record<string, unknown> {
  const sensitiveKeys = options.sensitiveKeys ?? DEFAULT_SENSITIVE_KEYS;
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(record)) {
    out[key] = sensitiveKeys.has(normaliseKey(key)) ? REDACTED : redact(item, options);
  }
  return out;
}
