/**
 * Secret redaction for log output.
 *
 * Object-store credentials and presigned URL signatures are the secrets this
 * service handles most often; both must never reach a log line verbatim.
 */

const REDACTED = "[REDACTED]";

/**
 * Field names (camelCase as they appear in our objects) whose values are always censored.
 */
const SENSITIVE_FIELDS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "authorization",
  "cookie",
  "accessKey",
  "secretKey",
  "accessKeyId",
  "secretAccessKey",
  "sessionToken",
  "credentials",
] as const;

const SENSITIVE_KEYS: ReadonlySet<string> = new Set(
  SENSITIVE_FIELDS.flatMap((field) => [field.toLowerCase(), toSnakeCase(field)]),
);

/** Query parameters that make a presigned URL usable by whoever holds it. */
const SIGNED_QUERY_PARAMS = [
  "X-Amz-Signature",
  "X-Amz-Credential",
  "X-Amz-Security-Token",
  "Signature",
  "AWSAccessKeyId",
] as const;

function toSnakeCase(field: string): string {
  return field.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_KEYS.has(normalized) || SENSITIVE_KEYS.has(toSnakeCase(key));
}

/**
 * Redact a single key/value pair.
 *
 * Sensitive keys lose their whole value. String values that look like presigned
 * URLs keep their path but lose the signing parameters.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string" && /^https?:\/\//.test(value)) {
    return redactPresignedUrl(value);
  }

  return value;
}

/**
 * Replace the signing parameters of a presigned URL with "[REDACTED]".
 * Strings that do not parse as URLs are returned unchanged.
 */
export function redactPresignedUrl(url: string): string {
  if (!URL.canParse(url)) {
    return url;
  }

  const parsed = new URL(url);
  let changed = false;
  for (const param of SIGNED_QUERY_PARAMS) {
    if (parsed.searchParams.has(param)) {
      parsed.searchParams.set(param, REDACTED);
      changed = true;
    }
  }

  return changed ? parsed.toString() : url;
}

/**
 * JSON paths for Pino's `redact` option: every sensitive field at the top level
 * and one level of nesting (e.g. `config.secretKey`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_FIELDS,
  ...SENSITIVE_FIELDS.map((field) => `*.${field}`),
];
