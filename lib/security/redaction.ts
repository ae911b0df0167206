const SENSITIVE_KEY_PATTERN = /(authorization|cookie|token|secret|password|api[_-]?key|credential)/i;

const SENSITIVE_QUERY_PARAM = /([?&](?:token|key|api_key|apikey|access_token|auth|sid|session_id)=)[^&#\s]+/gi;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Object.prototype.toString.call(value) === "[object Object]";
}

/** Masks credentials carried in URL query strings, e.g. in fetch error messages. */
export function redactUrlSecrets(value: string): string {
  return value.replace(SENSITIVE_QUERY_PARAM, "$1[REDACTED]");
}

function sanitize(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return redactUrlSecrets(value);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value !== "object" || value === null) {
    return value;
  }

  if (seen.has(value)) {
    return "[CIRCULAR]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item, seen));
  }

  if (!isPlainObject(value)) {
    return String(value);
  }

  const output: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    output[key] = SENSITIVE_KEY_PATTERN.test(key) ? "[REDACTED]" : sanitize(entry, seen);
  }

  return output;
}

/** Produces a JSON-safe copy of an event payload with secrets masked. */
export function redactEventPayload(payload: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  const seen = new WeakSet<object>([payload]);

  for (const [key, entry] of Object.entries(payload)) {
    output[key] = SENSITIVE_KEY_PATTERN.test(key) ? "[REDACTED]" : sanitize(entry, seen);
  }

  return output;
}
