/**
 * Redaction utilities for logs. Masks credentials that travel in query strings
 * or headers, and e-mail addresses users sometimes paste into queries.
 * Redaction is disabled when LOG_LEVEL=debug to aid local debugging.
 */

function scrubString(input: string): string {
  let out = input;
  // api_key=..., apikey=..., token=... in URLs and query strings
  out = out.replace(/\b(api[_-]?key|apikey|token|access_token)=([^&\s"']+)/gi, '$1=[REDACTED]');
  // Authorization: Bearer <token>
  out = out.replace(/\bBearer\s+[A-Za-z0-9._~+/=-]+/g, 'Bearer [REDACTED]');
  out = out.replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[REDACTED_EMAIL]');
  return out;
}

const SECRET_KEYS = new Set(['apikey', 'api_key', 'authorization', 'x-api-key', 'password']);

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof Error) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SECRET_KEYS.has(k.toLowerCase()) ? '[REDACTED]' : scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub secret-like patterns from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

/**
 * Convenience for messages.
 */
export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
