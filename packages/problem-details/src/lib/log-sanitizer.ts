const SENSITIVE_KEY_PATTERN =
  /(password|passwd|secret|token|authorization|cookie|session[-_]?id|api[-_]?key|access[-_]?key|private[-_]?key)/i;

const MAX_DEPTH = 8;

export const REDACTED = '[REDACTED]';

export function sanitizeLogValue<T>(value: T): T;
export function sanitizeLogValue(value: unknown): unknown {
  return sanitize(value, new WeakSet(), 0);
}

function sanitize(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (!value || typeof value !== 'object' || value instanceof Date) {
    return value;
  }

  if (seen.has(value)) {
    return '[Circular]';
  }

  if (depth >= MAX_DEPTH) {
    return '[Truncated]';
  }

  seen.add(value);

  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => sanitize(item, seen, depth + 1));
    seen.delete(value);
    return items;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(value)) {
    sanitized[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : sanitize(raw, seen, depth + 1);
  }

  seen.delete(value);
  return sanitized;
}
