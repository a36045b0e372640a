/**
 * Masks secret-bearing values before they reach a log line.
 *
 * Resource configuration and state carry passwords, connection API keys and
 * the API key secrets returned on creation. Anything keyed by one of
 * {@link SECRET_KEYS}, at any depth, is replaced with {@link REDACTED}.
 *
 * @module
 */

export const SECRET_KEYS: ReadonlySet<string> = new Set([
  'password',
  'api_key',
  'apiKey',
  'encoded',
]);

export const REDACTED = '[REDACTED]';

/** Result of walking a value for secrets. */
export interface RedactionResult<T> {
  redactedData: T;
  /** Number of values that were masked. */
  redactionCount: number;
}

function redactValue(value: unknown, counter: { count: number }): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, counter));
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (SECRET_KEYS.has(key) && item !== undefined && item !== null && item !== '') {
        out[key] = REDACTED;
        counter.count++;
      } else {
        out[key] = redactValue(item, counter);
      }
    }
    return out;
  }
  return value;
}

/** Returns a deep copy of `data` with every secret value masked. */
export function redactSecrets(data: unknown): RedactionResult<unknown> {
  const counter = { count: 0 };
  const redactedData = redactValue(data, counter);
  return { redactedData, redactionCount: counter.count };
}
