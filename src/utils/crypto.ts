import { createHash } from 'node:crypto';

/**
 * Generate a SHA-256 hash of a string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Generate a short hash (8 characters) for deduplication
 */
export function shortHash(input: string): string {
  return sha256(input).substring(0, 8);
}

/**
 * Stable JSON serialization: object keys are emitted in sorted order so that
 * structurally equal values always serialize identically. `undefined` members
 * are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [key, member] of entries) {
      out[key] = sortKeys(member);
    }
    return out;
  }
  return value;
}

/**
 * Content digest of any JSON-compatible value.
 */
export function contentHash(value: unknown): string {
  return sha256(canonicalJson(value));
}
