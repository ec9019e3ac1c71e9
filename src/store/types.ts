import type { JsonValue } from '../core/types.js';

export type RecordKind = 'path' | 'cycle' | 'grounding' | 'reasoning';

export interface StoredRecord {
  id: string;
  kind: RecordKind;
  payload: JsonValue;
  createdAt: number;
}

/**
 * Persistence sink for finalized records. Saving an existing id replaces it.
 */
export interface RecordStore {
  save(id: string, kind: RecordKind, payload: JsonValue): Promise<void>;
  get(id: string): Promise<StoredRecord | null>;
  /** Newest first. */
  list(limit: number, kind?: RecordKind): Promise<StoredRecord[]>;
  count(kind?: RecordKind): Promise<number>;
  close(): Promise<void>;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

const KINDS: readonly string[] = ['path', 'cycle', 'grounding', 'reasoning'];

export function isRecordKind(value: unknown): value is RecordKind {
  return typeof value === 'string' && KINDS.includes(value);
}

/**
 * Round-trip any value through JSON, so records hold plain data only.
 */
export function toJsonValue(value: unknown): JsonValue {
  const parsed: unknown = JSON.parse(JSON.stringify(value) ?? 'null');
  return isJsonValue(parsed) ? parsed : null;
}
