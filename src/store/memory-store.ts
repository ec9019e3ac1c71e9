import type { JsonValue } from '../core/types.js';
import type { RecordKind, RecordStore, StoredRecord } from './types.js';

export class InMemoryRecordStore implements RecordStore {
  private records = new Map<string, StoredRecord>();

  async save(id: string, kind: RecordKind, payload: JsonValue): Promise<void> {
    this.records.delete(id);
    this.records.set(id, { id, kind, payload, createdAt: Date.now() });
  }

  async get(id: string): Promise<StoredRecord | null> {
    return this.records.get(id) ?? null;
  }

  async list(limit: number, kind?: RecordKind): Promise<StoredRecord[]> {
    const all = [...this.records.values()].reverse();
    const filtered = kind ? all.filter(r => r.kind === kind) : all;
    return filtered.slice(0, Math.max(0, limit));
  }

  async count(kind?: RecordKind): Promise<number> {
    if (!kind) return this.records.size;
    let n = 0;
    for (const record of this.records.values()) {
      if (record.kind === kind) n++;
    }
    return n;
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
