/**
 * SQLite-backed record store using better-sqlite3.
 * Falls back to an in-memory store when the native module cannot load.
 */

import type Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { JsonValue } from '../core/types.js';
import { StoreError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { InMemoryRecordStore } from './memory-store.js';
import { isJsonValue, isRecordKind, type RecordKind, type RecordStore, type StoredRecord } from './types.js';

interface RecordRow {
  id: string;
  kind: string;
  payload: string;
  created_at: number;
}

export class SQLiteRecordStore implements RecordStore {
  private db: Database.Database | null = null;
  private fallback: InMemoryRecordStore | null = null;
  private initialized = false;
  private logger = getLogger();

  constructor(private readonly dbPath: string) {}

  /** True once initialized against the in-memory fallback. */
  get usingFallback(): boolean {
    return this.fallback !== null;
  }

  private async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }
      const { default: Sqlite } = await import('better-sqlite3');
      const db = new Sqlite(this.dbPath);

      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.exec(`
        CREATE TABLE IF NOT EXISTS records (
          id TEXT PRIMARY KEY,
          kind TEXT NOT NULL,
          payload TEXT NOT NULL,
          created_at INTEGER NOT NULL
        )
      `);
      db.exec('CREATE INDEX IF NOT EXISTS idx_records_kind ON records(kind, created_at)');
      this.db = db;
    } catch (err) {
      this.logger.warn(
        { path: this.dbPath, error: toError(err).message },
        'SQLiteRecordStore: sqlite unavailable, using memory',
      );
      this.db = null;
      this.fallback = new InMemoryRecordStore();
    }

    this.initialized = true;
  }

  async save(id: string, kind: RecordKind, payload: JsonValue): Promise<void> {
    await this.initialize();
    if (!this.db) return this.fallback?.save(id, kind, payload);

    try {
      this.db
        .prepare<[string, string, string, number]>(
          'INSERT OR REPLACE INTO records (id, kind, payload, created_at) VALUES (?, ?, ?, ?)',
        )
        .run(id, kind, JSON.stringify(payload), Date.now());
    } catch (err) {
      throw new StoreError(`Failed to save record ${id}`, toError(err));
    }
  }

  async get(id: string): Promise<StoredRecord | null> {
    await this.initialize();
    if (!this.db) return this.fallback?.get(id) ?? null;

    const row = this.db
      .prepare<[string], RecordRow>('SELECT id, kind, payload, created_at FROM records WHERE id = ?')
      .get(id);
    return row ? this.toRecord(row) : null;
  }

  async list(limit: number, kind?: RecordKind): Promise<StoredRecord[]> {
    await this.initialize();
    if (!this.db) return this.fallback?.list(limit, kind) ?? [];

    const n = Math.max(0, limit);
    const rows = kind
      ? this.db
          .prepare<[string, number], RecordRow>(
            'SELECT id, kind, payload, created_at FROM records WHERE kind = ? ORDER BY created_at DESC, rowid DESC LIMIT ?',
          )
          .all(kind, n)
      : this.db
          .prepare<[number], RecordRow>(
            'SELECT id, kind, payload, created_at FROM records ORDER BY created_at DESC, rowid DESC LIMIT ?',
          )
          .all(n);
    return rows.map(row => this.toRecord(row));
  }

  async count(kind?: RecordKind): Promise<number> {
    await this.initialize();
    if (!this.db) return this.fallback?.count(kind) ?? 0;

    const row = kind
      ? this.db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM records WHERE kind = ?').get(kind)
      : this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM records').get();
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    await this.fallback?.close();
    this.fallback = null;
    this.initialized = false;
  }

  private toRecord(row: RecordRow): StoredRecord {
    const payload: unknown = JSON.parse(row.payload);
    if (!isRecordKind(row.kind) || !isJsonValue(payload)) {
      throw new StoreError(`Corrupt record ${row.id}`);
    }
    return { id: row.id, kind: row.kind, payload, createdAt: row.created_at };
  }
}
