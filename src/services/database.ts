import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StoreKind, StoreSchema, storeSchemas } from '../types/schemas';
import { AppError, ErrorHandler, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';

export type StoreEntry<K extends StoreKind> = [key: string, value: StoreSchema[K]];

/**
 * Durable key-value cache. Every write is atomic: a crash leaves either the
 * previous or the new snapshot of the touched records.
 */
export interface LocalStore {
  get<K extends StoreKind>(kind: K, key: string): Promise<StoreSchema[K] | null>;
  put<K extends StoreKind>(kind: K, key: string, value: StoreSchema[K]): Promise<void>;
  putMany<K extends StoreKind>(kind: K, entries: StoreEntry<K>[]): Promise<void>;
  delete(kind: StoreKind, key: string): Promise<void>;
  deleteMany(kind: StoreKind, keys: string[]): Promise<void>;
  replaceAll<K extends StoreKind>(kind: K, entries: StoreEntry<K>[]): Promise<void>;
  entries<K extends StoreKind>(kind: K): Promise<StoreEntry<K>[]>;
  count(kind: StoreKind): Promise<number>;
  clear(kind: StoreKind): Promise<void>;
}

interface RecordRow {
  key: string;
  value: string;
}

/**
 * SQLite-backed LocalStore. Pass ':memory:' for a throwaway store.
 */
export class DatabaseManager implements LocalStore {
  private db: Database.Database;
  public initialized: Promise<void>;

  constructor(dbPath: string = './data/release-week.db') {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initialized = this.initializeDatabase();
  }

  private initializeDatabase(): Promise<void> {
    return Promise.resolve().then(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS records (
          kind TEXT NOT NULL,
          key TEXT NOT NULL,
          value TEXT NOT NULL,
          updatedAt TEXT NOT NULL,
          PRIMARY KEY (kind, key)
        );
      `);
    });
  }

  private decode<K extends StoreKind>(kind: K, row: RecordRow): StoreSchema[K] {
    try {
      return storeSchemas[kind].parse(JSON.parse(row.value));
    } catch (error) {
      const context = { operation: 'read local store', resource: `${kind}/${row.key}` };
      if (error instanceof SyntaxError) {
        throw new AppError(ErrorType.MalformedData, `Corrupt record ${kind}/${row.key}`, undefined, error, context);
      }
      throw ErrorHandler.parse(error, context);
    }
  }

  /**
   * Run a write inside one transaction, reporting failures as PersistenceError
   */
  private write(operation: string, kind: StoreKind, fn: () => void): Promise<void> {
    return Promise.resolve().then(() => {
      try {
        this.db.transaction(fn)();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new AppError(
          ErrorType.PersistenceError,
          `Failed to ${operation} ${kind}: ${reason}`,
          undefined,
          error,
          { operation, resource: kind },
        );
      }
    });
  }

  private upsert(kind: StoreKind, key: string, value: unknown, now: string): void {
    this.db
      .prepare<[string, string, string, string]>(
        'INSERT OR REPLACE INTO records (kind, key, value, updatedAt) VALUES (?, ?, ?, ?)',
      )
      .run(kind, key, JSON.stringify(value), now);
  }

  get<K extends StoreKind>(kind: K, key: string): Promise<StoreSchema[K] | null> {
    return Promise.resolve().then(() => {
      const row = this.db
        .prepare<[string, string], RecordRow>('SELECT key, value FROM records WHERE kind = ? AND key = ?')
        .get(kind, key);
      return row ? this.decode(kind, row) : null;
    });
  }

  put<K extends StoreKind>(kind: K, key: string, value: StoreSchema[K]): Promise<void> {
    return this.write('put', kind, () => this.upsert(kind, key, value, new Date().toISOString()));
  }

  putMany<K extends StoreKind>(kind: K, entries: StoreEntry<K>[]): Promise<void> {
    return this.write('put', kind, () => {
      const now = new Date().toISOString();
      for (const [key, value] of entries) {
        this.upsert(kind, key, value, now);
      }
    });
  }

  delete(kind: StoreKind, key: string): Promise<void> {
    return this.deleteMany(kind, [key]);
  }

  deleteMany(kind: StoreKind, keys: string[]): Promise<void> {
    return this.write('delete', kind, () => {
      const stmt = this.db.prepare<[string, string]>('DELETE FROM records WHERE kind = ? AND key = ?');
      for (const key of keys) {
        stmt.run(kind, key);
      }
    });
  }

  replaceAll<K extends StoreKind>(kind: K, entries: StoreEntry<K>[]): Promise<void> {
    return this.write('replace', kind, () => {
      const now = new Date().toISOString();
      this.db.prepare<[string]>('DELETE FROM records WHERE kind = ?').run(kind);
      for (const [key, value] of entries) {
        this.upsert(kind, key, value, now);
      }
    });
  }

  entries<K extends StoreKind>(kind: K): Promise<StoreEntry<K>[]> {
    return Promise.resolve().then(() => {
      const rows = this.db
        .prepare<[string], RecordRow>('SELECT key, value FROM records WHERE kind = ? ORDER BY key')
        .all(kind);
      return rows.map((row): StoreEntry<K> => [row.key, this.decode(kind, row)]);
    });
  }

  count(kind: StoreKind): Promise<number> {
    return Promise.resolve().then(() => {
      const row = this.db
        .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM records WHERE kind = ?')
        .get(kind);
      return row ? row.total : 0;
    });
  }

  clear(kind: StoreKind): Promise<void> {
    return this.write('clear', kind, () => {
      this.db.prepare<[string]>('DELETE FROM records WHERE kind = ?').run(kind);
    });
  }

  close(): Promise<void> {
    return Promise.resolve().then(() => {
      if (this.db.open) {
        this.db.close();
        Logger.debug('Local store closed');
      }
    });
  }
}
