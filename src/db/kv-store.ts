/**
 * Persistent key/value store behind the cache layer.
 *
 * Every key is addressed as (namespace, key). Values are opaque strings.
 * Lock contention surfaces as StoreBusyError so callers can retry; anything
 * else is a StoreFatalError.
 */
import type Database from 'better-sqlite3';

import { StoreBusyError, StoreFatalError } from '@relaybot/core';

export interface KeyValueStore {
  get(namespace: string, key: string): Promise<string | undefined>;
  put(namespace: string, key: string, value: string): Promise<void>;
  delete(namespace: string, key: string): Promise<void>;
  keys(namespace: string): Promise<string[]>;
}

function sqliteCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function classifyStoreError(err: unknown, action: string): Error {
  const code = sqliteCode(err);
  const message = err instanceof Error ? err.message : String(err);
  if (code?.startsWith('SQLITE_BUSY') || code?.startsWith('SQLITE_LOCKED')) {
    return new StoreBusyError(`${action}: ${message}`, { cause: err });
  }
  return new StoreFatalError(`${action}: ${message}`, { cause: err });
}

interface ValueRow {
  value: string;
}

interface KeyRow {
  key: string;
}

function isValueRow(row: unknown): row is ValueRow {
  return typeof row === 'object' && row !== null && 'value' in row && typeof row.value === 'string';
}

function isKeyRow(row: unknown): row is KeyRow {
  return typeof row === 'object' && row !== null && 'key' in row && typeof row.key === 'string';
}

export class SqliteKeyValueStore implements KeyValueStore {
  private readonly selectStmt: Database.Statement;
  private readonly upsertStmt: Database.Statement;
  private readonly deleteStmt: Database.Statement;
  private readonly keysStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.selectStmt = db.prepare('SELECT value FROM kv_store WHERE namespace = ? AND key = ?');
    this.upsertStmt = db.prepare(`
      INSERT INTO kv_store (namespace, key, value, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(namespace, key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `);
    this.deleteStmt = db.prepare('DELETE FROM kv_store WHERE namespace = ? AND key = ?');
    this.keysStmt = db.prepare('SELECT key FROM kv_store WHERE namespace = ? ORDER BY key');
  }

  async get(namespace: string, key: string): Promise<string | undefined> {
    const row = this.run(`get ${namespace}/${key}`, () => this.selectStmt.get(namespace, key));
    return isValueRow(row) ? row.value : undefined;
  }

  async put(namespace: string, key: string, value: string): Promise<void> {
    this.run(`put ${namespace}/${key}`, () =>
      this.upsertStmt.run(namespace, key, value, new Date().toISOString()),
    );
  }

  async delete(namespace: string, key: string): Promise<void> {
    this.run(`delete ${namespace}/${key}`, () => this.deleteStmt.run(namespace, key));
  }

  async keys(namespace: string): Promise<string[]> {
    const rows = this.run(`keys ${namespace}`, () => this.keysStmt.all(namespace));
    return rows.filter(isKeyRow).map((row) => row.key);
  }

  private run<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw classifyStoreError(err, action);
    }
  }
}

/** In-process store for tests and for bots that run without persistence. */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data = new Map<string, Map<string, string>>();

  async get(namespace: string, key: string): Promise<string | undefined> {
    return this.data.get(namespace)?.get(key);
  }

  async put(namespace: string, key: string, value: string): Promise<void> {
    let bucket = this.data.get(namespace);
    if (!bucket) {
      bucket = new Map();
      this.data.set(namespace, bucket);
    }
    bucket.set(key, value);
  }

  async delete(namespace: string, key: string): Promise<void> {
    this.data.get(namespace)?.delete(key);
  }

  async keys(namespace: string): Promise<string[]> {
    return [...(this.data.get(namespace)?.keys() ?? [])].sort();
  }
}
