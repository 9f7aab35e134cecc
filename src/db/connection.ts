import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import { logger } from '@relaybot/core';

let db: Database.Database | null = null;

export const DB_FILE = 'relaybot.db';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS kv_store (
    namespace TEXT NOT NULL,
    key TEXT NOT NULL,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (namespace, key)
  );
`;

/**
 * Open a database and make sure the schema exists.
 * `:memory:` gives a private in-memory database.
 */
export function openDatabase(filename: string): Database.Database {
  const database = new Database(filename);
  if (filename !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('busy_timeout = 50');
  database.exec(SCHEMA);
  return database;
}

/** Open the shared store under `storeDir`. Idempotent. */
export function initDatabase(storeDir: string): Database.Database {
  if (db) return db;
  fs.mkdirSync(storeDir, { recursive: true });
  const dbPath = path.join(storeDir, DB_FILE);
  db = openDatabase(dbPath);
  logger.info({ path: dbPath }, 'Database initialized');
  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
