import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import Database from 'better-sqlite3';
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';

import * as schema from './schema.js';

export const IN_MEMORY_DB = ':memory:';

const DEFAULT_DB_PATH = '~/.coinpurse/coinpurse.db';
const DEFAULT_BUSY_TIMEOUT_MS = 5_000;

export interface DbClientOptions {
  dbPath?: string;
  busyTimeoutMs?: number;
}

export interface DbConnection {
  sqlite: Database.Database;
  db: BetterSQLite3Database<typeof schema>;
  schema: typeof schema;
}

const expandHomeDir = (value: string): string => {
  if (value === '~') {
    return os.homedir();
  }

  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return path.join(os.homedir(), value.slice(2));
  }

  return value;
};

export const resolveDbPath = (dbPath?: string): string => {
  const configured = dbPath ?? process.env.DB_PATH ?? DEFAULT_DB_PATH;
  if (configured === IN_MEMORY_DB) {
    return configured;
  }

  const expanded = expandHomeDir(configured);
  return path.isAbsolute(expanded) ? expanded : path.resolve(process.cwd(), expanded);
};

export const createSqlite = (options: DbClientOptions = {}): Database.Database => {
  const resolved = resolveDbPath(options.dbPath);
  if (resolved !== IN_MEMORY_DB) {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  const sqlite = new Database(resolved);
  // The API and the CLI may hold the same file open, so writers wait instead of failing.
  sqlite.pragma(`busy_timeout = ${options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  return sqlite;
};

export const createDb = (options: DbClientOptions = {}): DbConnection => {
  const sqlite = createSqlite(options);
  return {
    sqlite,
    db: drizzle(sqlite, { schema }),
    schema,
  };
};

export type DrizzleDb = DbConnection['db'];
