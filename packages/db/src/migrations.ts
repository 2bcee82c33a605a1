import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type Database from 'better-sqlite3';

import { createSqlite } from './client.js';

const migrationTableSQL = `
CREATE TABLE IF NOT EXISTS __migrations (
  id TEXT PRIMARY KEY,
  checksum TEXT NOT NULL,
  applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);
`;

const migrationDirFromMeta = (): string => {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));

  const candidates = [
    path.resolve(moduleDir, 'migrations'),
    path.resolve(moduleDir, '../src/migrations'),
    path.resolve(process.cwd(), 'packages/db/src/migrations'),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(
    `Could not locate migrations directory. Checked: ${candidates.map((item) => `'${item}'`).join(', ')}`,
  );
};

const readAppliedChecksum = (sqlite: Database.Database, file: string): string | null => {
  const row: unknown = sqlite.prepare('SELECT checksum FROM __migrations WHERE id = ?').get(file);
  if (typeof row === 'object' && row !== null && 'checksum' in row) {
    return String(row.checksum);
  }
  return null;
};

/** Returns true when the file was applied by this call, false when it was already recorded. */
const applyMigration = (sqlite: Database.Database, migrationsDir: string, file: string): boolean => {
  const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
  const checksum = crypto.createHash('sha256').update(sql).digest('hex');

  const existing = readAppliedChecksum(sqlite, file);
  if (existing !== null) {
    if (existing !== checksum) {
      throw new Error(`Migration checksum mismatch for ${file}`);
    }
    return false;
  }

  sqlite.transaction(() => {
    sqlite.exec(sql);
    sqlite.prepare('INSERT INTO __migrations (id, checksum) VALUES (?, ?)').run(file, checksum);
  })();

  return true;
};

export const applyMigrations = (sqlite: Database.Database): string[] => {
  const migrationsDir = migrationDirFromMeta();
  sqlite.exec(migrationTableSQL);

  const files = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort((a, b) => a.localeCompare(b));

  return files.filter((file) => applyMigration(sqlite, migrationsDir, file));
};

export const runMigrations = (dbPath?: string): string[] => {
  const sqlite = createSqlite({ dbPath });

  try {
    return applyMigrations(sqlite);
  } finally {
    sqlite.close();
  }
};
