import type { DrizzleDb } from '@coinpurse/db';

type DbTransaction = Parameters<Parameters<DrizzleDb['transaction']>[0]>[0];

export type RepositoryDb = DrizzleDb | DbTransaction;

export const withTransaction = <T>(db: RepositoryDb, run: (tx: DbTransaction) => T): T =>
  db.transaction((tx) => run(tx));

/** Escapes LIKE wildcards so user text matches literally under `ESCAPE '\'`. */
export const escapeLikePattern = (value: string): string =>
  value.replace(/[\\%_]/g, (char) => `\\${char}`);
