import { type DbClientOptions, type DrizzleDb, applyMigrations, createDb } from '@coinpurse/db';

export interface DomainDbOptions extends DbClientOptions {
  /** Apply pending SQL migrations on the freshly opened connection. */
  migrate?: boolean;
}

export interface DomainDbRuntime {
  db: DrizzleDb;
  sqlite: ReturnType<typeof createDb>['sqlite'];
  now: () => Date;
  close: () => void;
}

export const createDomainDbRuntime = (
  options: DomainDbOptions = {},
  now: () => Date = () => new Date(),
): DomainDbRuntime => {
  const { db, sqlite } = createDb(options);
  if (options.migrate) {
    applyMigrations(sqlite);
  }

  let closed = false;

  return {
    db,
    sqlite,
    now,
    close() {
      if (closed) {
        return;
      }

      closed = true;
      sqlite.close();
    },
  };
};
