import { eq, sql } from 'drizzle-orm';

import { auditLog } from '@coinpurse/db';

import type { RepositoryDb } from './shared.js';

export interface AppendAuditLogInput {
  id: string;
  actor: string;
  channel: string;
  action: string;
  payloadHash: string;
  createdAt: string;
}

export interface AuditRepository {
  append(input: AppendAuditLogInput): void;
  countByAction(action: string): number;
}

export class SqliteAuditRepository implements AuditRepository {
  constructor(private readonly db: RepositoryDb) {}

  append(input: AppendAuditLogInput): void {
    this.db.insert(auditLog).values(input).run();
  }

  countByAction(action: string): number {
    const row = this.db
      .select({ total: sql<number>`COUNT(*)` })
      .from(auditLog)
      .where(eq(auditLog.action, action))
      .get();
    return row?.total ?? 0;
  }
}
