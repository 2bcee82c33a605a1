import { eq } from 'drizzle-orm';

import { operationApprovals } from '@coinpurse/db';

import type { RepositoryDb } from './shared.js';

export interface ApprovalRecord {
  id: string;
  action: string;
  payloadJson: string;
  payloadHash: string;
  expiresAt: string;
  approvedAt: string | null;
  createdAt: string;
}

export interface MarkApprovalUsedInput {
  operationId: string;
  approvedAt: string;
}

export interface ApprovalsRepository {
  create(input: ApprovalRecord): ApprovalRecord;
  findById(operationId: string): ApprovalRecord | null;
  markUsed(input: MarkApprovalUsedInput): boolean;
}

export class SqliteApprovalsRepository implements ApprovalsRepository {
  constructor(private readonly db: RepositoryDb) {}

  create(input: ApprovalRecord): ApprovalRecord {
    this.db.insert(operationApprovals).values(input).run();
    return { ...input };
  }

  findById(operationId: string): ApprovalRecord | null {
    const approval = this.db
      .select()
      .from(operationApprovals)
      .where(eq(operationApprovals.id, operationId))
      .get();

    return approval ?? null;
  }

  markUsed({ operationId, approvedAt }: MarkApprovalUsedInput): boolean {
    const result = this.db
      .update(operationApprovals)
      .set({ approvedAt })
      .where(eq(operationApprovals.id, operationId))
      .run();

    return result.changes > 0;
  }
}
