import { eq, lt } from 'drizzle-orm';

import { outstandingTokens, tokenBlacklist } from '@coinpurse/db';

import type { RepositoryDb } from './shared.js';

export interface OutstandingTokenRecord {
  jti: string;
  userId: string;
  createdAt: string;
  expiresAt: string;
}

export interface BlacklistTokenInput {
  jti: string;
  userId: string;
  expiresAt: string;
  blacklistedAt: string;
}

export interface FlushExpiredOutput {
  outstandingDeleted: number;
  blacklistDeleted: number;
}

export interface TokensRepository {
  recordOutstanding(input: OutstandingTokenRecord): void;
  isBlacklisted(jti: string): boolean;
  blacklist(input: BlacklistTokenInput): void;
  deleteExpired(cutoff: string): FlushExpiredOutput;
}

export class SqliteTokensRepository implements TokensRepository {
  constructor(private readonly db: RepositoryDb) {}

  recordOutstanding(input: OutstandingTokenRecord): void {
    this.db.insert(outstandingTokens).values(input).onConflictDoNothing().run();
  }

  isBlacklisted(jti: string): boolean {
    const row = this.db
      .select({ jti: tokenBlacklist.jti })
      .from(tokenBlacklist)
      .where(eq(tokenBlacklist.jti, jti))
      .get();
    return row !== undefined;
  }

  blacklist(input: BlacklistTokenInput): void {
    this.db.insert(tokenBlacklist).values(input).onConflictDoNothing().run();
  }

  /** Rows whose `expiresAt` is strictly before the cutoff (ISO timestamps compare lexically). */
  deleteExpired(cutoff: string): FlushExpiredOutput {
    const blacklistResult = this.db
      .delete(tokenBlacklist)
      .where(lt(tokenBlacklist.expiresAt, cutoff))
      .run();
    const outstandingResult = this.db
      .delete(outstandingTokens)
      .where(lt(outstandingTokens.expiresAt, cutoff))
      .run();

    return {
      outstandingDeleted: outstandingResult.changes,
      blacklistDeleted: blacklistResult.changes,
    };
  }
}
