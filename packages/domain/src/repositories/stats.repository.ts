import { eq, sql } from 'drizzle-orm';

import type { ExpenseCategory } from '@coinpurse/contracts';
import { expenses } from '@coinpurse/db';

import type { RepositoryDb } from './shared.js';

export interface CategoryTotalRow {
  category: ExpenseCategory;
  count: number;
  totalMinor: number;
}

export interface StatsRepository {
  totalsByCategory(ownerId: string): CategoryTotalRow[];
}

export class SqliteStatsRepository implements StatsRepository {
  constructor(private readonly db: RepositoryDb) {}

  totalsByCategory(ownerId: string): CategoryTotalRow[] {
    return this.db
      .select({
        category: expenses.category,
        count: sql<number>`COUNT(*)`,
        totalMinor: sql<number>`COALESCE(SUM(${expenses.amountMinor}), 0)`,
      })
      .from(expenses)
      .where(eq(expenses.userId, ownerId))
      .groupBy(expenses.category)
      .all();
  }
}
