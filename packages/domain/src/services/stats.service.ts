import type { ExpenseCategory } from '@coinpurse/contracts';

import {
  type CategoryTotalRow,
  SqliteStatsRepository,
} from '../repositories/stats.repository.js';
import type { Identity } from '../types.js';
import type { DomainDbRuntime } from './shared/domain-db.js';

export interface ExpenseStats {
  count: number;
  totalMinor: number;
  averageMinor: number;
  /** Every category is present; categories without expenses total zero. */
  byCategoryMinor: Record<ExpenseCategory, number>;
}

export interface StatsService {
  computeStats: (identity: Identity) => Promise<ExpenseStats>;
}

interface StatsServiceDeps {
  runtime: DomainDbRuntime;
}

/** Integer division rounded half-up; both operands are non-negative. */
export const averageMinorUnits = (totalMinor: number, count: number): number =>
  count === 0 ? 0 : Math.floor((2 * totalMinor + count) / (2 * count));

export const summarizeCategoryTotals = (rows: CategoryTotalRow[]): ExpenseStats => {
  const byCategoryMinor: Record<ExpenseCategory, number> = {
    GROCERIES: 0,
    LEISURE: 0,
    ELECTRONICS: 0,
    UTILITIES: 0,
    CLOTHING: 0,
    HEALTH: 0,
    OTHERS: 0,
  };

  let count = 0;
  let totalMinor = 0;
  for (const row of rows) {
    byCategoryMinor[row.category] += row.totalMinor;
    count += row.count;
    totalMinor += row.totalMinor;
  }

  return {
    count,
    totalMinor,
    averageMinor: averageMinorUnits(totalMinor, count),
    byCategoryMinor,
  };
};

export const createStatsService = ({ runtime }: StatsServiceDeps): StatsService => ({
  async computeStats(identity: Identity) {
    const rows = new SqliteStatsRepository(runtime.db).totalsByCategory(identity.userId);
    return summarizeCategoryTotals(rows);
  },
});
