import { type SQL, and, asc, desc, eq, gte, lte, sql } from 'drizzle-orm';

import type { ExpenseCategory, ExpenseOrderingField } from '@coinpurse/contracts';
import { expenses, users } from '@coinpurse/db';

import type { OrderingTerm } from '../types.js';
import { type RepositoryDb, escapeLikePattern } from './shared.js';

export interface ExpenseDto {
  id: string;
  userId: string;
  userEmail: string;
  title: string;
  amountMinor: number;
  category: ExpenseCategory;
  description: string | null;
  date: string;
  createdAt: string;
  updatedAt: string;
}

const mapExpense = (row: typeof expenses.$inferSelect, userEmail: string): ExpenseDto => ({
  id: row.id,
  userId: row.userId,
  userEmail,
  title: row.title,
  amountMinor: row.amountMinor,
  category: row.category,
  description: row.description,
  date: row.date,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

/** Fully resolved list query; every bound is already in storage units. */
export interface ExpenseListQuery {
  ownerId: string;
  category?: ExpenseCategory;
  dateFrom?: string;
  dateTo?: string;
  minAmountMinor?: number;
  maxAmountMinor?: number;
  searchTerms: string[];
  ordering: OrderingTerm[];
  limit: number;
  offset: number;
}

export interface ListExpensesOutput {
  expenses: ExpenseDto[];
  total: number;
}

export interface FindOwnedExpenseInput {
  ownerId: string;
  id: string;
}

export interface CreateExpenseRowInput {
  id: string;
  userId: string;
  title: string;
  amountMinor: number;
  category: ExpenseCategory;
  description: string | null;
  date: string;
  createdAt: string;
  updatedAt: string;
}

export interface UpdateExpenseRowInput {
  ownerId: string;
  id: string;
  title: string;
  amountMinor: number;
  category: ExpenseCategory;
  description: string | null;
  date: string;
  updatedAt: string;
}

export interface ExpensesRepository {
  list(query: ExpenseListQuery): ListExpensesOutput;
  findById(id: string): ExpenseDto | null;
  findOwned(input: FindOwnedExpenseInput): ExpenseDto | null;
  create(input: CreateExpenseRowInput): ExpenseDto;
  update(input: UpdateExpenseRowInput): ExpenseDto | null;
  deleteOwned(input: FindOwnedExpenseInput): boolean;
  countByOwner(ownerId: string): number;
}

const orderingColumns = {
  date: expenses.date,
  amount: expenses.amountMinor,
  created_at: expenses.createdAt,
} satisfies Record<ExpenseOrderingField, unknown>;

const buildFilters = (query: ExpenseListQuery): SQL[] => {
  const filters: SQL[] = [eq(expenses.userId, query.ownerId)];

  if (query.category) {
    filters.push(eq(expenses.category, query.category));
  }
  if (query.dateFrom) {
    filters.push(gte(expenses.date, query.dateFrom));
  }
  if (query.dateTo) {
    filters.push(lte(expenses.date, query.dateTo));
  }
  if (query.minAmountMinor !== undefined) {
    filters.push(gte(expenses.amountMinor, query.minAmountMinor));
  }
  if (query.maxAmountMinor !== undefined) {
    filters.push(lte(expenses.amountMinor, query.maxAmountMinor));
  }

  for (const term of query.searchTerms) {
    const pattern = `%${escapeLikePattern(term)}%`;
    const inTitle = sql`${expenses.title} LIKE ${pattern} ESCAPE '\\'`;
    const inDescription = sql`COALESCE(${expenses.description}, '') LIKE ${pattern} ESCAPE '\\'`;
    filters.push(sql`(${inTitle} OR ${inDescription})`);
  }

  return filters;
};

const buildOrderBy = (ordering: OrderingTerm[]): SQL[] => {
  const terms = ordering.map(({ field, direction }) =>
    direction === 'asc' ? asc(orderingColumns[field]) : desc(orderingColumns[field]),
  );

  if (!ordering.some((term) => term.field === 'created_at')) {
    terms.push(desc(expenses.createdAt));
  }
  terms.push(asc(expenses.id));
  return terms;
};

export class SqliteExpensesRepository implements ExpensesRepository {
  constructor(private readonly db: RepositoryDb) {}

  list(query: ExpenseListQuery): ListExpensesOutput {
    const whereExpr = and(...buildFilters(query));

    const totalRow = this.db
      .select({ total: sql<number>`COUNT(*)` })
      .from(expenses)
      .where(whereExpr)
      .get();

    const rows = this.db
      .select({ expense: expenses, userEmail: users.email })
      .from(expenses)
      .innerJoin(users, eq(users.id, expenses.userId))
      .where(whereExpr)
      .orderBy(...buildOrderBy(query.ordering))
      .limit(query.limit)
      .offset(query.offset)
      .all();

    return {
      expenses: rows.map((row) => mapExpense(row.expense, row.userEmail)),
      total: totalRow?.total ?? 0,
    };
  }

  /** Unscoped lookup; callers gate the result through an ownership policy. */
  findById(id: string): ExpenseDto | null {
    const row = this.db
      .select({ expense: expenses, userEmail: users.email })
      .from(expenses)
      .innerJoin(users, eq(users.id, expenses.userId))
      .where(eq(expenses.id, id))
      .get();

    return row ? mapExpense(row.expense, row.userEmail) : null;
  }

  findOwned({ ownerId, id }: FindOwnedExpenseInput): ExpenseDto | null {
    const row = this.db
      .select({ expense: expenses, userEmail: users.email })
      .from(expenses)
      .innerJoin(users, eq(users.id, expenses.userId))
      .where(and(eq(expenses.id, id), eq(expenses.userId, ownerId)))
      .get();

    return row ? mapExpense(row.expense, row.userEmail) : null;
  }

  create(input: CreateExpenseRowInput): ExpenseDto {
    this.db.insert(expenses).values(input).run();

    const created = this.findOwned({ ownerId: input.userId, id: input.id });
    if (!created) {
      throw new Error(`Failed to fetch created expense ${input.id}`);
    }
    return created;
  }

  update({ ownerId, id, ...patch }: UpdateExpenseRowInput): ExpenseDto | null {
    this.db
      .update(expenses)
      .set(patch)
      .where(and(eq(expenses.id, id), eq(expenses.userId, ownerId)))
      .run();

    return this.findOwned({ ownerId, id });
  }

  deleteOwned({ ownerId, id }: FindOwnedExpenseInput): boolean {
    const result = this.db
      .delete(expenses)
      .where(and(eq(expenses.id, id), eq(expenses.userId, ownerId)))
      .run();
    return result.changes > 0;
  }

  countByOwner(ownerId: string): number {
    const row = this.db
      .select({ total: sql<number>`COUNT(*)` })
      .from(expenses)
      .where(eq(expenses.userId, ownerId))
      .get();
    return row?.total ?? 0;
  }
}
