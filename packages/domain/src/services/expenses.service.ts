import crypto from 'node:crypto';

import { AppError } from '../errors.js';
import {
  type ExpenseDto,
  SqliteExpensesRepository,
} from '../repositories/expenses.repository.js';
import type {
  CreateExpenseInput,
  Identity,
  ListExpensesInput,
  Page,
  UpdateExpenseInput,
} from '../types.js';
import { resolveExpenseFilters } from './expense-filters.js';
import { type ExpenseDraft, mergeExpenseDraft, validateExpenseDraft } from './expenses-logic.js';
import { type OwnershipPolicy, authorizeOwned, ownerOnly } from './ownership-policy.js';
import { formatMinor, toIso, toIsoDate } from './shared/common.js';
import type { DomainDbRuntime } from './shared/domain-db.js';

export const DEFAULT_PAGE_SIZE = 20;

export interface ExpensesService {
  list: (identity: Identity, input?: ListExpensesInput) => Promise<Page<ExpenseDto>>;
  get: (identity: Identity, id: string) => Promise<ExpenseDto>;
  create: (identity: Identity, input: CreateExpenseInput) => Promise<ExpenseDto>;
  /** Full update: every writable field is taken from `input`. */
  replace: (identity: Identity, id: string, input: CreateExpenseInput) => Promise<ExpenseDto>;
  update: (identity: Identity, id: string, patch: UpdateExpenseInput) => Promise<ExpenseDto>;
  delete: (identity: Identity, id: string) => Promise<void>;
  countForOwner: (ownerId: string) => Promise<number>;
}

interface ExpenseServiceDeps {
  runtime: DomainDbRuntime;
  pageSize?: number;
  policy?: OwnershipPolicy;
}

const toDraft = (expense: ExpenseDto): ExpenseDraft => ({
  title: expense.title,
  amount: formatMinor(expense.amountMinor),
  category: expense.category,
  description: expense.description,
  date: expense.date,
});

export const createExpensesService = ({
  runtime,
  pageSize = DEFAULT_PAGE_SIZE,
  policy = ownerOnly,
}: ExpenseServiceDeps): ExpensesService => {
  const expensesRepo = () => new SqliteExpensesRepository(runtime.db);
  const today = () => toIsoDate(runtime.now());

  const load = (identity: Identity, id: string, action: 'read' | 'write'): ExpenseDto =>
    authorizeOwned(policy, identity, expensesRepo().findById(id), action);

  const write = (identity: Identity, existing: ExpenseDto, draft: ExpenseDraft): ExpenseDto => {
    const validated = validateExpenseDraft(draft, today());
    const updated = expensesRepo().update({
      ownerId: existing.userId,
      id: existing.id,
      ...validated,
      updatedAt: toIso(runtime.now()),
    });

    return authorizeOwned(policy, identity, updated, 'write');
  };

  return {
    async list(identity: Identity, input: ListExpensesInput = {}) {
      const page = input.page ?? 1;
      const filters = resolveExpenseFilters(input, today());

      const { expenses, total } = expensesRepo().list({
        ownerId: identity.userId,
        ...filters,
        limit: pageSize,
        offset: (page - 1) * pageSize,
      });

      const totalPages = Math.max(Math.ceil(total / pageSize), 1);
      if (page > totalPages) {
        throw new AppError('NOT_FOUND', 'Invalid page', 404, { page, totalPages });
      }

      return { items: expenses, page, pageSize, total, totalPages };
    },

    async get(identity: Identity, id: string) {
      return load(identity, id, 'read');
    },

    async create(identity: Identity, input: CreateExpenseInput) {
      const validated = validateExpenseDraft(input, today());
      const now = toIso(runtime.now());

      return expensesRepo().create({
        id: crypto.randomUUID(),
        userId: identity.userId,
        ...validated,
        createdAt: now,
        updatedAt: now,
      });
    },

    async replace(identity: Identity, id: string, input: CreateExpenseInput) {
      const existing = load(identity, id, 'write');
      return write(identity, existing, input);
    },

    async update(identity: Identity, id: string, patch: UpdateExpenseInput) {
      const existing = load(identity, id, 'write');
      return write(identity, existing, mergeExpenseDraft(toDraft(existing), patch));
    },

    async delete(identity: Identity, id: string) {
      const existing = load(identity, id, 'write');
      expensesRepo().deleteOwned({ ownerId: existing.userId, id: existing.id });
    },

    async countForOwner(ownerId: string) {
      return expensesRepo().countByOwner(ownerId);
    },
  };
};
