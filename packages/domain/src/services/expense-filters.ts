import {
  EXPENSE_ORDERING_FIELDS,
  type ExpenseCategory,
  type ExpenseOrderingField,
  type PeriodShorthand,
  periodShorthandSchema,
} from '@coinpurse/contracts';

import { type FieldErrors, validationError } from '../errors.js';
import type { ListExpensesInput, OrderingTerm } from '../types.js';
import { isCalendarDate, shiftIsoDate, toMinorUnits } from './shared/common.js';

export const PERIOD_DAYS: Readonly<Record<PeriodShorthand, number>> = {
  week: 7,
  month: 30,
  '3months': 90,
};

export const DEFAULT_ORDERING: readonly OrderingTerm[] = [{ field: 'date', direction: 'desc' }];

export interface ResolvedExpenseFilters {
  category?: ExpenseCategory;
  dateFrom?: string;
  dateTo?: string;
  minAmountMinor?: number;
  maxAmountMinor?: number;
  searchTerms: string[];
  ordering: OrderingTerm[];
}

/** Lower date bound for a period shorthand; unknown values yield no bound. */
export const resolvePeriodStart = (
  period: string | undefined,
  today: string,
): string | undefined => {
  const parsed = periodShorthandSchema.safeParse(period);
  if (!parsed.success) {
    return undefined;
  }
  return shiftIsoDate(today, -PERIOD_DAYS[parsed.data]);
};

const isOrderingField = (value: string): value is ExpenseOrderingField =>
  EXPENSE_ORDERING_FIELDS.some((field) => field === value);

/** Parses `-amount,date` style ordering. Unknown and repeated fields are dropped. */
export const parseOrdering = (value: string | undefined): OrderingTerm[] => {
  const terms: OrderingTerm[] = [];

  for (const raw of (value ?? '').split(',')) {
    const token = raw.trim();
    const direction = token.startsWith('-') ? 'desc' : 'asc';
    const field = token.replace(/^[-+]/, '');

    if (isOrderingField(field) && !terms.some((term) => term.field === field)) {
      terms.push({ field, direction });
    }
  }

  return terms.length > 0 ? terms : [...DEFAULT_ORDERING];
};

export const parseSearchTerms = (value: string | undefined): string[] =>
  (value ?? '')
    .split(/[\s,]+/)
    .map((term) => term.trim())
    .filter((term) => term.length > 0);

const laterOf = (left: string | undefined, right: string | undefined): string | undefined => {
  if (!left) {
    return right;
  }
  if (!right) {
    return left;
  }
  return left > right ? left : right;
};

export const resolveExpenseFilters = (
  input: ListExpensesInput,
  today: string,
): ResolvedExpenseFilters => {
  const errors: FieldErrors = {};

  const checkDate = (field: string, value: string | undefined): string | undefined => {
    if (value === undefined || value === '') {
      return undefined;
    }
    if (!isCalendarDate(value)) {
      errors[field] = ['Enter a valid date.'];
      return undefined;
    }
    return value;
  };

  const checkAmount = (field: string, value: number | undefined): number | undefined => {
    if (value === undefined) {
      return undefined;
    }
    if (!Number.isFinite(value)) {
      errors[field] = ['Enter a number.'];
      return undefined;
    }
    return toMinorUnits(value);
  };

  const startDate = checkDate('start_date', input.startDate);
  const endDate = checkDate('end_date', input.endDate);
  const minAmountMinor = checkAmount('min_amount', input.minAmount);
  const maxAmountMinor = checkAmount('max_amount', input.maxAmount);

  if (Object.keys(errors).length > 0) {
    throw validationError(errors);
  }

  return {
    category: input.category,
    dateFrom: laterOf(startDate, resolvePeriodStart(input.period, today)),
    dateTo: endDate,
    minAmountMinor,
    maxAmountMinor,
    searchTerms: parseSearchTerms(input.search),
    ordering: parseOrdering(input.ordering),
  };
};
