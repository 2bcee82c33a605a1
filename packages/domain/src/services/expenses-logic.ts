import { type ExpenseCategory, expenseCategorySchema } from '@coinpurse/contracts';

import { type FieldErrors, validationError } from '../errors.js';
import type { AmountInput, CreateExpenseInput } from '../types.js';
import { isCalendarDate } from './shared/common.js';

export const MAX_TITLE_LENGTH = 200;
export const MAX_AMOUNT_WHOLE_DIGITS = 8;
export const MAX_AMOUNT_DECIMAL_PLACES = 2;
/** 1,000,000.00 in minor units; anything above needs a description. */
export const DESCRIPTION_REQUIRED_ABOVE_MINOR = 100_000_000;

export type FieldCheck<T> = { ok: true; value: T } | { ok: false; message: string };

const pass = <T>(value: T): FieldCheck<T> => ({ ok: true, value });
const reject = <T>(message: string): FieldCheck<T> => ({ ok: false, message });

const REQUIRED = 'This field is required.';

export interface ExpenseDraft {
  title?: unknown;
  amount?: AmountInput | null;
  category?: unknown;
  description?: unknown;
  date?: unknown;
}

export interface ValidatedExpense {
  title: string;
  amountMinor: number;
  category: ExpenseCategory;
  description: string | null;
  date: string;
}

// ── Field validators ───────────────────────────────────────────────────────

export const checkTitle = (value: unknown): FieldCheck<string> => {
  if (value === undefined || value === null) {
    return reject(REQUIRED);
  }
  if (typeof value !== 'string') {
    return reject('Not a valid string.');
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return reject('This field may not be blank.');
  }
  if (trimmed.length > MAX_TITLE_LENGTH) {
    return reject(`Ensure this field has no more than ${MAX_TITLE_LENGTH} characters.`);
  }
  return pass(trimmed);
};

/** Parses a decimal amount into integer minor units without going through floating point. */
export const checkAmount = (value: AmountInput | null | undefined): FieldCheck<number> => {
  if (value === undefined || value === null) {
    return reject(REQUIRED);
  }

  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = /^([+-]?)(\d+)(?:\.(\d+))?$/.exec(text);
  if (!match) {
    return reject('A valid number is required.');
  }

  const [, sign = '', whole = '', fraction = ''] = match;
  if (fraction.length > MAX_AMOUNT_DECIMAL_PLACES) {
    return reject(
      `Ensure that there are no more than ${MAX_AMOUNT_DECIMAL_PLACES} decimal places.`,
    );
  }

  const significantWhole = whole.replace(/^0+(?=\d)/, '');
  if (significantWhole.length > MAX_AMOUNT_WHOLE_DIGITS) {
    return reject(
      `Ensure that there are no more than ${MAX_AMOUNT_WHOLE_DIGITS} digits before the decimal point.`,
    );
  }

  const magnitude =
    Number.parseInt(significantWhole, 10) * 100 + Number.parseInt(fraction.padEnd(2, '0'), 10);
  const amountMinor = sign === '-' ? -magnitude : magnitude;
  if (amountMinor < 1) {
    return reject('Amount must be greater than zero.');
  }
  return pass(amountMinor);
};

export const checkCategory = (value: unknown): FieldCheck<ExpenseCategory> => {
  if (value === undefined || value === null) {
    return reject(REQUIRED);
  }

  const parsed = expenseCategorySchema.safeParse(value);
  return parsed.success ? pass(parsed.data) : reject(`"${String(value)}" is not a valid choice.`);
};

export const checkDescription = (value: unknown): FieldCheck<string | null> => {
  if (value === undefined || value === null) {
    return pass(null);
  }
  if (typeof value !== 'string') {
    return reject('Not a valid string.');
  }

  const trimmed = value.trim();
  return pass(trimmed.length > 0 ? trimmed : null);
};

export const checkExpenseDate = (value: unknown, today: string): FieldCheck<string> => {
  if (value === undefined || value === null) {
    return reject(REQUIRED);
  }
  if (typeof value !== 'string' || !isCalendarDate(value)) {
    return reject('Date has wrong format. Use YYYY-MM-DD.');
  }
  if (value > today) {
    return reject('Expense date cannot be in the future.');
  }
  return pass(value);
};

// ── Chain ──────────────────────────────────────────────────────────────────

/**
 * Runs the field validators in declaration order, collecting every failure, then
 * applies the cross-field rules once all fields are individually valid.
 */
export const validateExpenseDraft = (draft: ExpenseDraft, today: string): ValidatedExpense => {
  const errors: FieldErrors = {};

  const collect = <T>(field: string, check: FieldCheck<T>): T | undefined => {
    if (check.ok) {
      return check.value;
    }
    errors[field] = [check.message];
    return undefined;
  };

  const title = collect('title', checkTitle(draft.title));
  const amountMinor = collect('amount', checkAmount(draft.amount));
  const category = collect('category', checkCategory(draft.category));
  const description = collect('description', checkDescription(draft.description));
  const date = collect('date', checkExpenseDate(draft.date, today));

  if (
    title === undefined ||
    amountMinor === undefined ||
    category === undefined ||
    description === undefined ||
    date === undefined
  ) {
    throw validationError(errors);
  }

  const validated: ValidatedExpense = { title, amountMinor, category, description, date };
  assertLargeAmountHasDescription(validated);
  return validated;
};

export const assertLargeAmountHasDescription = (
  expense: Pick<ValidatedExpense, 'amountMinor' | 'description'>,
): void => {
  if (expense.amountMinor > DESCRIPTION_REQUIRED_ABOVE_MINOR && !expense.description) {
    throw validationError({
      description: ['Expenses above 1,000,000 require a description.'],
    });
  }
};

/** Overlays the defined keys of a partial update on top of an existing draft. */
export const mergeExpenseDraft = (
  base: ExpenseDraft,
  patch: Partial<CreateExpenseInput>,
): ExpenseDraft => {
  const merged: ExpenseDraft = { ...base };
  if (patch.title !== undefined) {
    merged.title = patch.title;
  }
  if (patch.amount !== undefined) {
    merged.amount = patch.amount;
  }
  if (patch.category !== undefined) {
    merged.category = patch.category;
  }
  if (patch.description !== undefined) {
    merged.description = patch.description;
  }
  if (patch.date !== undefined) {
    merged.date = patch.date;
  }
  return merged;
};
