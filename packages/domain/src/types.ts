import type { ExpenseCategory, ExpenseOrderingField } from '@coinpurse/contracts';

export interface ActorContext {
  actor: string;
  channel: 'api' | 'cli' | 'system';
}

/** The authenticated caller every owner-scoped operation runs as. */
export interface Identity {
  userId: string;
  email: string;
  isStaff: boolean;
  isSuperuser: boolean;
}

export interface CreateUserInput {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  isActive?: boolean;
  isStaff?: boolean;
  isSuperuser?: boolean;
}

export interface RegisterInput {
  email: string;
  password: string;
  password2: string;
  firstName: string;
  lastName: string;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface ChangePasswordInput {
  oldPassword: string;
  newPassword: string;
  newPassword2: string;
}

export interface UpdateProfileInput {
  firstName?: string;
  lastName?: string;
}

export type AmountInput = string | number;

export interface CreateExpenseInput {
  title: string;
  amount: AmountInput;
  category: string;
  description?: string | null;
  date: string;
}

export type UpdateExpenseInput = Partial<CreateExpenseInput>;

export interface OrderingTerm {
  field: ExpenseOrderingField;
  direction: 'asc' | 'desc';
}

export interface ListExpensesInput {
  category?: ExpenseCategory;
  startDate?: string;
  endDate?: string;
  minAmount?: number;
  maxAmount?: number;
  period?: string;
  search?: string;
  ordering?: string;
  page?: number;
}

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
}
