import { EXPENSE_CATEGORIES, categoryLabel } from '@coinpurse/contracts';
import { type ExpenseDto, type ExpenseStats, type UserDto, formatMinor } from '@coinpurse/domain';

export const serializeUser = (user: UserDto) => ({
  id: user.id,
  email: user.email,
  first_name: user.firstName,
  last_name: user.lastName,
  full_name: user.fullName,
  date_joined: user.dateJoined,
  is_active: user.isActive,
});

export const serializeExpense = (expense: ExpenseDto) => ({
  id: expense.id,
  user: expense.userId,
  user_email: expense.userEmail,
  title: expense.title,
  amount: formatMinor(expense.amountMinor),
  category: expense.category,
  category_display: categoryLabel(expense.category),
  description: expense.description,
  date: expense.date,
  created_at: expense.createdAt,
  updated_at: expense.updatedAt,
});

export const serializeExpenseSummary = (expense: ExpenseDto) => ({
  id: expense.id,
  title: expense.title,
  amount: formatMinor(expense.amountMinor),
  category: expense.category,
  category_display: categoryLabel(expense.category),
  date: expense.date,
  created_at: expense.createdAt,
});

/** Per-category totals keyed by the human-readable label. */
export const serializeStats = (stats: ExpenseStats) => ({
  count: stats.count,
  total_amount: formatMinor(stats.totalMinor),
  average_amount: formatMinor(stats.averageMinor),
  by_category: Object.fromEntries(
    EXPENSE_CATEGORIES.map((category) => [
      categoryLabel(category),
      formatMinor(stats.byCategoryMinor[category]),
    ]),
  ),
});
