export * from './errors.js';
export * from './services/index.js';
export type * from './types.js';
export type { UserDto, DeleteUserOutput } from './repositories/users.repository.js';
export type { ExpenseDto } from './repositories/expenses.repository.js';
export type { FlushExpiredOutput } from './repositories/tokens.repository.js';
