export * from './create-domain-services.js';
export type { ExpensesService } from './expenses.service.js';
export { DEFAULT_PAGE_SIZE } from './expenses.service.js';
export type { StatsService, ExpenseStats } from './stats.service.js';
export type { TokensService, TokenPair } from './tokens.service.js';
export type { UsersService } from './users.service.js';
export { normalizeEmail } from './users.service.js';
export { formatMinor, parseExpiresIn } from './shared/common.js';
export type { ApprovalToken } from './shared/approval-service.js';
export type { DomainDbOptions } from './shared/domain-db.js';
