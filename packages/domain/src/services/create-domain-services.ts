import { createExpensesService } from './expenses.service.js';
import type { ExpensesService } from './expenses.service.js';
import { DEFAULT_PASSWORD_HASH_ROUNDS } from './passwords.js';
import { createApprovalService } from './shared/approval-service.js';
import type { ApprovalService } from './shared/approval-service.js';
import { createAuditService } from './shared/audit-service.js';
import type { AuditService } from './shared/audit-service.js';
import { createDomainDbRuntime } from './shared/domain-db.js';
import type { DomainDbOptions } from './shared/domain-db.js';
import { createStatsService } from './stats.service.js';
import type { StatsService } from './stats.service.js';
import {
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
  createTokensService,
} from './tokens.service.js';
import type { TokensService } from './tokens.service.js';
import { createUsersService } from './users.service.js';
import type { UsersService } from './users.service.js';

export interface AuthOptions {
  /** Required for issuing and verifying tokens; administrative commands run without it. */
  jwtSecret?: string;
  accessTokenTtlSeconds?: number;
  refreshTokenTtlSeconds?: number;
  passwordHashRounds?: number;
}

export interface DomainServiceOptions extends DomainDbOptions {
  auth?: AuthOptions;
  pageSize?: number;
  now?: () => Date;
}

export interface DomainServices {
  users: UsersService;
  tokens: TokensService;
  expenses: ExpensesService;
  stats: StatsService;
  approvals: ApprovalService;
  audit: AuditService;
}

export interface ClosableDomainServices extends DomainServices {
  close: () => void;
}

export const createDomainServices = (
  options: DomainServiceOptions = {},
): ClosableDomainServices => {
  const { auth = {}, pageSize, now, ...dbOptions } = options;
  const runtime = createDomainDbRuntime(dbOptions, now);
  const approvals = createApprovalService(runtime);
  const audit = createAuditService(runtime);

  const services: ClosableDomainServices = {
    users: createUsersService({
      runtime,
      approvals,
      audit,
      passwordHashRounds: auth.passwordHashRounds ?? DEFAULT_PASSWORD_HASH_ROUNDS,
    }),
    tokens: createTokensService({
      runtime,
      settings: {
        jwtSecret: auth.jwtSecret,
        accessTokenTtlSeconds: auth.accessTokenTtlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
        refreshTokenTtlSeconds: auth.refreshTokenTtlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
      },
    }),
    expenses: createExpensesService({ runtime, pageSize }),
    stats: createStatsService({ runtime }),
    approvals,
    audit,
    close: () => runtime.close(),
  };

  return services;
};
