import { sql } from 'drizzle-orm';
import { index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';

import { EXPENSE_CATEGORIES } from '@coinpurse/contracts';

export const users = sqliteTable(
  'users',
  {
    id: text('id').primaryKey(),
    email: text('email').notNull(),
    passwordHash: text('password_hash').notNull(),
    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    isStaff: integer('is_staff', { mode: 'boolean' }).notNull().default(false),
    isSuperuser: integer('is_superuser', { mode: 'boolean' }).notNull().default(false),
    lastLogin: text('last_login'),
    dateJoined: text('date_joined').notNull().default(sql`CURRENT_TIMESTAMP`),
    updatedAt: text('updated_at').notNull().default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [uniqueIndex('users_email_uq').on(table.email)],
);

export const expenses = sqliteTable(
  'expenses',
  {
    id: text('id').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    amountMinor: integer('amount_minor').notNull(),
    category: text('category', { enum: EXPENSE_CATEGORIES }).notNull(),
    description: text('description'),
    date: text('date').notNull(),
    createdAt: text('created_at').notNull().default(sql`CURRENT_TIMESTAMP`),
    updatedAt: text('updated_at').notNull().default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [
    index('expenses_user_date_idx').on(table.userId, table.date),
    index('expenses_category_idx').on(table.category),
    index('expenses_date_idx').on(table.date),
  ],
);

export const outstandingTokens = sqliteTable(
  'outstanding_tokens',
  {
    jti: text('jti').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: text('created_at').notNull().default(sql`CURRENT_TIMESTAMP`),
    expiresAt: text('expires_at').notNull(),
  },
  (table) => [
    index('outstanding_tokens_user_idx').on(table.userId),
    index('outstanding_tokens_expires_idx').on(table.expiresAt),
  ],
);

export const tokenBlacklist = sqliteTable(
  'token_blacklist',
  {
    jti: text('jti').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    expiresAt: text('expires_at').notNull(),
    blacklistedAt: text('blacklisted_at').notNull().default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [index('token_blacklist_expires_idx').on(table.expiresAt)],
);

export const auditLog = sqliteTable(
  'audit_log',
  {
    id: text('id').primaryKey(),
    actor: text('actor').notNull(),
    channel: text('channel').notNull(),
    action: text('action').notNull(),
    payloadHash: text('payload_hash').notNull(),
    createdAt: text('created_at').notNull().default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [index('audit_action_idx').on(table.action)],
);

export const operationApprovals = sqliteTable(
  'operation_approvals',
  {
    id: text('id').primaryKey(),
    action: text('action').notNull(),
    payloadJson: text('payload_json').notNull(),
    payloadHash: text('payload_hash').notNull(),
    expiresAt: text('expires_at').notNull(),
    approvedAt: text('approved_at'),
    createdAt: text('created_at').notNull().default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [index('operation_action_idx').on(table.action)],
);
