import { eq } from 'drizzle-orm';

import { expenses, outstandingTokens, tokenBlacklist, users } from '@coinpurse/db';

import type { RepositoryDb } from './shared.js';

export interface UserDto {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  fullName: string;
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;
  lastLogin: string | null;
  dateJoined: string;
  updatedAt: string;
}

/** A user row together with its password hash; never leaves the domain layer. */
export interface UserCredentials {
  user: UserDto;
  passwordHash: string;
}

const mapUser = (row: typeof users.$inferSelect): UserDto => ({
  id: row.id,
  email: row.email,
  firstName: row.firstName,
  lastName: row.lastName,
  fullName: `${row.firstName} ${row.lastName}`.trim(),
  isActive: row.isActive,
  isStaff: row.isStaff,
  isSuperuser: row.isSuperuser,
  lastLogin: row.lastLogin,
  dateJoined: row.dateJoined,
  updatedAt: row.updatedAt,
});

export interface CreateUserRowInput {
  id: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;
  dateJoined: string;
  updatedAt: string;
}

export interface UpdateUserRowInput {
  id: string;
  firstName?: string;
  lastName?: string;
  passwordHash?: string;
  isActive?: boolean;
  lastLogin?: string;
  updatedAt: string;
}

export interface DeleteUserOutput {
  deleted: boolean;
  expensesDeleted: number;
}

export interface UsersRepository {
  findById(id: string): UserCredentials | null;
  findByEmail(email: string): UserCredentials | null;
  create(input: CreateUserRowInput): UserDto;
  update(input: UpdateUserRowInput): UserDto | null;
  deleteCascade(id: string): DeleteUserOutput;
}

export class SqliteUsersRepository implements UsersRepository {
  constructor(private readonly db: RepositoryDb) {}

  findById(id: string): UserCredentials | null {
    const row = this.db.select().from(users).where(eq(users.id, id)).get();
    return row ? { user: mapUser(row), passwordHash: row.passwordHash } : null;
  }

  findByEmail(email: string): UserCredentials | null {
    const row = this.db.select().from(users).where(eq(users.email, email)).get();
    return row ? { user: mapUser(row), passwordHash: row.passwordHash } : null;
  }

  create(input: CreateUserRowInput): UserDto {
    this.db.insert(users).values(input).run();

    const created = this.db.select().from(users).where(eq(users.id, input.id)).get();
    if (!created) {
      throw new Error(`Failed to fetch created user ${input.id}`);
    }
    return mapUser(created);
  }

  update({ id, ...patch }: UpdateUserRowInput): UserDto | null {
    this.db.update(users).set(patch).where(eq(users.id, id)).run();

    const updated = this.db.select().from(users).where(eq(users.id, id)).get();
    return updated ? mapUser(updated) : null;
  }

  /** Deletes owned expenses and token rows, then the user. Call inside a transaction. */
  deleteCascade(id: string): DeleteUserOutput {
    const expensesResult = this.db.delete(expenses).where(eq(expenses.userId, id)).run();
    this.db.delete(tokenBlacklist).where(eq(tokenBlacklist.userId, id)).run();
    this.db.delete(outstandingTokens).where(eq(outstandingTokens.userId, id)).run();
    const userResult = this.db.delete(users).where(eq(users.id, id)).run();

    return {
      deleted: userResult.changes > 0,
      expensesDeleted: expensesResult.changes,
    };
  }
}
