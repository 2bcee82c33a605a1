import crypto from 'node:crypto';

import {
  AppError,
  type FieldErrors,
  accountDisabledError,
  fieldError,
  notFoundError,
  validationError,
} from '../errors.js';
import { withTransaction } from '../repositories/shared.js';
import {
  type DeleteUserOutput,
  SqliteUsersRepository,
  type UserDto,
} from '../repositories/users.repository.js';
import type {
  ActorContext,
  ChangePasswordInput,
  CreateUserInput,
  LoginInput,
  RegisterInput,
  UpdateProfileInput,
} from '../types.js';
import { checkPasswordStrength, comparePassword, hashPassword } from './passwords.js';
import type { ApprovalService, ApprovalToken } from './shared/approval-service.js';
import type { AuditService } from './shared/audit-service.js';
import { DEFAULT_ACTOR, toIso } from './shared/common.js';
import type { DomainDbRuntime } from './shared/domain-db.js';

export const MAX_NAME_LENGTH = 150;

export interface UsersService {
  createUser: (input: CreateUserInput) => Promise<UserDto>;
  createSuperuser: (input: CreateUserInput, context?: ActorContext) => Promise<UserDto>;
  register: (input: RegisterInput, context?: ActorContext) => Promise<UserDto>;
  /** Checks credentials and stamps `lastLogin`. Inactive accounts fail with 403. */
  login: (input: LoginInput) => Promise<UserDto>;
  verifyPassword: (id: string, candidate: string) => Promise<boolean>;
  setPassword: (id: string, newPassword: string) => Promise<void>;
  changePassword: (
    id: string,
    input: ChangePasswordInput,
    context?: ActorContext,
  ) => Promise<void>;
  get: (id: string) => Promise<UserDto>;
  findByEmail: (email: string) => Promise<UserDto | null>;
  updateProfile: (id: string, input: UpdateProfileInput) => Promise<UserDto>;
  setActive: (id: string, active: boolean, context?: ActorContext) => Promise<UserDto>;
  createDeleteApproval: (id: string) => Promise<ApprovalToken>;
  delete: (
    id: string,
    approveOperationId: string,
    context?: ActorContext,
  ) => Promise<DeleteUserOutput>;
}

interface UsersServiceDeps {
  runtime: DomainDbRuntime;
  approvals: ApprovalService;
  audit: AuditService;
  passwordHashRounds: number;
}

/** Lower-cases the domain part only; the local part is kept as typed. */
export const normalizeEmail = (email: string): string => {
  const trimmed = email.trim();
  const at = trimmed.lastIndexOf('@');
  if (at < 0) {
    return trimmed;
  }
  return `${trimmed.slice(0, at)}@${trimmed.slice(at + 1).toLowerCase()}`;
};

const isPlausibleEmail = (email: string): boolean => /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(email);

const addError = (errors: FieldErrors, field: string, message: string): void => {
  errors[field] = [...(errors[field] ?? []), message];
};

const checkName = (errors: FieldErrors, field: string, value: string): string => {
  const trimmed = value.trim();
  if (!trimmed) {
    addError(errors, field, 'This field may not be blank.');
  } else if (trimmed.length > MAX_NAME_LENGTH) {
    addError(errors, field, `Ensure this field has no more than ${MAX_NAME_LENGTH} characters.`);
  }
  return trimmed;
};

/** Login compares against a hash of this when no account matches the email. */
const UNKNOWN_ACCOUNT_PASSWORD = 'unknown-account-placeholder';

const invalidCredentials = () =>
  new AppError('INVALID_CREDENTIALS', 'No active account found with the given credentials', 401);

export const createUsersService = ({
  runtime,
  approvals,
  audit,
  passwordHashRounds,
}: UsersServiceDeps): UsersService => {
  const usersRepo = () => new SqliteUsersRepository(runtime.db);

  let unknownAccountHash: Promise<string> | undefined;
  const unknownAccountHashOf = () =>
    (unknownAccountHash ??= hashPassword(UNKNOWN_ACCOUNT_PASSWORD, passwordHashRounds));

  const requireUser = (id: string) => {
    const found = usersRepo().findById(id);
    if (!found) {
      throw notFoundError('User');
    }
    return found;
  };

  const insertUser = async (input: CreateUserInput, errors: FieldErrors = {}): Promise<UserDto> => {
    const email = normalizeEmail(input.email);
    if (!email) {
      addError(errors, 'email', 'This field is required.');
    } else if (!isPlausibleEmail(email)) {
      addError(errors, 'email', 'Enter a valid email address.');
    }
    const firstName = checkName(errors, 'first_name', input.firstName);
    const lastName = checkName(errors, 'last_name', input.lastName);

    if (Object.keys(errors).length > 0) {
      throw validationError(errors);
    }

    const passwordHash = await hashPassword(input.password, passwordHashRounds);

    const repo = usersRepo();
    if (repo.findByEmail(email)) {
      throw new AppError('EMAIL_TAKEN', 'A user with this email already exists', 400, {
        fields: { email: ['A user with this email already exists.'] },
      });
    }

    const now = toIso(runtime.now());
    return repo.create({
      id: crypto.randomUUID(),
      email,
      passwordHash,
      firstName,
      lastName,
      isActive: input.isActive ?? true,
      isStaff: input.isStaff ?? false,
      isSuperuser: input.isSuperuser ?? false,
      dateJoined: now,
      updatedAt: now,
    });
  };

  const storePassword = async (id: string, password: string): Promise<void> => {
    const passwordHash = await hashPassword(password, passwordHashRounds);
    usersRepo().update({ id, passwordHash, updatedAt: toIso(runtime.now()) });
  };

  return {
    async createUser(input: CreateUserInput) {
      return insertUser(input);
    },

    async createSuperuser(input: CreateUserInput, context: ActorContext = DEFAULT_ACTOR) {
      const errors: FieldErrors = {};
      if (input.isStaff === false) {
        addError(errors, 'is_staff', 'Superuser must have is_staff=true.');
      }
      if (input.isSuperuser === false) {
        addError(errors, 'is_superuser', 'Superuser must have is_superuser=true.');
      }

      const user = await insertUser(
        { ...input, isActive: true, isStaff: true, isSuperuser: true },
        errors,
      );
      await audit.writeAudit('user.create_superuser', { id: user.id, email: user.email }, context);
      return user;
    },

    async register(input: RegisterInput, context: ActorContext = DEFAULT_ACTOR) {
      const errors: FieldErrors = {};
      if (input.password !== input.password2) {
        addError(errors, 'password', "Password fields didn't match.");
      } else {
        for (const problem of checkPasswordStrength(input.password, input)) {
          addError(errors, 'password', problem);
        }
      }

      const user = await insertUser(
        {
          email: input.email,
          password: input.password,
          firstName: input.firstName,
          lastName: input.lastName,
        },
        errors,
      );
      await audit.writeAudit('user.register', { id: user.id, email: user.email }, context);
      return user;
    },

    async login({ email, password }: LoginInput) {
      const found = usersRepo().findByEmail(normalizeEmail(email));
      const passwordHash = found ? found.passwordHash : await unknownAccountHashOf();
      const matches = await comparePassword(password, passwordHash);
      if (!found || !matches) {
        throw invalidCredentials();
      }
      if (!found.user.isActive) {
        throw accountDisabledError();
      }

      const now = toIso(runtime.now());
      const updated = usersRepo().update({ id: found.user.id, lastLogin: now, updatedAt: now });
      return updated ?? found.user;
    },

    async verifyPassword(id: string, candidate: string) {
      return comparePassword(candidate, requireUser(id).passwordHash);
    },

    async setPassword(id: string, newPassword: string) {
      requireUser(id);
      await storePassword(id, newPassword);
    },

    async changePassword(
      id: string,
      input: ChangePasswordInput,
      context: ActorContext = DEFAULT_ACTOR,
    ) {
      const { user, passwordHash } = requireUser(id);

      if (!(await comparePassword(input.oldPassword, passwordHash))) {
        throw fieldError(
          'old_password',
          'Your old password was entered incorrectly. Please enter it again.',
        );
      }
      if (input.newPassword !== input.newPassword2) {
        throw fieldError('new_password', "The two password fields didn't match.");
      }

      const problems = checkPasswordStrength(input.newPassword, user);
      if (problems.length > 0) {
        throw validationError({ new_password: problems });
      }

      await storePassword(id, input.newPassword);
      await audit.writeAudit('user.password_change', { id }, context);
    },

    async get(id: string) {
      return requireUser(id).user;
    },

    async findByEmail(email: string) {
      return usersRepo().findByEmail(normalizeEmail(email))?.user ?? null;
    },

    async updateProfile(id: string, input: UpdateProfileInput) {
      requireUser(id);

      const errors: FieldErrors = {};
      const firstName =
        input.firstName === undefined
          ? undefined
          : checkName(errors, 'first_name', input.firstName);
      const lastName =
        input.lastName === undefined ? undefined : checkName(errors, 'last_name', input.lastName);
      if (Object.keys(errors).length > 0) {
        throw validationError(errors);
      }

      const updated = usersRepo().update({
        id,
        ...(firstName !== undefined ? { firstName } : {}),
        ...(lastName !== undefined ? { lastName } : {}),
        updatedAt: toIso(runtime.now()),
      });
      if (!updated) {
        throw notFoundError('User');
      }
      return updated;
    },

    async setActive(id: string, active: boolean, context: ActorContext = DEFAULT_ACTOR) {
      requireUser(id);

      const updated = usersRepo().update({ id, isActive: active, updatedAt: toIso(runtime.now()) });
      if (!updated) {
        throw notFoundError('User');
      }

      await audit.writeAudit('user.set_active', { id, active }, context);
      return updated;
    },

    async createDeleteApproval(id: string) {
      requireUser(id);
      return approvals.createApproval('user.delete', { id });
    },

    async delete(id: string, approveOperationId: string, context: ActorContext = DEFAULT_ACTOR) {
      requireUser(id);
      await approvals.consumeApproval('user.delete', approveOperationId, { id });

      const result = withTransaction(runtime.db, (tx) =>
        new SqliteUsersRepository(tx).deleteCascade(id),
      );

      await audit.writeAudit(
        'user.delete',
        { id, expensesDeleted: result.expensesDeleted },
        context,
      );
      return result;
    },
  };
};
