import { Command } from 'commander';

import { createSuperuserInputSchema, fail, ok } from '@coinpurse/contracts';
import {
  type ActorContext,
  AppError,
  type DomainServices,
  type FieldErrors,
  validationError,
} from '@coinpurse/domain';

export interface CliDependencies {
  /** Resolved lazily so `--help` never opens the database. */
  getServices: () => DomainServices;
  migrate: () => string[];
  write?: (text: string) => void;
}

interface CreateSuperuserOptions {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
}

interface UserIdOptions {
  id: string;
}

interface DeleteUserOptions extends UserIdOptions {
  dryRun: boolean;
  approve?: string;
}

const CLI_ACTOR: ActorContext = { actor: 'cli', channel: 'cli' };

const flagName = (key: string): string =>
  `--${key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;

const parseSuperuserInput = (options: CreateSuperuserOptions) => {
  const parsed = createSuperuserInputSchema.safeParse(options);
  if (parsed.success) {
    return parsed.data;
  }

  const fields: FieldErrors = {};
  for (const issue of parsed.error.issues) {
    const field = flagName(issue.path.map(String).join('.'));
    fields[field] = [...(fields[field] ?? []), issue.message];
  }
  throw validationError(fields);
};

export const buildProgram = ({
  getServices,
  migrate,
  write = (text) => console.log(text),
}: CliDependencies): Command => {
  const program = new Command();
  let appliedMigrations: string[] | null = null;
  const migrateOnce = (): string[] => (appliedMigrations ??= migrate());

  const emit = (payload: unknown): void => {
    write(JSON.stringify(payload, null, 2));
  };

  const run = async <T>(fn: () => Promise<T> | T): Promise<void> => {
    try {
      migrateOnce();
      const data = await fn();
      emit(ok(data));
    } catch (error) {
      if (error instanceof AppError) {
        emit(fail(error.code, error.message, error.details));
        process.exitCode = 1;
        return;
      }

      emit(fail('INTERNAL_ERROR', error instanceof Error ? error.message : String(error)));
      process.exitCode = 1;
    }
  };

  program
    .name('coinpurse')
    .description('Administrative commands for the expense ledger')
    .showHelpAfterError();

  program
    .command('migrate')
    .description('Apply pending database migrations')
    .action(async () => {
      await run(() => ({ applied: migrateOnce() }));
    });

  const user = program.command('user').description('User administration');

  user
    .command('create-superuser')
    .description('Create an active staff superuser')
    .requiredOption('--email <email>', 'login email')
    .requiredOption('--password <password>', 'initial password')
    .requiredOption('--first-name <name>', 'first name')
    .requiredOption('--last-name <name>', 'last name')
    .action(async (options: CreateSuperuserOptions) => {
      await run(() =>
        getServices().users.createSuperuser(parseSuperuserInput(options), CLI_ACTOR),
      );
    });

  user
    .command('activate')
    .description('Allow a user to log in again')
    .requiredOption('--id <id>', 'user id')
    .action(async (options: UserIdOptions) => {
      await run(() => getServices().users.setActive(options.id, true, CLI_ACTOR));
    });

  user
    .command('deactivate')
    .description('Block logins and token refresh for a user')
    .requiredOption('--id <id>', 'user id')
    .action(async (options: UserIdOptions) => {
      await run(() => getServices().users.setActive(options.id, false, CLI_ACTOR));
    });

  user
    .command('delete')
    .description('Delete a user together with their expenses and tokens')
    .requiredOption('--id <id>', 'user id')
    .option('--dry-run', 'return approval token only', false)
    .option('--approve <operationId>', 'approval token id')
    .action(async (options: DeleteUserOptions) => {
      if (options.dryRun) {
        await run(() => getServices().users.createDeleteApproval(options.id));
        return;
      }

      const operationId = options.approve;
      if (!operationId) {
        const message = 'Pass --dry-run first, then --approve <operationId> for delete.';
        emit(fail('APPROVAL_REQUIRED', message));
        process.exitCode = 1;
        return;
      }

      await run(async () => {
        const result = await getServices().users.delete(options.id, operationId, CLI_ACTOR);
        return { ...result, id: options.id };
      });
    });

  const token = program.command('token').description('Session token maintenance');

  token
    .command('flush-expired')
    .description('Remove outstanding and blacklisted tokens past their expiry')
    .action(async () => {
      await run(() => getServices().tokens.flushExpired());
    });

  return program;
};
