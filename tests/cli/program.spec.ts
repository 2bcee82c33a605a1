import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { buildProgram } from '@coinpurse/cli/program';
import { runMigrations } from '@coinpurse/db';
import { type ClosableDomainServices, createDomainServices } from '@coinpurse/domain';

const PASSWORD = 'Sturdy-Passw0rd';

describe('CLI program', () => {
  let dir: string;
  let dbPath: string;
  let services: ClosableDomainServices;
  let output: string[];

  const runCli = async (...args: string[]): Promise<unknown> => {
    output = [];
    const program = buildProgram({
      getServices: () => services,
      migrate: () => runMigrations(dbPath),
      write: (text) => output.push(text),
    });
    program.exitOverride();

    await program.parseAsync(['node', 'coinpurse', ...args]);
    return JSON.parse(output.join('\n'));
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'coinpurse-cli-test-'));
    dbPath = path.join(dir, 'cli.sqlite');
    services = createDomainServices({ dbPath, auth: { passwordHashRounds: 4 } });
  });

  afterEach(() => {
    services.close();
    fs.rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  const createSuperuser = () =>
    runCli(
      'user',
      'create-superuser',
      '--email',
      'root@example.org',
      '--password',
      PASSWORD,
      '--first-name',
      'Root',
      '--last-name',
      'Admin',
    );

  it('applies migrations once and reports them', async () => {
    const result = await runCli('migrate');

    expect(result).toEqual({
      ok: true,
      data: {
        applied: [
          '0001_users_and_expenses.sql',
          '0002_session_tokens.sql',
          '0003_audit_and_approvals.sql',
        ],
      },
      meta: {},
    });
  });

  it('has no output-format flag', async () => {
    await expect(runCli('--json', 'migrate')).rejects.toMatchObject({
      code: 'commander.unknownOption',
    });
    expect(output).toEqual([]);
  });

  it('creates a superuser', async () => {
    const result = await createSuperuser();

    expect(result).toMatchObject({
      ok: true,
      data: {
        email: 'root@example.org',
        isActive: true,
        isStaff: true,
        isSuperuser: true,
      },
    });
  });

  it('validates superuser input with the shared schema', async () => {
    const result = await runCli(
      'user',
      'create-superuser',
      '--email',
      'not-an-email',
      '--password',
      PASSWORD,
      '--first-name',
      'Root',
      '--last-name',
      'Admin',
    );

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: { fields: { '--email': ['Invalid email'] } },
      },
    });
    expect(process.exitCode).toBe(1);
  });

  it('deactivates and reactivates a user', async () => {
    await runCli('migrate');
    const user = await services.users.createUser({
      email: 'ana@example.com',
      password: PASSWORD,
      firstName: 'Ana',
      lastName: 'Lopez',
    });

    expect(await runCli('user', 'deactivate', '--id', user.id)).toMatchObject({
      ok: true,
      data: { id: user.id, isActive: false },
    });
    expect(await runCli('user', 'activate', '--id', user.id)).toMatchObject({
      ok: true,
      data: { id: user.id, isActive: true },
    });
    expect(await services.audit.countByAction('user.set_active')).toBe(2);
  });

  it('requires a dry run approval before deleting a user', async () => {
    await runCli('migrate');
    const user = await services.users.createUser({
      email: 'ana@example.com',
      password: PASSWORD,
      firstName: 'Ana',
      lastName: 'Lopez',
    });

    expect(await runCli('user', 'delete', '--id', user.id)).toEqual({
      ok: false,
      error: {
        code: 'APPROVAL_REQUIRED',
        message: 'Pass --dry-run first, then --approve <operationId> for delete.',
      },
    });

    const dryRun = await runCli('user', 'delete', '--id', user.id, '--dry-run');
    expect(dryRun).toMatchObject({ ok: true, data: { action: 'user.delete' } });

    const operationId = (dryRun as { data: { operationId: string } }).data.operationId;
    expect(await runCli('user', 'delete', '--id', user.id, '--approve', operationId)).toEqual({
      ok: true,
      data: { deleted: true, expensesDeleted: 0, id: user.id },
      meta: {},
    });
    expect(await services.users.findByEmail('ana@example.com')).toBeNull();
  });

  it('reports missing users with the domain error code', async () => {
    await runCli('migrate');

    expect(await runCli('user', 'activate', '--id', 'missing-user')).toEqual({
      ok: false,
      error: { code: 'NOT_FOUND', message: 'User not found' },
    });
  });

  it('flushes expired tokens', async () => {
    expect(await runCli('token', 'flush-expired')).toEqual({
      ok: true,
      data: { outstandingDeleted: 0, blacklistDeleted: 0 },
      meta: {},
    });
  });
});
