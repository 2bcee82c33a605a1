import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import bcrypt from 'bcryptjs';

import { runMigrations } from '@coinpurse/db';
import {
  type ClosableDomainServices,
  type Identity,
  createDomainServices,
} from '@coinpurse/domain';

const JWT_SECRET = 'test-secret-value-123';
const PASSWORD = 'Sturdy-Passw0rd';
const START = '2024-06-15T12:00:00.000Z';

interface Harness {
  services: ClosableDomainServices;
  dbPath: string;
  dir: string;
  setNow: (iso: string) => void;
  reopen: () => ClosableDomainServices;
}

const setupService = (): Harness => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'coinpurse-domain-test-'));
  const dbPath = path.join(dir, 'test.sqlite');
  runMigrations(dbPath);

  let now = new Date(START);
  const open = () =>
    createDomainServices({
      dbPath,
      auth: { jwtSecret: JWT_SECRET, passwordHashRounds: 4 },
      now: () => now,
    });

  return {
    services: open(),
    dbPath,
    dir,
    setNow: (iso) => {
      now = new Date(iso);
    },
    reopen: open,
  };
};

const teardown = ({ services, dir }: Harness): void => {
  services.close();
  fs.rmSync(dir, { recursive: true, force: true });
};

const createUser = (services: ClosableDomainServices, email = 'ana@example.com') =>
  services.users.createUser({ email, password: PASSWORD, firstName: 'Ana', lastName: 'Lopez' });

const identityOf = (user: { id: string; email: string }): Identity => ({
  userId: user.id,
  email: user.email,
  isStaff: false,
  isSuperuser: false,
});

describe('Domain services', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = setupService();
  });

  afterEach(() => {
    teardown(harness);
  });

  // ── Users ──────────────────────────────────────────────────────────────────

  it('creates superusers with every flag forced on', async () => {
    const { services } = harness;

    const admin = await services.users.createSuperuser({
      email: 'admin@Example.org',
      password: PASSWORD,
      firstName: 'Root',
      lastName: 'Admin',
    });

    expect(admin).toMatchObject({
      email: 'admin@example.org',
      isActive: true,
      isStaff: true,
      isSuperuser: true,
    });
    expect(await services.audit.countByAction('user.create_superuser')).toBe(1);
  });

  it('refuses superusers created with staff or superuser switched off', async () => {
    await expect(
      harness.services.users.createSuperuser({
        email: 'admin@example.org',
        password: PASSWORD,
        firstName: 'Root',
        lastName: 'Admin',
        isStaff: false,
        isSuperuser: false,
      }),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: {
        fields: {
          is_staff: ['Superuser must have is_staff=true.'],
          is_superuser: ['Superuser must have is_superuser=true.'],
        },
      },
    });
    expect(await harness.services.users.findByEmail('admin@example.org')).toBeNull();
  });

  it('stamps lastLogin on a successful login', async () => {
    const { services } = harness;
    const user = await createUser(services);
    expect(user.lastLogin).toBeNull();

    harness.setNow('2024-06-15T13:30:00.000Z');
    const loggedIn = await services.users.login({ email: 'ana@example.com', password: PASSWORD });

    expect(loggedIn.lastLogin).toBe('2024-06-15T13:30:00.000Z');
    expect(await services.users.verifyPassword(user.id, PASSWORD)).toBe(true);
    expect(await services.users.verifyPassword(user.id, 'Wrong-Passw0rd')).toBe(false);
  });

  it('replaces the stored hash with setPassword', async () => {
    const { services } = harness;
    const user = await createUser(services);

    await services.users.setPassword(user.id, 'Another-Passw0rd');

    expect(await services.users.verifyPassword(user.id, PASSWORD)).toBe(false);
    expect(await services.users.verifyPassword(user.id, 'Another-Passw0rd')).toBe(true);
  });

  it('compares a password hash even when the email is unknown', async () => {
    const { services } = harness;
    await createUser(services);
    const compare = vi.spyOn(bcrypt, 'compare');

    try {
      await expect(
        services.users.login({ email: 'nobody@example.com', password: PASSWORD }),
      ).rejects.toMatchObject({ code: 'INVALID_CREDENTIALS' });
      expect(compare).toHaveBeenCalledTimes(1);
    } finally {
      compare.mockRestore();
    }
  });

  // ── Cascading delete ───────────────────────────────────────────────────────

  it('deletes a user with their expenses and tokens after approval', async () => {
    const { services } = harness;
    const user = await createUser(services);
    const other = await createUser(services, 'ben@example.com');
    const identity = identityOf(user);

    for (const title of ['Bread', 'Milk']) {
      await services.expenses.create(identity, {
        title,
        amount: '2.50',
        category: 'GROCERIES',
        date: '2024-06-10',
      });
    }
    await services.expenses.create(identityOf(other), {
      title: 'Bus',
      amount: '1.80',
      category: 'OTHERS',
      date: '2024-06-10',
    });
    const tokens = await services.tokens.issue(user);
    await services.tokens.revoke(tokens.refresh, user.id);

    expect(await services.expenses.countForOwner(user.id)).toBe(2);

    const approval = await services.users.createDeleteApproval(user.id);
    const result = await services.users.delete(user.id, approval.operationId);

    expect(result).toEqual({ deleted: true, expensesDeleted: 2 });
    expect(await services.expenses.countForOwner(user.id)).toBe(0);
    expect(await services.expenses.countForOwner(other.id)).toBe(1);
    expect(await services.users.findByEmail('ana@example.com')).toBeNull();
    expect(await services.audit.countByAction('user.delete')).toBe(1);
  });

  it('refuses a delete approval issued for another user', async () => {
    const { services } = harness;
    const user = await createUser(services);
    const other = await createUser(services, 'ben@example.com');

    const approval = await services.users.createDeleteApproval(user.id);

    await expect(services.users.delete(other.id, approval.operationId)).rejects.toMatchObject({
      code: 'APPROVAL_PAYLOAD_MISMATCH',
      statusCode: 403,
    });
    expect(await services.users.get(other.id)).toMatchObject({ id: other.id });
  });

  it('expires delete approvals after fifteen minutes', async () => {
    const { services } = harness;
    const user = await createUser(services);
    const approval = await services.users.createDeleteApproval(user.id);

    harness.setNow('2024-06-15T12:15:01.000Z');

    await expect(services.users.delete(user.id, approval.operationId)).rejects.toMatchObject({
      code: 'APPROVAL_EXPIRED',
    });
  });

  it('consumes an approval only once and only for its action', async () => {
    const { approvals } = harness.services;
    const approval = await approvals.createApproval('user.delete', { id: 'u-1' });

    await expect(
      approvals.consumeApproval('user.purge', approval.operationId, { id: 'u-1' }),
    ).rejects.toMatchObject({ code: 'APPROVAL_ACTION_MISMATCH' });

    await approvals.consumeApproval('user.delete', approval.operationId, { id: 'u-1' });

    await expect(
      approvals.consumeApproval('user.delete', approval.operationId, { id: 'u-1' }),
    ).rejects.toMatchObject({ code: 'APPROVAL_ALREADY_USED' });
    await expect(
      approvals.consumeApproval('user.delete', 'missing-operation', { id: 'u-1' }),
    ).rejects.toMatchObject({ code: 'APPROVAL_NOT_FOUND' });
  });

  // ── Tokens ─────────────────────────────────────────────────────────────────

  it('keeps revoked refresh tokens blacklisted across connections', async () => {
    const user = await createUser(harness.services);
    const tokens = await harness.services.tokens.issue(user);
    await harness.services.tokens.revoke(tokens.refresh);
    harness.services.close();

    harness.services = harness.reopen();

    await expect(harness.services.tokens.refreshAccess(tokens.refresh)).rejects.toMatchObject({
      code: 'TOKEN_REVOKED',
      statusCode: 401,
    });
  });

  it('authenticates access tokens into an identity', async () => {
    const { services } = harness;
    const user = await createUser(services);
    const tokens = await services.tokens.issue(user);

    expect(await services.tokens.authenticate(tokens.access)).toEqual({
      userId: user.id,
      email: 'ana@example.com',
      isStaff: false,
      isSuperuser: false,
    });
  });

  it('rejects tokens signed with another secret', async () => {
    const { services } = harness;
    const user = await createUser(services);
    const foreign = createDomainServices({
      dbPath: harness.dbPath,
      auth: { jwtSecret: 'another-test-secret-456' },
    });

    try {
      const tokens = await foreign.tokens.issue(user);
      await expect(services.tokens.authenticate(tokens.access)).rejects.toMatchObject({
        code: 'TOKEN_INVALID',
      });
    } finally {
      foreign.close();
    }
  });

  it('flushes outstanding and blacklisted tokens past their expiry', async () => {
    const { services } = harness;
    const user = await createUser(services);
    const expired = await services.tokens.issue(user);
    await services.tokens.revoke(expired.refresh);

    harness.setNow('2024-06-16T12:00:01.000Z');
    await services.tokens.issue(user);

    expect(await services.tokens.flushExpired()).toEqual({
      outstandingDeleted: 1,
      blacklistDeleted: 1,
    });
    expect(await services.tokens.flushExpired()).toEqual({
      outstandingDeleted: 0,
      blacklistDeleted: 0,
    });
  });
});
