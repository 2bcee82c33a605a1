import {
  TEST_PASSWORD,
  TODAY,
  type TestApi,
  bearer,
  createTestApi,
  registerUser,
} from './harness.js';

describe('Auth API', () => {
  let api: TestApi;

  beforeEach(() => {
    api = createTestApi();
  });

  afterEach(async () => {
    await api.cleanup();
  });

  // ── Registration ───────────────────────────────────────────────────────────

  it('registers a user and returns the profile with a token pair', async () => {
    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/register',
      payload: {
        email: 'Ana@Example.COM',
        password: TEST_PASSWORD,
        password2: TEST_PASSWORD,
        first_name: 'Ana',
        last_name: 'Lopez',
      },
    });
    const body = response.json();

    expect(response.statusCode).toBe(201);
    expect(body.ok).toBe(true);
    expect(body.data.user).toEqual({
      id: expect.any(String),
      email: 'Ana@example.com',
      first_name: 'Ana',
      last_name: 'Lopez',
      full_name: 'Ana Lopez',
      date_joined: `${TODAY}T12:00:00.000Z`,
      is_active: true,
    });
    expect(typeof body.data.tokens.access).toBe('string');
    expect(typeof body.data.tokens.refresh).toBe('string');
    expect(await api.services.audit.countByAction('user.register')).toBe(1);
  });

  it('rejects mismatched passwords without storing the user', async () => {
    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/register',
      payload: {
        email: 'ana@example.com',
        password: TEST_PASSWORD,
        password2: 'Different-Passw0rd',
        first_name: 'Ana',
        last_name: 'Lopez',
      },
    });
    const body = response.json();

    expect(response.statusCode).toBe(400);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details.fields).toEqual({ password: ["Password fields didn't match."] });
    expect(await api.services.users.findByEmail('ana@example.com')).toBeNull();
  });

  it('rejects a common password', async () => {
    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/register',
      payload: {
        email: 'ana@example.com',
        password: 'password',
        password2: 'password',
        first_name: 'Ana',
        last_name: 'Lopez',
      },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.details.fields).toEqual({
      password: ['This password is too common.'],
    });
  });

  it('rejects a duplicate email', async () => {
    await registerUser(api.app);

    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/register',
      payload: {
        email: 'ana@example.com',
        password: TEST_PASSWORD,
        password2: TEST_PASSWORD,
        first_name: 'Ana',
        last_name: 'Other',
      },
    });
    const body = response.json();

    expect(response.statusCode).toBe(400);
    expect(body.error.code).toBe('EMAIL_TAKEN');
    expect(body.error.details.fields).toEqual({
      email: ['A user with this email already exists.'],
    });
  });

  it('treats emails differing only in domain case as the same account', async () => {
    await registerUser(api.app);

    const duplicate = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/register',
      payload: {
        email: 'ana@EXAMPLE.com',
        password: TEST_PASSWORD,
        password2: TEST_PASSWORD,
        first_name: 'Ana',
        last_name: 'Other',
      },
    });
    expect(duplicate.statusCode).toBe(400);
    expect(duplicate.json().error.code).toBe('EMAIL_TAKEN');

    const login = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/login',
      payload: { email: 'ana@Example.COM', password: TEST_PASSWORD },
    });
    expect(login.statusCode).toBe(200);
    expect(login.json().data.user.email).toBe('ana@example.com');
  });

  it('audits registration under the client address, ignoring x-actor', async () => {
    const writeAudit = vi.spyOn(api.services.audit, 'writeAudit');

    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/register',
      headers: { 'x-actor': 'someone-else' },
      payload: {
        email: 'ana@example.com',
        password: TEST_PASSWORD,
        password2: TEST_PASSWORD,
        first_name: 'Ana',
        last_name: 'Lopez',
      },
    });

    expect(response.statusCode).toBe(201);
    expect(writeAudit).toHaveBeenCalledWith('user.register', expect.anything(), {
      actor: '127.0.0.1',
      channel: 'api',
    });
    writeAudit.mockRestore();
  });

  it('reports missing body fields through the validation envelope', async () => {
    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/register',
      payload: {
        email: 'ana@example.com',
        password: TEST_PASSWORD,
        first_name: 'Ana',
        last_name: 'Lopez',
      },
    });
    const body = response.json();

    expect(response.statusCode).toBe(400);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.message).toBe('Request validation failed');
    expect(body.error.details.context).toBe('body');
    expect(body.error.details.fields).toEqual({ password2: ['This field is required.'] });
  });

  // ── Login ──────────────────────────────────────────────────────────────────

  it('logs in with valid credentials', async () => {
    await registerUser(api.app);

    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/login',
      payload: { email: 'ana@example.com', password: TEST_PASSWORD },
    });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.data.user.email).toBe('ana@example.com');
    expect(typeof body.data.tokens.refresh).toBe('string');
  });

  it('answers 401 for a wrong password', async () => {
    await registerUser(api.app);

    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/login',
      payload: { email: 'ana@example.com', password: 'Wrong-Passw0rd' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toEqual({
      code: 'INVALID_CREDENTIALS',
      message: 'No active account found with the given credentials',
    });
  });

  it('answers 403 for an inactive account with the correct password', async () => {
    const session = await registerUser(api.app);
    await api.services.users.setActive(session.userId, false);

    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/login',
      payload: { email: 'ana@example.com', password: TEST_PASSWORD },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json().error.code).toBe('ACCOUNT_DISABLED');
  });

  // ── Tokens ─────────────────────────────────────────────────────────────────

  it('mints a working access token from a refresh token', async () => {
    const session = await registerUser(api.app);

    const refreshResponse = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/token/refresh',
      payload: { refresh: session.refresh },
    });
    const access = refreshResponse.json().data.access;

    expect(refreshResponse.statusCode).toBe(200);
    expect(Object.keys(refreshResponse.json().data)).toEqual(['access']);

    const me = await api.app.inject({
      method: 'GET',
      url: '/v1/auth/me',
      headers: { authorization: `Bearer ${access}` },
    });
    expect(me.statusCode).toBe(200);
    expect(me.json().data.id).toBe(session.userId);
  });

  it('expires access tokens but keeps the refresh token usable', async () => {
    const session = await registerUser(api.app);
    api.setNow(`${TODAY}T12:05:01.000Z`);

    const me = await api.app.inject({
      method: 'GET',
      url: '/v1/auth/me',
      headers: bearer(session),
    });
    expect(me.statusCode).toBe(401);
    expect(me.json().error.code).toBe('TOKEN_INVALID');

    const refreshed = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/token/refresh',
      payload: { refresh: session.refresh },
    });
    expect(refreshed.statusCode).toBe(200);
  });

  it('does not accept a refresh token as a bearer credential', async () => {
    const session = await registerUser(api.app);

    const response = await api.app.inject({
      method: 'GET',
      url: '/v1/auth/me',
      headers: { authorization: `Bearer ${session.refresh}` },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.code).toBe('TOKEN_INVALID');
  });

  it('rejects refresh for a deactivated user', async () => {
    const session = await registerUser(api.app);
    await api.services.users.setActive(session.userId, false);

    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/token/refresh',
      payload: { refresh: session.refresh },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.message).toBe('User not found or inactive');
  });

  // ── Logout ─────────────────────────────────────────────────────────────────

  it('blacklists the refresh token on logout', async () => {
    const session = await registerUser(api.app);

    const logout = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/logout',
      headers: bearer(session),
      payload: { refresh: session.refresh },
    });
    expect(logout.statusCode).toBe(205);
    expect(logout.body).toBe('');

    const refresh = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/token/refresh',
      payload: { refresh: session.refresh },
    });
    expect(refresh.statusCode).toBe(401);
    expect(refresh.json().error.code).toBe('TOKEN_REVOKED');

    const again = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/logout',
      headers: bearer(session),
      payload: { refresh: session.refresh },
    });
    expect(again.statusCode).toBe(400);
    expect(again.json().error.code).toBe('TOKEN_REVOKED');
    expect(await api.services.audit.countByAction('user.logout')).toBe(1);
  });

  it('requires authentication for logout', async () => {
    const session = await registerUser(api.app);

    const response = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/logout',
      payload: { refresh: session.refresh },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toEqual({
      code: 'AUTHENTICATION_FAILED',
      message: 'Authentication credentials were not provided.',
    });
  });

  it('answers 400 for a missing, malformed or foreign refresh token on logout', async () => {
    const ana = await registerUser(api.app);
    const ben = await registerUser(api.app, {
      email: 'ben@example.com',
      first_name: 'Ben',
      last_name: 'Ortiz',
    });

    const missing = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/logout',
      headers: bearer(ana),
      payload: {},
    });
    expect(missing.statusCode).toBe(400);
    expect(missing.json().error.code).toBe('VALIDATION_ERROR');

    const malformed = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/logout',
      headers: bearer(ana),
      payload: { refresh: 'not-a-token' },
    });
    expect(malformed.statusCode).toBe(400);
    expect(malformed.json().error.code).toBe('TOKEN_INVALID');

    const foreign = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/logout',
      headers: bearer(ana),
      payload: { refresh: ben.refresh },
    });
    expect(foreign.statusCode).toBe(400);
    expect(foreign.json().error.code).toBe('TOKEN_INVALID');
  });

  // ── Profile ────────────────────────────────────────────────────────────────

  it('updates the profile with PUT and PATCH', async () => {
    const session = await registerUser(api.app);

    const put = await api.app.inject({
      method: 'PUT',
      url: '/v1/auth/me',
      headers: bearer(session),
      payload: { first_name: 'Anna', last_name: 'Lopes' },
    });
    expect(put.statusCode).toBe(200);
    expect(put.json().data.full_name).toBe('Anna Lopes');

    const incompletePut = await api.app.inject({
      method: 'PUT',
      url: '/v1/auth/me',
      headers: bearer(session),
      payload: { first_name: 'Anna' },
    });
    expect(incompletePut.statusCode).toBe(400);
    expect(incompletePut.json().error.details.fields).toEqual({
      last_name: ['This field is required.'],
    });

    const patch = await api.app.inject({
      method: 'PATCH',
      url: '/v1/auth/me',
      headers: bearer(session),
      payload: { last_name: 'Lopez' },
    });
    expect(patch.statusCode).toBe(200);
    expect(patch.json().data).toMatchObject({ first_name: 'Anna', last_name: 'Lopez' });
  });

  it('does not let a profile update change the email', async () => {
    const session = await registerUser(api.app);

    const response = await api.app.inject({
      method: 'PATCH',
      url: '/v1/auth/me',
      headers: bearer(session),
      payload: { email: 'other@example.com', first_name: 'Anna' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().data.email).toBe('ana@example.com');
  });

  // ── Password change ────────────────────────────────────────────────────────

  it('changes the password after checking the old one', async () => {
    const session = await registerUser(api.app);

    const wrongOld = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/change-password',
      headers: bearer(session),
      payload: {
        old_password: 'Wrong-Passw0rd',
        new_password: 'Fresher-Passw0rd',
        new_password2: 'Fresher-Passw0rd',
      },
    });
    expect(wrongOld.statusCode).toBe(400);
    expect(wrongOld.json().error.details.fields).toEqual({
      old_password: ['Your old password was entered incorrectly. Please enter it again.'],
    });

    const mismatch = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/change-password',
      headers: bearer(session),
      payload: {
        old_password: TEST_PASSWORD,
        new_password: 'Fresher-Passw0rd',
        new_password2: 'Other-Passw0rd',
      },
    });
    expect(mismatch.statusCode).toBe(400);
    expect(mismatch.json().error.details.fields).toEqual({
      new_password: ["The two password fields didn't match."],
    });

    const changed = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/change-password',
      headers: bearer(session),
      payload: {
        old_password: TEST_PASSWORD,
        new_password: 'Fresher-Passw0rd',
        new_password2: 'Fresher-Passw0rd',
      },
    });
    expect(changed.statusCode).toBe(200);

    const login = await api.app.inject({
      method: 'POST',
      url: '/v1/auth/login',
      payload: { email: 'ana@example.com', password: 'Fresher-Passw0rd' },
    });
    expect(login.statusCode).toBe(200);
  });

  it('requires authentication for the profile', async () => {
    const response = await api.app.inject({ method: 'GET', url: '/v1/auth/me' });

    expect(response.statusCode).toBe(401);
  });
});
