import type { FastifyInstance } from 'fastify';

import { ok } from '@coinpurse/contracts';

import { serializeUser } from '../../http/serializers.js';

interface RegisterBody {
  email: string;
  password: string;
  password2: string;
  first_name: string;
  last_name: string;
}

interface LoginBody {
  email: string;
  password: string;
}

interface RefreshBody {
  refresh: string;
}

interface ProfileBody {
  first_name?: string;
  last_name?: string;
}

interface ChangePasswordBody {
  old_password: string;
  new_password: string;
  new_password2: string;
}

const refreshBodySchema = {
  type: 'object',
  additionalProperties: false,
  required: ['refresh'],
  properties: {
    refresh: { type: 'string' },
  },
} as const;

const profileProperties = {
  first_name: { type: 'string' },
  last_name: { type: 'string' },
} as const;

export const registerAuthRoutes = (app: FastifyInstance): void => {
  const { services, actorFromRequest, authenticate, identityOf } = app.coinpurse;
  const {
    authenticatedErrorResponses,
    bearerSecurity,
    defaultErrorResponses,
    emptyResponseSchema,
    errorEnvelopeSchema,
    successEnvelopeSchema,
    tokenPairSchema,
    userSchema,
  } = app.coinpurse.docs;

  const sessionSchema = {
    type: 'object',
    additionalProperties: false,
    required: ['user', 'tokens'],
    properties: {
      user: userSchema,
      tokens: tokenPairSchema,
    },
  };

  app.post<{ Body: RegisterBody }>(
    '/register',
    {
      schema: {
        tags: ['Auth'],
        summary: 'Register a new account and start a session',
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['email', 'password', 'password2', 'first_name', 'last_name'],
          properties: {
            email: { type: 'string' },
            password: { type: 'string' },
            password2: { type: 'string' },
            ...profileProperties,
          },
        },
        response: {
          201: successEnvelopeSchema(sessionSchema),
          ...defaultErrorResponses,
        },
      },
    },
    async (request, reply) => {
      const body = request.body;
      const user = await services.users.register(
        {
          email: body.email,
          password: body.password,
          password2: body.password2,
          firstName: body.first_name,
          lastName: body.last_name,
        },
        actorFromRequest(request),
      );
      const tokens = await services.tokens.issue(user);

      request.log.info({ userId: user.id }, 'User registered');
      return reply.status(201).send(ok({ user: serializeUser(user), tokens }));
    },
  );

  app.post<{ Body: LoginBody }>(
    '/login',
    {
      schema: {
        tags: ['Auth'],
        summary: 'Exchange email and password for a token pair',
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['email', 'password'],
          properties: {
            email: { type: 'string' },
            password: { type: 'string' },
          },
        },
        response: {
          200: successEnvelopeSchema(sessionSchema),
          ...defaultErrorResponses,
          401: errorEnvelopeSchema,
          403: errorEnvelopeSchema,
        },
      },
    },
    async (request) => {
      const user = await services.users.login(request.body);
      const tokens = await services.tokens.issue(user);

      request.log.info({ userId: user.id }, 'User logged in');
      return ok({ user: serializeUser(user), tokens });
    },
  );

  app.post<{ Body: RefreshBody }>(
    '/token/refresh',
    {
      schema: {
        tags: ['Auth'],
        summary: 'Mint a new access token from a refresh token',
        body: refreshBodySchema,
        response: {
          200: successEnvelopeSchema({
            type: 'object',
            additionalProperties: false,
            required: ['access'],
            properties: {
              access: { type: 'string' },
            },
          }),
          ...defaultErrorResponses,
          401: errorEnvelopeSchema,
        },
      },
    },
    async (request) => ok({ access: await services.tokens.refreshAccess(request.body.refresh) }),
  );

  app.post<{ Body: RefreshBody }>(
    '/logout',
    {
      onRequest: authenticate,
      schema: {
        tags: ['Auth'],
        summary: 'Revoke a refresh token',
        security: bearerSecurity,
        body: refreshBodySchema,
        response: {
          205: emptyResponseSchema,
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request, reply) => {
      const identity = identityOf(request);
      await services.tokens.revoke(request.body.refresh, identity.userId);
      await services.audit.writeAudit(
        'user.logout',
        { id: identity.userId },
        actorFromRequest(request),
      );

      request.log.info({ userId: identity.userId }, 'User logged out');
      return reply.status(205).send();
    },
  );

  app.get(
    '/me',
    {
      onRequest: authenticate,
      schema: {
        tags: ['Auth'],
        summary: 'Get the current user profile',
        security: bearerSecurity,
        response: {
          200: successEnvelopeSchema(userSchema),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => ok(serializeUser(await services.users.get(identityOf(request).userId))),
  );

  app.put<{ Body: Required<ProfileBody> }>(
    '/me',
    {
      onRequest: authenticate,
      schema: {
        tags: ['Auth'],
        summary: 'Replace the current user profile',
        security: bearerSecurity,
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['first_name', 'last_name'],
          properties: profileProperties,
        },
        response: {
          200: successEnvelopeSchema(userSchema),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => {
      const user = await services.users.updateProfile(identityOf(request).userId, {
        firstName: request.body.first_name,
        lastName: request.body.last_name,
      });
      return ok(serializeUser(user));
    },
  );

  app.patch<{ Body: ProfileBody }>(
    '/me',
    {
      onRequest: authenticate,
      schema: {
        tags: ['Auth'],
        summary: 'Update part of the current user profile',
        security: bearerSecurity,
        body: {
          type: 'object',
          additionalProperties: false,
          properties: profileProperties,
        },
        response: {
          200: successEnvelopeSchema(userSchema),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => {
      const user = await services.users.updateProfile(identityOf(request).userId, {
        firstName: request.body.first_name,
        lastName: request.body.last_name,
      });
      return ok(serializeUser(user));
    },
  );

  app.post<{ Body: ChangePasswordBody }>(
    '/change-password',
    {
      onRequest: authenticate,
      schema: {
        tags: ['Auth'],
        summary: 'Change the current user password',
        security: bearerSecurity,
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['old_password', 'new_password', 'new_password2'],
          properties: {
            old_password: { type: 'string' },
            new_password: { type: 'string' },
            new_password2: { type: 'string' },
          },
        },
        response: {
          200: successEnvelopeSchema({
            type: 'object',
            additionalProperties: false,
            required: ['message'],
            properties: {
              message: { type: 'string' },
            },
          }),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => {
      await services.users.changePassword(
        identityOf(request).userId,
        {
          oldPassword: request.body.old_password,
          newPassword: request.body.new_password,
          newPassword2: request.body.new_password2,
        },
        actorFromRequest(request),
      );
      return ok({ message: 'Password updated successfully.' });
    },
  );
};
