import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import {
  type ClosableDomainServices,
  type DomainServices,
  type Identity,
  authenticationError,
} from '@coinpurse/domain';

import { type ApiDocs, apiDocs } from './api-docs.js';

export interface Actor {
  actor: string;
  channel: 'api';
}

export type ActorRequest = Pick<FastifyRequest, 'ip' | 'identity'>;

export interface CoinpurseContext {
  services: DomainServices;
  actorFromRequest: (request: ActorRequest) => Actor;
  /** `onRequest` hook that resolves the bearer access token into `request.identity`. */
  authenticate: (request: FastifyRequest) => Promise<void>;
  identityOf: (request: FastifyRequest) => Identity;
  docs: ApiDocs;
}

export interface CoinpursePluginOptions {
  services?: DomainServices;
  docs?: ApiDocs;
  createServices?: () => ClosableDomainServices;
}

const actorFromRequest = (request: ActorRequest): Actor => {
  if (request.identity) {
    return { actor: request.identity.userId, channel: 'api' };
  }

  return {
    actor: request.ip,
    channel: 'api',
  };
};

const bearerTokenOf = (request: FastifyRequest): string | null => {
  const header = request.headers.authorization;
  if (!header) {
    return null;
  }

  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (scheme?.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    return null;
  }
  return token;
};

const identityOf = (request: FastifyRequest): Identity => {
  if (!request.identity) {
    throw authenticationError('Authentication credentials were not provided.');
  }
  return request.identity;
};

declare module 'fastify' {
  interface FastifyInstance {
    coinpurse: CoinpurseContext;
  }

  interface FastifyRequest {
    identity: Identity | null;
  }
}

const plugin: FastifyPluginAsync<CoinpursePluginOptions> = async (app, options) => {
  let ownedServices: ClosableDomainServices | null = null;
  const services = (() => {
    if (options.services) {
      return options.services;
    }
    if (!options.createServices) {
      throw new Error('coinpursePlugin needs either services or createServices');
    }

    ownedServices = options.createServices();
    return ownedServices;
  })();

  const authenticate = async (request: FastifyRequest): Promise<void> => {
    const token = bearerTokenOf(request);
    if (!token) {
      throw authenticationError('Authentication credentials were not provided.');
    }

    request.identity = await services.tokens.authenticate(token);
  };

  app.decorateRequest('identity', null);
  app.decorate('coinpurse', {
    services,
    actorFromRequest,
    authenticate,
    identityOf,
    docs: options.docs ?? apiDocs,
  });

  app.addHook('onClose', async () => {
    ownedServices?.close();
  });
};

/** Decorates the root instance so every feature scope sees `app.coinpurse`. */
export const coinpursePlugin = fp(plugin, { name: 'coinpurse', fastify: '5.x' });

export default coinpursePlugin;
