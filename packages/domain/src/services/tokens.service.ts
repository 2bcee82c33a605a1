import crypto from 'node:crypto';

import jwt, { type JwtPayload } from 'jsonwebtoken';

import { type TokenClaims, type TokenType, tokenClaimsSchema } from '@coinpurse/contracts';

import { AppError, authenticationError } from '../errors.js';
import {
  type FlushExpiredOutput,
  SqliteTokensRepository,
} from '../repositories/tokens.repository.js';
import { SqliteUsersRepository } from '../repositories/users.repository.js';
import type { Identity } from '../types.js';
import { toIso } from './shared/common.js';
import type { DomainDbRuntime } from './shared/domain-db.js';

export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 5 * 60;
export const DEFAULT_REFRESH_TOKEN_TTL_SECONDS = 24 * 60 * 60;

export interface TokenSettings {
  jwtSecret?: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

export interface TokensService {
  issue: (user: { id: string }) => Promise<TokenPair>;
  refreshAccess: (refreshToken: string) => Promise<string>;
  /**
   * Blacklists a refresh token. When `ownerId` is given the token must have been
   * issued to that user. Failures are client errors (400), not authentication errors.
   */
  revoke: (refreshToken: string, ownerId?: string) => Promise<void>;
  authenticate: (accessToken: string) => Promise<Identity>;
  flushExpired: () => Promise<FlushExpiredOutput>;
}

interface TokenServiceDeps {
  runtime: DomainDbRuntime;
  settings: TokenSettings;
}

const JWT_ALGORITHM = 'HS256';

const invalidToken = (statusCode = 401) =>
  new AppError('TOKEN_INVALID', 'Token is invalid or expired', statusCode);

const revokedToken = (statusCode = 401) =>
  new AppError('TOKEN_REVOKED', 'Token is blacklisted', statusCode);

export const createTokensService = ({ runtime, settings }: TokenServiceDeps): TokensService => {
  const tokensRepo = () => new SqliteTokensRepository(runtime.db);
  const usersRepo = () => new SqliteUsersRepository(runtime.db);

  const secret = (): string => {
    if (!settings.jwtSecret) {
      throw new Error('JWT secret is not configured');
    }
    return settings.jwtSecret;
  };

  const nowSeconds = (): number => Math.floor(runtime.now().getTime() / 1000);

  const sign = (
    userId: string,
    type: TokenType,
    ttlSeconds: number,
  ): TokenClaims & { token: string } => {
    const iat = nowSeconds();
    const claims: TokenClaims = {
      sub: userId,
      jti: crypto.randomUUID(),
      type,
      iat,
      exp: iat + ttlSeconds,
    };

    return { ...claims, token: jwt.sign(claims, secret(), { algorithm: JWT_ALGORITHM }) };
  };

  const decode = (token: string, type: TokenType, statusCode?: number): TokenClaims => {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, secret(), {
        algorithms: [JWT_ALGORITHM],
        clockTimestamp: nowSeconds(),
      });
    } catch {
      throw invalidToken(statusCode);
    }

    const parsed = tokenClaimsSchema.safeParse(decoded);
    if (!parsed.success || parsed.data.type !== type) {
      throw invalidToken(statusCode);
    }
    return parsed.data;
  };

  const activeIdentity = (userId: string): Identity => {
    const found = usersRepo().findById(userId);
    if (!found || !found.user.isActive) {
      throw authenticationError('User not found or inactive');
    }

    return {
      userId: found.user.id,
      email: found.user.email,
      isStaff: found.user.isStaff,
      isSuperuser: found.user.isSuperuser,
    };
  };

  return {
    async issue(user) {
      const access = sign(user.id, 'access', settings.accessTokenTtlSeconds);
      const refresh = sign(user.id, 'refresh', settings.refreshTokenTtlSeconds);

      tokensRepo().recordOutstanding({
        jti: refresh.jti,
        userId: user.id,
        createdAt: toIso(new Date(refresh.iat * 1000)),
        expiresAt: toIso(new Date(refresh.exp * 1000)),
      });

      return { access: access.token, refresh: refresh.token };
    },

    async refreshAccess(refreshToken) {
      const claims = decode(refreshToken, 'refresh');
      if (tokensRepo().isBlacklisted(claims.jti)) {
        throw revokedToken();
      }

      const identity = activeIdentity(claims.sub);
      return sign(identity.userId, 'access', settings.accessTokenTtlSeconds).token;
    },

    async revoke(refreshToken, ownerId) {
      const claims = decode(refreshToken, 'refresh', 400);
      if (ownerId !== undefined && claims.sub !== ownerId) {
        throw new AppError('TOKEN_INVALID', 'Token does not belong to the authenticated user', 400);
      }
      if (!usersRepo().findById(claims.sub)) {
        throw invalidToken(400);
      }

      const repo = tokensRepo();
      if (repo.isBlacklisted(claims.jti)) {
        throw revokedToken(400);
      }

      repo.blacklist({
        jti: claims.jti,
        userId: claims.sub,
        expiresAt: toIso(new Date(claims.exp * 1000)),
        blacklistedAt: toIso(runtime.now()),
      });
    },

    async authenticate(accessToken) {
      const claims = decode(accessToken, 'access');
      return activeIdentity(claims.sub);
    },

    async flushExpired() {
      return tokensRepo().deleteExpired(toIso(runtime.now()));
    },
  };
};
