import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifySchemaValidationError,
} from 'fastify';

import { fail } from '@coinpurse/contracts';
import {
  type DomainServices,
  type FieldErrors,
  createDomainServices,
  isAppError,
} from '@coinpurse/domain';

import { type ApiRuntimeConfig, loadApiRuntimeConfig, resolveCorsOrigin } from './config.js';
import { openApiTags } from './http/api-docs.js';
import { coinpursePlugin } from './http/coinpurse-plugin.js';
import {
  featureRouteRegistrations,
  registerFeatureRoutes,
} from './http/register-feature-routes.js';

export interface BuildServerOptions {
  config?: ApiRuntimeConfig;
  services?: DomainServices;
}

const issueField = (issue: FastifySchemaValidationError): string => {
  const missing = issue.params.missingProperty;
  if (issue.keyword === 'required' && typeof missing === 'string') {
    return missing;
  }

  const path = issue.instancePath.replace(/^\//, '').replaceAll('/', '.');
  return path || 'non_field_errors';
};

const issueMessage = (issue: FastifySchemaValidationError): string => {
  switch (issue.keyword) {
    case 'required':
      return 'This field is required.';
    case 'enum':
      return 'Select a valid choice.';
    default:
      return issue.message
        ? `${issue.message.charAt(0).toUpperCase()}${issue.message.slice(1)}.`
        : 'Invalid value.';
  }
};

/** Folds schema issues into the same `fields` map the domain validators produce. */
const validationFields = (issues: FastifySchemaValidationError[]): FieldErrors => {
  const fields: FieldErrors = {};
  for (const issue of issues) {
    const field = issueField(issue);
    const message = issueMessage(issue);
    const existing = fields[field] ?? [];
    if (!existing.includes(message)) {
      fields[field] = [...existing, message];
    }
  }
  return fields;
};

const isClientError = (error: FastifyError): boolean =>
  typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500;

export const buildServer = (options: BuildServerOptions = {}): FastifyInstance => {
  const config = options.config ?? loadApiRuntimeConfig();
  const app = Fastify({
    logger: { level: config.logLevel },
    ajv: {
      customOptions: {
        allErrors: true,
        coerceTypes: 'array',
        removeAdditional: true,
      },
    },
  });

  app.register(cors, { origin: resolveCorsOrigin(config.corsAllowedOrigins) });

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Coinpurse API',
        version: '0.1.0',
      },
      tags: openApiTags,
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
      },
    },
  });

  app.register(swaggerUi, {
    routePrefix: '/docs',
  });

  app.register(coinpursePlugin, {
    services: options.services,
    createServices: () =>
      createDomainServices({
        ...(config.dbPath ? { dbPath: config.dbPath } : {}),
        auth: config.auth,
        pageSize: config.pageSize,
      }),
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isAppError(error)) {
      return reply.status(error.statusCode).send(fail(error.code, error.message, error.details));
    }

    if (error.validation) {
      return reply.status(400).send(
        fail('VALIDATION_ERROR', 'Request validation failed', {
          context: error.validationContext ?? 'request',
          issues: error.validation,
          fields: validationFields(error.validation),
        }),
      );
    }

    if (isClientError(error)) {
      return reply.status(error.statusCode ?? 400).send(fail('BAD_REQUEST', error.message));
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send(fail('INTERNAL_ERROR', 'Unexpected internal error'));
  });

  app.setNotFoundHandler((request, reply) =>
    reply
      .status(404)
      .send(fail('NOT_FOUND', `Route ${request.method} ${request.url} not found`)),
  );

  registerFeatureRoutes(app);

  return app;
};

export { featureRouteRegistrations };
export { loadApiRuntimeConfig, resolveCorsOrigin };
export type { ApiRuntimeConfig };
export { coinpursePlugin };
export type { CoinpursePluginOptions } from './http/coinpurse-plugin.js';
