import type { FastifyInstance } from 'fastify';

import { ok } from '@coinpurse/contracts';

export const registerSystemRoutes = (app: FastifyInstance): void => {
  const { errorEnvelopeSchema, successEnvelopeSchema } = app.coinpurse.docs;

  app.get(
    '/health',
    {
      schema: {
        tags: ['System'],
        summary: 'Health check',
        response: {
          200: successEnvelopeSchema({
            type: 'object',
            additionalProperties: false,
            required: ['status'],
            properties: {
              status: { type: 'string', enum: ['ok'] },
            },
          }),
          500: errorEnvelopeSchema,
        },
      },
    },
    async () => ok({ status: 'ok' }),
  );
};
