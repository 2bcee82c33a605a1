import type { FastifyInstance } from 'fastify';

import { type ExpenseCategory, ok } from '@coinpurse/contracts';
import type { AmountInput, ListExpensesInput } from '@coinpurse/domain';

import {
  serializeExpense,
  serializeExpenseSummary,
  serializeStats,
} from '../../http/serializers.js';

interface ExpenseParams {
  id: string;
}

interface ExpenseListQuery {
  category?: ExpenseCategory;
  start_date?: string;
  end_date?: string;
  min_amount?: number;
  max_amount?: number;
  period?: string;
  search?: string;
  ordering?: string;
  page?: number;
}

interface ExpenseBody {
  title: string;
  amount: AmountInput;
  category: string;
  description?: string | null;
  date: string;
}

const toListInput = (query: ExpenseListQuery): ListExpensesInput => ({
  category: query.category,
  startDate: query.start_date,
  endDate: query.end_date,
  minAmount: query.min_amount,
  maxAmount: query.max_amount,
  period: query.period,
  search: query.search,
  ordering: query.ordering,
  page: query.page,
});

export const registerExpenseRoutes = (app: FastifyInstance): void => {
  const { services, authenticate, identityOf } = app.coinpurse;
  const expensesService = services.expenses;
  const {
    authenticatedErrorResponses,
    bearerSecurity,
    emptyResponseSchema,
    expenseBodyProperties,
    expenseListQuerySchema,
    expenseSchema,
    expenseStatsSchema,
    expenseSummarySchema,
    idParamsSchema,
    successEnvelopeSchema,
  } = app.coinpurse.docs;

  app.addHook('onRequest', authenticate);

  app.get<{ Querystring: ExpenseListQuery }>(
    '',
    {
      schema: {
        tags: ['Expenses'],
        summary: 'List expenses of the current user',
        security: bearerSecurity,
        querystring: expenseListQuerySchema,
        response: {
          200: successEnvelopeSchema({
            type: 'array',
            items: expenseSummarySchema,
          }),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => {
      const page = await expensesService.list(identityOf(request), toListInput(request.query));

      return ok(page.items.map(serializeExpenseSummary), {
        pagination: {
          page: page.page,
          page_size: page.pageSize,
          total: page.total,
          total_pages: page.totalPages,
        },
      });
    },
  );

  app.post<{ Body: ExpenseBody }>(
    '',
    {
      schema: {
        tags: ['Expenses'],
        summary: 'Create expense',
        security: bearerSecurity,
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['title', 'amount', 'category', 'date'],
          properties: expenseBodyProperties,
        },
        response: {
          201: successEnvelopeSchema(expenseSchema),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request, reply) => {
      const expense = await expensesService.create(identityOf(request), request.body);
      return reply.status(201).send(ok(serializeExpense(expense)));
    },
  );

  app.get(
    '/stats',
    {
      schema: {
        tags: ['Expenses'],
        summary: 'Totals of the current user expenses, overall and per category',
        security: bearerSecurity,
        response: {
          200: successEnvelopeSchema(expenseStatsSchema),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => ok(serializeStats(await services.stats.computeStats(identityOf(request)))),
  );

  app.get<{ Params: ExpenseParams }>(
    '/:id',
    {
      schema: {
        tags: ['Expenses'],
        summary: 'Get expense by ID',
        security: bearerSecurity,
        params: idParamsSchema,
        response: {
          200: successEnvelopeSchema(expenseSchema),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => {
      const expense = await expensesService.get(identityOf(request), request.params.id);
      return ok(serializeExpense(expense));
    },
  );

  app.put<{ Params: ExpenseParams; Body: ExpenseBody }>(
    '/:id',
    {
      schema: {
        tags: ['Expenses'],
        summary: 'Replace expense',
        security: bearerSecurity,
        params: idParamsSchema,
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['title', 'amount', 'category', 'date'],
          properties: expenseBodyProperties,
        },
        response: {
          200: successEnvelopeSchema(expenseSchema),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => {
      const expense = await expensesService.replace(
        identityOf(request),
        request.params.id,
        request.body,
      );
      return ok(serializeExpense(expense));
    },
  );

  app.patch<{ Params: ExpenseParams; Body: Partial<ExpenseBody> }>(
    '/:id',
    {
      schema: {
        tags: ['Expenses'],
        summary: 'Update expense',
        security: bearerSecurity,
        params: idParamsSchema,
        body: {
          type: 'object',
          additionalProperties: false,
          properties: expenseBodyProperties,
        },
        response: {
          200: successEnvelopeSchema(expenseSchema),
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request) => {
      const expense = await expensesService.update(
        identityOf(request),
        request.params.id,
        request.body,
      );
      return ok(serializeExpense(expense));
    },
  );

  app.delete<{ Params: ExpenseParams }>(
    '/:id',
    {
      schema: {
        tags: ['Expenses'],
        summary: 'Delete expense',
        security: bearerSecurity,
        params: idParamsSchema,
        response: {
          204: emptyResponseSchema,
          ...authenticatedErrorResponses,
        },
      },
    },
    async (request, reply) => {
      await expensesService.delete(identityOf(request), request.params.id);
      return reply.status(204).send();
    },
  );
};
