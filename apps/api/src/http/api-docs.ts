import {
  EXPENSE_CATEGORIES,
  EXPENSE_CATEGORY_LABELS,
  PERIOD_SHORTHANDS,
} from '@coinpurse/contracts';

export interface OpenApiTag {
  name: string;
  description: string;
}

export const openApiTags: OpenApiTag[] = [
  { name: 'System', description: 'Runtime health and status endpoints.' },
  { name: 'Auth', description: 'Registration, session tokens and profile endpoints.' },
  { name: 'Expenses', description: 'Owner-scoped expense ledger and statistics.' },
];

export const bearerSecurity = [{ bearerAuth: [] }];

export const uuidSchema = {
  type: 'string',
  format: 'uuid',
} as const;

export const isoDateTimeSchema = {
  type: 'string',
  format: 'date-time',
} as const;

export const isoDateSchema = {
  type: 'string',
  pattern: '^\\d{4}-\\d{2}-\\d{2}$',
} as const;

const nullableStringSchema = {
  type: ['string', 'null'],
} as const;

/** Two-place decimal string such as `"50000.00"`. */
export const moneySchema = {
  type: 'string',
  pattern: '^-?\\d+\\.\\d{2}$',
} as const;

export const categoryCodeSchema = {
  type: 'string',
  enum: [...EXPENSE_CATEGORIES],
} as const;

export const userSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['id', 'email', 'first_name', 'last_name', 'full_name', 'date_joined', 'is_active'],
  properties: {
    id: uuidSchema,
    email: { type: 'string' },
    first_name: { type: 'string' },
    last_name: { type: 'string' },
    full_name: { type: 'string' },
    date_joined: isoDateTimeSchema,
    is_active: { type: 'boolean' },
  },
} as const;

export const tokenPairSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['access', 'refresh'],
  properties: {
    access: { type: 'string' },
    refresh: { type: 'string' },
  },
} as const;

export const expenseSchema = {
  type: 'object',
  additionalProperties: false,
  required: [
    'id',
    'user',
    'user_email',
    'title',
    'amount',
    'category',
    'category_display',
    'description',
    'date',
    'created_at',
    'updated_at',
  ],
  properties: {
    id: uuidSchema,
    user: uuidSchema,
    user_email: { type: 'string' },
    title: { type: 'string' },
    amount: moneySchema,
    category: categoryCodeSchema,
    category_display: { type: 'string' },
    description: nullableStringSchema,
    date: isoDateSchema,
    created_at: isoDateTimeSchema,
    updated_at: isoDateTimeSchema,
  },
} as const;

export const expenseSummarySchema = {
  type: 'object',
  additionalProperties: false,
  required: ['id', 'title', 'amount', 'category', 'category_display', 'date', 'created_at'],
  properties: {
    id: uuidSchema,
    title: { type: 'string' },
    amount: moneySchema,
    category: categoryCodeSchema,
    category_display: { type: 'string' },
    date: isoDateSchema,
    created_at: isoDateTimeSchema,
  },
} as const;

const categoryLabels = Object.values(EXPENSE_CATEGORY_LABELS);

export const expenseStatsSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['count', 'total_amount', 'average_amount', 'by_category'],
  properties: {
    count: { type: 'integer', minimum: 0 },
    total_amount: moneySchema,
    average_amount: moneySchema,
    by_category: {
      type: 'object',
      additionalProperties: false,
      required: categoryLabels,
      properties: Object.fromEntries(categoryLabels.map((label) => [label, moneySchema])),
    },
  },
} as const;

/** Accepts JSON numbers and decimal strings; both reach the domain as text. */
export const amountInputSchema = {
  anyOf: [{ type: 'string' }, { type: 'number' }],
} as const;

export const expenseBodyProperties = {
  title: { type: 'string' },
  amount: amountInputSchema,
  category: { type: 'string', description: `One of ${EXPENSE_CATEGORIES.join(', ')}` },
  description: nullableStringSchema,
  date: { type: 'string', description: 'Calendar date, YYYY-MM-DD' },
} as const;

export const expenseListQuerySchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    category: categoryCodeSchema,
    start_date: { type: 'string' },
    end_date: { type: 'string' },
    min_amount: { type: 'number' },
    max_amount: { type: 'number' },
    period: {
      type: 'string',
      description: `Relative window: ${PERIOD_SHORTHANDS.join(', ')}; other values are ignored`,
    },
    search: { type: 'string' },
    ordering: {
      type: 'string',
      description: 'Comma-separated date, amount, created_at; prefix with - for descending',
    },
    page: { type: 'integer', minimum: 1 },
  },
} as const;

export const successEnvelopeSchema = (
  dataSchema: Record<string, unknown>,
): Record<string, unknown> => ({
  type: 'object',
  additionalProperties: false,
  required: ['ok', 'data', 'meta'],
  properties: {
    ok: { type: 'boolean', const: true },
    data: dataSchema,
    meta: {
      type: 'object',
      additionalProperties: true,
    },
  },
});

export const errorEnvelopeSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['ok', 'error'],
  properties: {
    ok: { type: 'boolean', const: false },
    error: {
      type: 'object',
      additionalProperties: false,
      required: ['code', 'message'],
      properties: {
        code: { type: 'string' },
        message: { type: 'string' },
        details: {
          type: 'object',
          additionalProperties: true,
        },
      },
    },
  },
} as const;

export const defaultErrorResponses = {
  400: errorEnvelopeSchema,
  404: errorEnvelopeSchema,
  500: errorEnvelopeSchema,
} as const;

export const authenticatedErrorResponses = {
  ...defaultErrorResponses,
  401: errorEnvelopeSchema,
  403: errorEnvelopeSchema,
} as const;

export const idParamsSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['id'],
  properties: {
    id: uuidSchema,
  },
} as const;

export const emptyResponseSchema = {
  type: 'null',
  description: 'No content',
} as const;

export interface ApiDocs {
  bearerSecurity: typeof bearerSecurity;
  userSchema: typeof userSchema;
  tokenPairSchema: typeof tokenPairSchema;
  expenseSchema: typeof expenseSchema;
  expenseSummarySchema: typeof expenseSummarySchema;
  expenseStatsSchema: typeof expenseStatsSchema;
  expenseBodyProperties: typeof expenseBodyProperties;
  expenseListQuerySchema: typeof expenseListQuerySchema;
  successEnvelopeSchema: typeof successEnvelopeSchema;
  errorEnvelopeSchema: typeof errorEnvelopeSchema;
  defaultErrorResponses: typeof defaultErrorResponses;
  authenticatedErrorResponses: typeof authenticatedErrorResponses;
  idParamsSchema: typeof idParamsSchema;
  emptyResponseSchema: typeof emptyResponseSchema;
}

export const apiDocs: ApiDocs = {
  bearerSecurity,
  userSchema,
  tokenPairSchema,
  expenseSchema,
  expenseSummarySchema,
  expenseStatsSchema,
  expenseBodyProperties,
  expenseListQuerySchema,
  successEnvelopeSchema,
  errorEnvelopeSchema,
  defaultErrorResponses,
  authenticatedErrorResponses,
  idParamsSchema,
  emptyResponseSchema,
};
