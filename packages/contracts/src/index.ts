import { z } from 'zod';

export const EXPENSE_CATEGORIES = [
  'GROCERIES',
  'LEISURE',
  'ELECTRONICS',
  'UTILITIES',
  'CLOTHING',
  'HEALTH',
  'OTHERS',
] as const;

export const expenseCategorySchema = z.enum(EXPENSE_CATEGORIES);

export type ExpenseCategory = z.infer<typeof expenseCategorySchema>;

export const EXPENSE_CATEGORY_LABELS: Readonly<Record<ExpenseCategory, string>> = {
  GROCERIES: 'Groceries',
  LEISURE: 'Leisure',
  ELECTRONICS: 'Electronics',
  UTILITIES: 'Utilities',
  CLOTHING: 'Clothing',
  HEALTH: 'Health',
  OTHERS: 'Others',
};

export const categoryLabel = (category: ExpenseCategory): string =>
  EXPENSE_CATEGORY_LABELS[category];

export const PERIOD_SHORTHANDS = ['week', 'month', '3months'] as const;

export const periodShorthandSchema = z.enum(PERIOD_SHORTHANDS);

export type PeriodShorthand = z.infer<typeof periodShorthandSchema>;

export const EXPENSE_ORDERING_FIELDS = ['date', 'amount', 'created_at'] as const;

export type ExpenseOrderingField = (typeof EXPENSE_ORDERING_FIELDS)[number];

export const tokenTypeSchema = z.enum(['access', 'refresh']);

export type TokenType = z.infer<typeof tokenTypeSchema>;

/** Claims carried by every session token after signature verification. */
export const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  type: tokenTypeSchema,
  iat: z.number().int(),
  exp: z.number().int(),
});

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;

export const createSuperuserInputSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
  firstName: z.string().trim().min(1).max(150),
  lastName: z.string().trim().min(1).max(150),
});

export type CreateSuperuserCliInput = z.infer<typeof createSuperuserInputSchema>;

export const responseMetaSchema = z.record(z.string(), z.unknown()).default({});

export const successEnvelopeSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    ok: z.literal(true),
    data: dataSchema,
    meta: responseMetaSchema,
  });

export const errorEnvelopeSchema = z.object({
  ok: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.string(), z.unknown()).optional(),
  }),
});

export interface SuccessEnvelope<T> {
  ok: true;
  data: T;
  meta: Record<string, unknown>;
}

export interface ErrorEnvelope {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Envelope<T> = SuccessEnvelope<T> | ErrorEnvelope;

export const ok = <T>(data: T, meta: Record<string, unknown> = {}): SuccessEnvelope<T> => ({
  ok: true,
  data,
  meta,
});

export const fail = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope => ({
  ok: false,
  error: {
    code,
    message,
    ...(details ? { details } : {}),
  },
});
