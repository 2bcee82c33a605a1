export class AppError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 400, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export type FieldErrors = Record<string, string[]>;

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const validationError = (fields: FieldErrors, message = 'Invalid request data'): AppError =>
  new AppError('VALIDATION_ERROR', message, 400, { fields });

export const fieldError = (field: string, message: string): AppError =>
  validationError({ [field]: [message] });

export const notFoundError = (resource: string): AppError =>
  new AppError('NOT_FOUND', `${resource} not found`, 404);

export const authenticationError = (
  message = 'Authentication credentials were not provided or are invalid',
  code = 'AUTHENTICATION_FAILED',
): AppError => new AppError(code, message, 401);

export const accountDisabledError = (): AppError =>
  new AppError('ACCOUNT_DISABLED', 'This account is disabled', 403);
