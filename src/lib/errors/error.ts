import type { ErrorCodeType } from '@/lib/errors/error-codes';

export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory = 'config' | 'validation' | 'session' | 'transport' | 'protocol' | 'unknown';

export type ErrorDetail = {
  field?: string;
  issue?: string;
  message?: string;
};

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
  details?: ErrorDetail[];
};

/**
 * Thrown inside the client; the public facade converts it back into the `error` field of a call result.
 */
export class ClientError extends Error {
  readonly appError: AppError;

  constructor(appError: AppError) {
    super(appError.message);
    this.name = 'ClientError';
    this.appError = appError;
  }
}

type ErrorInput = {
  code: ErrorCodeType;
  message: string;
  redacted_context?: Record<string, JsonValue>;
  details?: ErrorDetail[];
};

function make(category: ErrorCategory, retryable: boolean, input: ErrorInput): ClientError {
  return new ClientError({
    code: input.code,
    category,
    message: input.message,
    retryable,
    ...(input.redacted_context ? { redacted_context: input.redacted_context } : {}),
    ...(input.details ? { details: input.details } : {}),
  });
}

export function configError(input: ErrorInput): ClientError {
  return make('config', false, input);
}

export function validationError(input: ErrorInput): ClientError {
  return make('validation', false, input);
}

export function sessionError(input: ErrorInput): ClientError {
  return make('session', false, input);
}

export function transportError(input: ErrorInput): ClientError {
  return make('transport', true, input);
}

export function protocolError(input: ErrorInput): ClientError {
  return make('protocol', false, input);
}

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  // Minimal structural check; codes are not validated here.
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof (err as { code: unknown }).code === 'string' &&
    typeof (err as { category: unknown }).category === 'string' &&
    typeof (err as { message: unknown }).message === 'string' &&
    typeof (err as { retryable: unknown }).retryable === 'boolean'
  );
}

export function toAppError(err: unknown): AppError {
  if (err instanceof ClientError) return err.appError;
  if (isAppError(err)) return err;
  return {
    code: 'INTERNAL_ERROR',
    category: 'unknown',
    message: 'Internal error',
    retryable: false,
    redacted_context: { cause: err instanceof Error ? err.message : String(err) },
  };
}
