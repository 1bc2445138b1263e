import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';

export type ErrorResponse = {
  error: {
    code: string;
    message: string;
  };
};

export class AppError extends Error {
  constructor(
    public readonly status: ContentfulStatusCode,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

// Fatal for a run: raised before any target is evaluated.
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function errorBody(code: string, message: string): ErrorResponse {
  return { error: { code, message } };
}

export function handleError(err: unknown, c: Context): Response {
  if (err instanceof AppError) {
    return c.json(errorBody(err.code, err.message), err.status);
  }

  if (err instanceof ZodError) {
    const message = err.issues[0]?.message ?? err.message;
    return c.json(errorBody('INVALID_ARGUMENT', message), 400);
  }

  console.error('unhandled error', err);
  return c.json(errorBody('INTERNAL', 'Internal Server Error'), 500);
}

export function handleNotFound(c: Context): Response {
  return c.json(errorBody('NOT_FOUND', 'Not Found'), 404);
}
