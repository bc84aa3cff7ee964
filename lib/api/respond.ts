import { NextResponse } from 'next/server';
import { z } from 'zod';
import { isOptionAnalyticsError, type OptionAnalyticsErrorKind } from '@/lib/finance/errors';

type ErrorKind = OptionAnalyticsErrorKind | 'InternalError';

export type ErrorResponseBody = {
  error: {
    kind: ErrorKind;
    message: string;
    details?: unknown;
  };
};

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  ValidationError: 400,
  InvalidQuoteError: 422,
  ConvergenceError: 422,
  DataUnavailableError: 503,
  InternalError: 500,
};

const errorBody = (error: unknown): ErrorResponseBody['error'] => {
  if (error instanceof z.ZodError) {
    return { kind: 'ValidationError', message: 'Invalid payload', details: error.flatten() };
  }
  // Request.json() rejects malformed bodies with a SyntaxError
  if (error instanceof SyntaxError) {
    return { kind: 'ValidationError', message: 'Request body is not valid JSON' };
  }
  if (isOptionAnalyticsError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return {
    kind: 'InternalError',
    message: error instanceof Error && error.message ? error.message : 'Internal Server Error',
  };
};

export const errorResponse = (error: unknown) => {
  const body = errorBody(error);
  return NextResponse.json<ErrorResponseBody>({ error: body }, { status: STATUS_BY_KIND[body.kind] });
};
