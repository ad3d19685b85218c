import { NextRequest, NextResponse } from 'next/server';
import { logger } from './logger';
import { getErrorContext, getErrorMessage, isAppError, toError } from './errors';

export function newRequestId(): string {
  return Math.random().toString(36).slice(2, 11);
}

export function clientIdentifier(req: NextRequest): string {
  return req.headers.get('x-forwarded-for') || req.headers.get('x-real-ip') || 'unknown';
}

export async function readJson(req: NextRequest): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    return undefined;
  }
}

// Operational errors keep their status and message; anything else is a 500 with a generic message.
export function errorResponse(error: unknown, context: { component: string; requestId: string; startTime: number }): NextResponse {
  logger.error('Request failed', {
    component: context.component,
    requestId: context.requestId,
    duration: Date.now() - context.startTime,
    error: getErrorMessage(error),
    details: getErrorContext(error)
  }, toError(error));

  if (isAppError(error) && error.isOperational) {
    return NextResponse.json(
      { ok: false, error: error.message },
      { status: error.statusCode }
    );
  }

  return NextResponse.json(
    { ok: false, error: 'An unexpected error occurred. Please try again.' },
    { status: 500 }
  );
}
