import { NextResponse } from 'next/server';
import type { z, ZodIssue } from 'zod';

import { isSchedulerError } from './errors';
import { apiLog as log } from './logger';

export const USER_ID_HEADER = 'x-user-id';

/** The client sent a body that is not JSON or does not match the route's schema. */
export class RequestBodyError extends Error {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestBodyError';
    this.issues = issues;
  }
}

/** The authenticating layer in front of the service sets the learner id header. */
export function requestUserId(req: Request): string | null {
  const value = req.headers.get(USER_ID_HEADER)?.trim();
  return value ? value : null;
}

export function unauthorized() {
  return NextResponse.json({ ok: false, error: 'Unauthorized' }, { status: 401 });
}

/** Parses the JSON body against `schema`; an empty body is read as `{}`. */
export async function readRequestBody<T extends z.ZodTypeAny>(req: Request, schema: T): Promise<z.output<T>> {
  const text = await req.text();
  let raw: unknown = {};
  if (text.trim() !== '') {
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new RequestBodyError('Request body is not valid JSON.', [], { cause: error });
    }
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RequestBodyError('Invalid request body.', parsed.error.issues);
  }
  return parsed.data;
}

export function errorResponse(error: unknown) {
  if (error instanceof RequestBodyError) {
    const issues = error.issues.length > 0 ? { issues: error.issues } : {};
    return NextResponse.json({ ok: false, error: error.message, ...issues }, { status: 400 });
  }
  if (isSchedulerError(error)) {
    const status = error.code === 'invalid_session_state' ? 409 : 400;
    return NextResponse.json({ ok: false, error: error.message, code: error.code }, { status });
  }
  log.error('Unhandled error in study route', error);
  return NextResponse.json({ ok: false, error: 'Internal error' }, { status: 500 });
}
