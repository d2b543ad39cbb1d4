import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import { runWithRequestId } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

export const REQUEST_ID_HEADER = 'X-Request-ID';
const MAX_REQUEST_ID_LENGTH = 64;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Keeps a caller's id when it is short and header-safe; otherwise mints one. */
export function resolveRequestId(raw: string | undefined, generate: () => string = randomUUID): string {
  const candidate = raw?.trim().slice(0, MAX_REQUEST_ID_LENGTH);
  return candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : generate();
}

/**
 * Tags the request with an id, echoes it back, and runs the rest of the chain
 * inside the logger's request scope so learner loggers pick the id up.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
  c.set('requestId', requestId);
  c.header(REQUEST_ID_HEADER, requestId);
  await runWithRequestId(requestId, next);
}
