import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { EngineError, ValidationError, type EngineErrorCode } from '../lib/errors.js';
import logger from '../lib/logger.js';

const STATUS_BY_CODE: Record<EngineErrorCode, ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  UNKNOWN_ROLE: 404,
  SESSION_CONFLICT: 409,
  INTERVIEW_STATE: 409,
  CAPABILITY_TIMEOUT: 503,
  CAPABILITY_RESPONSE: 503,
  GRAPH_ERROR: 500,
};

export function statusForError(err: unknown): ContentfulStatusCode {
  return err instanceof EngineError ? STATUS_BY_CODE[err.code] : 500;
}

/** `app.onError` handler: engine errors map to their status, anything else is a logged 500. */
export function errorHandler(err: Error, c: Context) {
  const requestId = c.get('requestId');
  const status = statusForError(err);

  if (status >= 500) {
    logger.error({ err, requestId, path: c.req.path, method: c.req.method }, 'Request failed');
  } else {
    logger.info({ requestId, path: c.req.path, code: err instanceof EngineError ? err.code : undefined }, err.message);
  }

  if (err instanceof EngineError && status < 500) {
    return c.json({
      error: err.message,
      code: err.code,
      ...(err instanceof ValidationError && err.issues.length > 0 && { details: err.issues }),
      request_id: requestId,
    }, status);
  }
  if (err instanceof EngineError && (err.code === 'CAPABILITY_TIMEOUT' || err.code === 'CAPABILITY_RESPONSE')) {
    return c.json({ error: 'Analysis service unavailable. Please retry shortly.', code: err.code, request_id: requestId }, status);
  }
  return c.json({ error: 'Internal server error', request_id: requestId }, 500);
}
