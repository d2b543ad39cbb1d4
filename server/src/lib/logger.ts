import { AsyncLocalStorage } from 'node:async_hooks';
import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

const requestScope = new AsyncLocalStorage<string>();

/** Runs `fn` with `requestId` attached to every learner logger created inside it. */
export function runWithRequestId<T>(requestId: string, fn: () => T): T {
  return requestScope.run(requestId, fn);
}

/**
 * Creates a child logger scoped to a single learner, tagged with the current
 * request id when called while serving a request.
 */
export function createLearnerLogger(
  learnerId: string,
  extra?: Record<string, unknown>,
) {
  const requestId = requestScope.getStore();
  return logger.child({ learnerId, ...(requestId !== undefined && { requestId }), ...extra });
}

export default logger;
