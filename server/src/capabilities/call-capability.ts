import { CapabilityTimeoutError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { withRetry } from '../lib/retry.js';

export interface CapabilityCallOptions {
  timeout_ms: number;
  max_attempts: number;
  base_delay_ms: number;
}

async function withTimeout<T>(
  capability: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CapabilityTimeoutError(capability, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
    timer.unref?.();
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs one external capability call with a bounded timeout and bounded retry.
 * After the last attempt a timeout surfaces as CapabilityTimeoutError so the
 * caller can tell "service unavailable" apart from "nothing found".
 */
export async function callCapability<T>(
  capability: string,
  fn: (signal: AbortSignal) => Promise<T>,
  options: CapabilityCallOptions,
): Promise<T> {
  return withRetry(
    () => withTimeout(capability, options.timeout_ms, fn),
    {
      maxAttempts: options.max_attempts,
      baseDelay: options.base_delay_ms,
      onRetry: (attempt, error) => {
        logger.warn({ capability, attempt, error: error.message }, 'Capability call failed, retrying');
      },
    },
  );
}
