import type { z } from 'zod';

export type EngineErrorCode =
  | 'GRAPH_ERROR'
  | 'UNKNOWN_ROLE'
  | 'SESSION_CONFLICT'
  | 'CAPABILITY_TIMEOUT'
  | 'CAPABILITY_RESPONSE'
  | 'VALIDATION_ERROR'
  | 'INTERVIEW_STATE'
  | 'NOT_FOUND';

/**
 * Base class for every error the engine raises on purpose.
 * `recoverable` tells callers whether retrying with different input can help.
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly recoverable: boolean,
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export type GraphErrorKind =
  | 'INVALID_CONFIG'
  | 'DUPLICATE_SKILL'
  | 'MISSING_PREREQUISITE'
  | 'UNKNOWN_SKILL'
  | 'CYCLE';

/** Malformed skill graph. Raised at load time only. */
export class GraphError extends EngineError {
  constructor(
    message: string,
    public readonly kind: GraphErrorKind,
  ) {
    super(message, 'GRAPH_ERROR', false);
    this.name = 'GraphError';
  }
}

export class UnknownRoleError extends EngineError {
  constructor(public readonly role: string) {
    super(`Role '${role}' has no target mastery entries`, 'UNKNOWN_ROLE', true);
    this.name = 'UnknownRoleError';
  }
}

export class SessionConflictError extends EngineError {
  constructor(
    public readonly learnerId: string,
    public readonly activeSessionId: string,
  ) {
    super(
      `Learner ${learnerId} already has an active interview session (${activeSessionId})`,
      'SESSION_CONFLICT',
      true,
    );
    this.name = 'SessionConflictError';
  }
}

export class CapabilityTimeoutError extends EngineError {
  /** Picked up by withRetry. */
  readonly retryable = true;

  constructor(
    public readonly capability: string,
    public readonly timeoutMs: number,
  ) {
    super(`${capability} did not respond within ${timeoutMs}ms`, 'CAPABILITY_TIMEOUT', true);
    this.name = 'CapabilityTimeoutError';
  }
}

/** A capability answered, but with nothing usable. Worth another attempt. */
export class CapabilityResponseError extends EngineError {
  readonly retryable = true;

  constructor(
    public readonly capability: string,
    detail: string,
  ) {
    super(`${capability} returned ${detail}`, 'CAPABILITY_RESPONSE', true);
    this.name = 'CapabilityResponseError';
  }
}

export class ValidationError extends EngineError {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = [],
  ) {
    super(message, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
  }

  static fromZod(subject: string, error: z.ZodError): ValidationError {
    const detail = error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return new ValidationError(`Invalid ${subject}: ${detail}`, error.issues);
  }
}

export class InterviewStateError extends EngineError {
  constructor(message: string) {
    super(message, 'INTERVIEW_STATE', true);
    this.name = 'InterviewStateError';
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', true);
    this.name = 'NotFoundError';
  }
}
