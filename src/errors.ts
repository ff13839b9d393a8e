/**
 * Error taxonomy.
 * Every error the engine raises on purpose is an AppError with a stable code,
 * so the hosting application can map failures without string matching.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The ontology is missing, corrupt, or references ids it does not define. */
export class GraphIntegrityError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('GRAPH_INTEGRITY', message, details);
  }
}

export interface CompletionErrorOptions {
  /** HTTP status reported by the backend, if any. */
  status?: number;
  rateLimited?: boolean;
  /** Backend hint for how long to wait before retrying. */
  retryAfterMs?: number;
  /** Number of attempts made before giving up. */
  attempts?: number;
  cause?: unknown;
}

/** A text completion call failed (possibly after exhausting retries). */
export class CompletionError extends AppError {
  readonly status?: number;
  readonly rateLimited: boolean;
  readonly retryAfterMs?: number;
  readonly attempts?: number;

  constructor(message: string, options: CompletionErrorOptions = {}) {
    super('COMPLETION_FAILED', message, {
      ...(options.status !== undefined && { status: options.status }),
      ...(options.attempts !== undefined && { attempts: options.attempts }),
    });
    this.status = options.status;
    this.rateLimited = options.rateLimited ?? options.status === 429;
    this.retryAfterMs = options.retryAfterMs;
    this.attempts = options.attempts;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Model output could not be parsed. Always recovered by the caller. */
export class ParseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PARSE_FAILED', message, details);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, details);
  }
}

export class DeadlineExceededError extends AppError {
  constructor(readonly stage: string, readonly timeoutMs: number) {
    super(
      'DEADLINE_EXCEEDED',
      `Analysis exceeded its ${timeoutMs}ms deadline during stage "${stage}"`,
      { stage, timeoutMs }
    );
  }
}

/** Render any thrown value as a single human-readable line. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
