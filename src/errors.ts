/**
 * Error taxonomy for verification runs.
 * Every error carries a stable snake_case code so audit rows and callers can branch without instanceof.
 */

export type VerificationErrorCode =
  | 'ambiguous_index'
  | 'not_found'
  | 'timeout'
  | 'task_failed'
  | 'predicate_evaluation'
  | 'verification_failed';

export class VerificationError extends Error {
  readonly code: VerificationErrorCode;
  constructor(code: VerificationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Two or more entities derived the same index. */
export class AmbiguousIndexError extends VerificationError {
  constructor(readonly index: number, readonly identifiers: string[]) {
    super('ambiguous_index', `more than one entity in index ${index}: ${identifiers.join(' and ')}`);
  }
}

/** Non-fatal: nothing maps to the index (yet). */
export class NotFoundError extends VerificationError {
  constructor(readonly index: number) {
    super('not_found', `no entity in index ${index}`);
  }
}

export class TimeoutError extends VerificationError {
  constructor(readonly elapsedMs: number, readonly pending: string[] = [], options?: { cause?: unknown }) {
    const suffix = pending.length ? ` (pending: ${pending.join(', ')})` : '';
    super('timeout', `timed out after ${Math.round(elapsedMs)}ms${suffix}`, options);
  }
}

/** A definitive failure; the cause of early cancellation when raised inside a supervised task. */
export class TaskFailedError extends VerificationError {
  constructor(readonly label: string, message: string, options?: { cause?: unknown }) {
    super('task_failed', `${label}: ${message}`, options);
  }
}

export class PredicateEvaluationError extends VerificationError {
  constructor(readonly label: string, cause: unknown) {
    super('predicate_evaluation', `${label}: predicate evaluation failed: ${describeCause(cause)}`, { cause });
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
