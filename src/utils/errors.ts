import type { ZodIssue } from 'zod';

/**
 * Stable error kinds surfaced to callers of the engine.
 */
export type ErrorKind =
  | 'ValidationError'
  | 'LoadFailure'
  | 'UnknownOperation'
  | 'InvalidArguments';

/**
 * Base class for all engine errors
 */
export abstract class SloInsightError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A single telemetry row failed validation. The store catches these and
 * turns them into report reasons; they never abort a batch.
 */
export class ValidationError extends SloInsightError {
  readonly kind = 'ValidationError' as const;

  constructor(message: string, public readonly field?: string) {
    super(message, field ? { field } : undefined);
  }
}

/**
 * A whole batch could not be applied; the previous snapshot stays active.
 */
export class LoadFailureError<TReport = unknown> extends SloInsightError {
  readonly kind = 'LoadFailure' as const;

  constructor(message: string, public readonly report: TReport) {
    super(message);
  }
}

export class UnknownOperationError extends SloInsightError {
  readonly kind = 'UnknownOperation' as const;

  constructor(public readonly operation: string, available: readonly string[]) {
    super(`Unknown operation: ${operation}`, { operation, available: [...available] });
  }
}

export class InvalidArgumentsError extends SloInsightError {
  readonly kind = 'InvalidArguments' as const;

  constructor(public readonly operation: string, public readonly issues: ZodIssue[]) {
    super(
      `Invalid arguments for ${operation}: ${issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ')}`,
      { operation, issues: issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) }
    );
  }
}
