/**
 * Reconciliation Error Types
 */

export type ReconErrorCode =
  | 'SOURCE_COLUMN_MISSING'
  | 'DUPLICATE_ADDRESS'
  | 'DUPLICATE_KEY'
  | 'ROW_COUNT_CHANGED'
  | 'UNKNOWN_OPERATOR'
  | 'UNKNOWN_COLUMN'
  | 'INVALID_PREDICATE'
  | 'PREDICATE_CYCLE'
  | 'CACHE_ERROR'
  | 'INVALID_OPTIONS';

export interface ReconErrorDetails {
  code: ReconErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ReconError extends Error {
  readonly code: ReconErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReconErrorDetails) {
    super(details.message);
    this.name = 'ReconError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, ReconError);
  }

  /**
   * Format error for the operator running the reconciliation
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
