/**
 * Structured error base
 * Every revert in the system is a RelayError subclass carrying a stable code
 */

export interface ErrorDetails {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
  retryable?: boolean;
}

/**
 * Base error class for all xchain-relay errors
 */
export class RelayError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  readonly suggestion: string;
  readonly retryable: boolean;

  constructor(config: ErrorDetails) {
    super(config.message);
    this.name = 'RelayError';
    this.code = config.code;
    this.details = config.details ?? {};
    this.suggestion = config.suggestion ?? 'Check the error details and try again';
    this.retryable = config.retryable ?? false;
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      retryable: this.retryable,
    };
  }

  override toString(): string {
    return `${this.code}: ${this.message}. ${this.suggestion}`;
  }
}

/**
 * Check whether an unknown thrown value is a RelayError with the given code
 */
export function isRelayError(error: unknown, code?: string): error is RelayError {
  if (!(error instanceof RelayError)) return false;
  return code === undefined || error.code === code;
}
