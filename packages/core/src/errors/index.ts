/**
 * Error hierarchy shared by the reader, the comparator and the CLI.
 *
 * Only ConfigError is fatal to a run. FetchError is absorbed by the comparator into a
 * FETCH_ERROR outcome, and CancelledError marks a run the caller aborted.
 */

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Bad or missing arguments, detected before any network call.
 */
export class ConfigError extends DomainError {
  readonly code = 'CONFIG_ERROR';
  readonly severity = 'error' as const;
}

export type FetchErrorKind =
  | 'TIMEOUT'
  | 'CONNECTION_REFUSED'
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR'
  | 'INVALID_RESPONSE'
  | 'RPC_ERROR'
  | 'CANCELLED';

/**
 * One side of one account could not be read.
 */
export class FetchError extends DomainError {
  readonly code = 'FETCH_ERROR';
  readonly severity = 'error' as const;

  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }

  override toJSON() {
    return { ...super.toJSON(), kind: this.kind };
  }
}

export class CancelledError extends DomainError {
  readonly code = 'CANCELLED';
  readonly severity = 'warning' as const;
}
