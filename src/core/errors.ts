/**
 * @fileoverview Discovery error hierarchy
 *
 * Every failure the public API can raise is a typed DiscoveryError with a
 * stable `code`. An empty search result is never an error; callers tell the
 * two apart with `isDiscoveryError` or by the response status.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

export type DiscoveryErrorCode =
  | 'INVALID_ADDRESS'
  | 'INVALID_QUERY'
  | 'INVALID_STRATEGY'
  | 'INSUFFICIENT_PAGES'
  | 'INVALID_WEIGHTS'
  | 'EXPORT_FORMAT_UNSUPPORTED'
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR';

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class DiscoveryError extends Error {
  abstract readonly code: DiscoveryErrorCode;
  // Every failure here comes from the request itself; retrying cannot help.
  readonly retryable = false;
  readonly timestamp = Date.now();

  protected details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toJSON(): ErrorJSON {
    const details = this.details();
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
      ...(details ? { details } : {}),
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

export function isDiscoveryError(value: unknown): value is DiscoveryError {
  return value instanceof DiscoveryError;
}

// ============================================================================
// ADDRESS / QUERY ERRORS
// ============================================================================

export class InvalidAddressError extends DiscoveryError {
  readonly code = 'INVALID_ADDRESS';

  constructor(readonly address: string) {
    super(`Invalid hexadecimal address: ${JSON.stringify(address)}`);
    this.name = 'InvalidAddressError';
  }

  protected details(): Record<string, unknown> {
    return { address: this.address };
  }
}

export class InvalidQueryError extends DiscoveryError {
  readonly code = 'INVALID_QUERY';

  constructor(readonly query: string, reason = 'query must contain non-whitespace text') {
    super(`Invalid query: ${reason}`);
    this.name = 'InvalidQueryError';
  }

  protected details(): Record<string, unknown> {
    return { query: this.query };
  }
}

export type StrategyKind = 'search' | 'assembly';

export class InvalidStrategyError extends DiscoveryError {
  readonly code = 'INVALID_STRATEGY';

  constructor(
    readonly kind: StrategyKind,
    readonly received: string,
    readonly allowed: readonly string[],
  ) {
    super(`Unknown ${kind} strategy "${received}" (expected one of: ${allowed.join(', ')})`);
    this.name = 'InvalidStrategyError';
  }

  protected details(): Record<string, unknown> {
    return { kind: this.kind, received: this.received, allowed: [...this.allowed] };
  }
}

// ============================================================================
// ASSEMBLY ERRORS
// ============================================================================

export class InsufficientPagesError extends DiscoveryError {
  readonly code = 'INSUFFICIENT_PAGES';

  constructor(
    readonly method: string,
    readonly required: number,
    readonly available: number,
  ) {
    super(`Assembly ${method} needs ${required} pages but only ${available} qualify`);
    this.name = 'InsufficientPagesError';
  }

  protected details(): Record<string, unknown> {
    return { method: this.method, required: this.required, available: this.available };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class InvalidWeightsError extends DiscoveryError {
  readonly code = 'INVALID_WEIGHTS';

  constructor(message: string, readonly weights: Readonly<Record<string, number>>) {
    super(`Invalid scoring weights: ${message}`);
    this.name = 'InvalidWeightsError';
  }

  protected details(): Record<string, unknown> {
    return { weights: { ...this.weights } };
  }
}

export class ExportFormatUnsupportedError extends DiscoveryError {
  readonly code = 'EXPORT_FORMAT_UNSUPPORTED';

  constructor(readonly format: string, readonly supported: readonly string[]) {
    super(`Unsupported export format "${format}" (supported: ${supported.join(', ')})`);
    this.name = 'ExportFormatUnsupportedError';
  }

  protected details(): Record<string, unknown> {
    return { format: this.format, supported: [...this.supported] };
  }
}

export class ConfigurationError extends DiscoveryError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string, readonly issues: readonly string[] = [], readonly source?: string) {
    super(source ? `Configuration ${source} is invalid: ${message}` : `Invalid configuration: ${message}`);
    this.name = 'ConfigurationError';
  }

  protected details(): Record<string, unknown> {
    return { issues: [...this.issues], source: this.source };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends DiscoveryError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  protected details(): Record<string, unknown> {
    return { field: this.field, expected: this.expected, received: this.received };
  }
}

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
