/**
 * Error taxonomy shared by the sync engine.
 *
 * Vendor failures split into permanent (bad request, never retried) and
 * retryable (vendor unavailable). The circuit breaker only counts the latter.
 */

export class NotFoundError extends Error {
  constructor(
    readonly entity: 'user' | 'team' | 'membership',
    readonly key: string | number,
  ) {
    super(`${entity} "${key}" not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * A dangling manager or membership reference. Always repaired (nulled or
 * skipped) and logged by whoever detects it; never thrown past that handler.
 */
export class DataIntegrityWarning extends Error {
  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'DataIntegrityWarning';
  }
}

export abstract class VendorError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** 4xx from the vendor: the payload is wrong, retrying will not help. */
export class PermanentVendorError extends VendorError {
  readonly retryable = false;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, status, options);
    this.name = 'PermanentVendorError';
  }
}

/** Network failure, timeout or 5xx: the vendor may recover. */
export class RetryableVendorError extends VendorError {
  readonly retryable = true;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, status, options);
    this.name = 'RetryableVendorError';
  }
}

export class CircuitOpenError extends RetryableVendorError {
  constructor(readonly retryAfterMs: number) {
    super(`Vendor circuit is open; retry in ${Math.ceil(retryAfterMs / 1000)}s`);
    this.name = 'CircuitOpenError';
  }
}

export class RateLimitTimeoutError extends RetryableVendorError {
  constructor(readonly waitedMs: number) {
    super(`No vendor rate-limit permit within ${waitedMs}ms`);
    this.name = 'RateLimitTimeoutError';
  }
}

/** Malformed or unprocessable event: acknowledged, counted, discarded. */
export class PoisonMessageError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'PoisonMessageError';
  }
}

/** Event intake refused: the bounded backlog is full. */
export class BacklogFullError extends Error {
  constructor(readonly limit: number) {
    super(`Event backlog is full (${limit} pending)`);
    this.name = 'BacklogFullError';
  }
}
