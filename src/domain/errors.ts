/**
 * Error taxonomy shared by the publisher, consumer and connection layers.
 *
 * Validation errors (`ConfigError`, `PayloadTooLargeError`) are caller bugs
 * and never retried. `BrokerError` carries the broker's own classification;
 * `PublishError` and `ConnectionError` wrap the last underlying cause.
 */

export type BrokerErrorCode =
  | 'not_found'
  | 'bad_request'
  | 'timeout'
  | 'unavailable'
  | 'permission'
  | 'payload_too_large'
  | 'closed'
  | 'unknown';

const PERMANENT_CODES: ReadonlySet<BrokerErrorCode> = new Set([
  'bad_request',
  'permission',
  'payload_too_large',
  'closed',
]);

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class BrokerError extends Error {
  override readonly name = 'BrokerError';
  readonly retryable: boolean;

  constructor(
    message: string,
    readonly code: BrokerErrorCode,
    options?: ErrorOptions & { retryable?: boolean },
  ) {
    super(message, options);
    this.retryable = options?.retryable ?? !PERMANENT_CODES.has(code);
  }
}

export class PayloadTooLargeError extends Error {
  override readonly name = 'PayloadTooLargeError';

  constructor(
    readonly eventId: string,
    readonly eventType: string,
    readonly size: number,
    readonly limit: number,
  ) {
    super(
      `Event payload too large: ${size} bytes (max: ${limit} bytes). ` +
        `Event: ${eventType} (ID: ${eventId})`,
    );
  }
}

export class PublishError extends Error {
  override readonly name = 'PublishError';

  constructor(
    readonly eventId: string,
    readonly eventType: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `Failed to publish event ${eventType} (ID: ${eventId}) after ${attempts} ` +
        `attempt${attempts === 1 ? '' : 's'}: ${describeError(cause)}`,
      { cause },
    );
  }
}

export class ConnectionError extends Error {
  override readonly name = 'ConnectionError';
}

export class NotConnectedError extends Error {
  override readonly name = 'NotConnectedError';
}

export class ConsumerError extends Error {
  override readonly name = 'ConsumerError';
}

export type DecodeFailure = 'malformed_payload' | 'invalid_event';

export class DecodeError extends Error {
  override readonly name = 'DecodeError';

  constructor(
    message: string,
    readonly reason: DecodeFailure,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** True when retrying the same operation could succeed. */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof BrokerError) return err.retryable;
  if (err instanceof NotConnectedError) return false;
  if (err instanceof PayloadTooLargeError) return false;
  return true;
}

/** Short label for metrics and logs: the error's name, or its JS type. */
export function errorKind(err: unknown): string {
  if (err instanceof Error) return err.name;
  return typeof err;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
