export const ErrorCode = {
  TRANSPORT_FAILURE: 'TRANSPORT_FAILURE',
  CACHE_INCONSISTENCY: 'CACHE_INCONSISTENCY',
  CONFIGURATION: 'CONFIGURATION',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for every error raised by the fetcher, the cache or the CLI configuration.
 */
export class ConditionalFetchError extends Error {
  constructor(
    readonly code: ErrorCodeValue,
    message: string,
    readonly metadata?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConditionalFetchError';
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

/** The request never produced a response: DNS, refused connection, TLS or timeout. */
export class TransportError extends ConditionalFetchError {
  constructor(readonly url: string, cause: unknown) {
    super(ErrorCode.TRANSPORT_FAILURE, `Request to ${url} failed: ${describeCause(cause)}`, { url }, { cause });
    this.name = 'TransportError';
  }
}

/**
 * The origin answered 304 Not Modified but the cache holds no usable body for the resource.
 */
export class CacheInconsistencyError extends ConditionalFetchError {
  constructor(readonly resourceId: string, reason: string) {
    super(ErrorCode.CACHE_INCONSISTENCY, `Cache inconsistency for ${resourceId}: ${reason}`, { resourceId });
    this.name = 'CacheInconsistencyError';
  }
}

export class ConfigurationError extends ConditionalFetchError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(ErrorCode.CONFIGURATION, message, metadata);
    this.name = 'ConfigurationError';
  }
}

export function isConditionalFetchError(error: unknown): error is ConditionalFetchError {
  return error instanceof ConditionalFetchError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
