export type ErrorKind =
  | 'configuration'
  | 'authentication'
  | 'rate_limit'
  | 'api'
  | 'decode'
  | 'transient_network'
  | 'canceled';

/**
 * Base class of every error the clients raise. `kind` is the discriminant;
 * `attempts` is filled in once the retry policy has finished with the call.
 */
export abstract class ClientError extends Error {
  abstract readonly kind: ErrorKind;
  attempts?: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ClientError {
  readonly kind = 'configuration';
}

export class AuthenticationError extends ClientError {
  readonly kind = 'authentication';

  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
  }
}

export class RateLimitError extends ClientError {
  readonly kind = 'rate_limit';

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
  }
}

export class ApiError extends ClientError {
  readonly kind = 'api';

  constructor(
    message: string,
    public readonly status: number,
    public readonly body?: string,
  ) {
    super(message);
  }
}

export class DecodeError extends ClientError {
  readonly kind = 'decode';

  constructor(
    message: string,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class TransientNetworkError extends ClientError {
  readonly kind = 'transient_network';

  constructor(
    message: string,
    public readonly timedOut: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class CanceledError extends ClientError {
  readonly kind = 'canceled';
}

export function isClientError(value: unknown): value is ClientError {
  return value instanceof ClientError;
}

export function isRetryableError(error: ClientError): error is RateLimitError | TransientNetworkError {
  return error instanceof RateLimitError || error instanceof TransientNetworkError;
}

/**
 * Classifies anything that is not already a {@link ClientError}. Transport
 * rejections are classified earlier by `classifyTransportFailure`, so what
 * reaches this is a local fault and is never retried.
 */
export function toClientError(error: unknown): ClientError {
  if (error instanceof ClientError) {
    return error;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new CanceledError('Request was canceled', { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConfigurationError(`Unexpected failure: ${message}`, { cause: error });
}

export interface ErrorDescription {
  kind: ErrorKind | 'unknown';
  exitCode: number;
  message: string;
}

// sysexits.h codes, so shell callers can branch on the failure class.
const EXIT_CODES: Record<ErrorKind, number> = {
  configuration: 78,
  authentication: 77,
  rate_limit: 75,
  api: 70,
  decode: 65,
  transient_network: 69,
  canceled: 130,
};

const HEADLINES: Record<ErrorKind, string> = {
  configuration: 'Configuration error',
  authentication: 'Authentication failed',
  rate_limit: 'Rate limit exceeded',
  api: 'API error',
  decode: 'Unexpected response',
  transient_network: 'Network error',
  canceled: 'Canceled',
};

/** Maps an error to the exit code and one-line message a CLI should print. */
export function describeError(error: unknown): ErrorDescription {
  if (!(error instanceof ClientError)) {
    return {
      kind: 'unknown',
      exitCode: 1,
      message: error instanceof Error ? error.message : String(error),
    };
  }

  const suffix = error.attempts && error.attempts > 1 ? ` (after ${error.attempts} attempts)` : '';
  return {
    kind: error.kind,
    exitCode: EXIT_CODES[error.kind],
    message: `${HEADLINES[error.kind]}: ${error.message}${suffix}`,
  };
}
