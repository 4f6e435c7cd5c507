import { ConfigurationError } from './errors';
import type { AuthStrategy, HttpHeaders, PreparedRequest } from './types';

export interface TokenAuthOptions {
  token: string;
  /** Authorization scheme, e.g. "Bearer" or "OAuth". */
  scheme: string;
  /** Identification headers; entries whose value is undefined are skipped. */
  headers?: Record<string, string | undefined>;
}

/**
 * Builds an {@link AuthStrategy} that stamps `Authorization: <scheme> <token>`
 * and the given identification headers onto each request.
 */
export function createTokenAuth(options: TokenAuthOptions): AuthStrategy {
  const token = options.token.trim();
  if (!token) {
    throw new ConfigurationError('Access token must not be empty');
  }

  const extra: HttpHeaders = {};
  for (const [name, value] of Object.entries(options.headers ?? {})) {
    if (value !== undefined && value !== '') {
      extra[name] = value;
    }
  }
  const authorization = `${options.scheme} ${token}`;

  return (request: PreparedRequest): PreparedRequest =>
    Object.freeze({
      ...request,
      headers: Object.freeze({ ...request.headers, ...extra, Authorization: authorization }),
    });
}
