import {
  ApiError,
  AuthenticationError,
  CanceledError,
  ClientError,
  DecodeError,
  RateLimitError,
  TransientNetworkError,
} from './errors';
import type { RawHttpResponse, ResponseSchema } from './types';

const textDecoder = new TextDecoder('utf-8');

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parses a Retry-After value: delta-seconds or an HTTP date.
 * Returns milliseconds, or undefined when absent, unparseable or in the past.
 */
export function parseRetryAfter(value: string | number | undefined | null, now: number = Date.now()): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : undefined;
  }
  if (typeof value === 'number') return undefined;
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? diff : undefined;
  }
  return undefined;
}

function retryAfterFromBody(payload: unknown): number | undefined {
  if (!isRecord(payload)) return undefined;
  const sources: JsonRecord[] = [payload];
  if (isRecord(payload.error)) sources.push(payload.error);
  for (const source of sources) {
    for (const key of ['retry_after', 'retryAfter']) {
      const value = source[key];
      if (typeof value === 'number' || typeof value === 'string') {
        const ms = parseRetryAfter(value);
        if (ms !== undefined) return ms;
      }
    }
  }
  return undefined;
}

/**
 * Best-effort message from an error body. Understands `{error: {message}}`,
 * `{error: "..."}`, `{errorMessages: [...]}` and `{message}`.
 */
export function extractErrorMessage(text: string, status: number): string {
  const payload = tryParseJson(text);
  if (isRecord(payload)) {
    const { error, errorMessages, message } = payload;
    if (isRecord(error) && typeof error.message === 'string' && error.message) {
      return error.message;
    }
    if (typeof error === 'string' && error) {
      return error;
    }
    if (Array.isArray(errorMessages)) {
      const messages = errorMessages.filter((entry): entry is string => typeof entry === 'string' && entry !== '');
      if (messages.length > 0) return messages.join('; ');
    }
    if (typeof message === 'string' && message) {
      return message;
    }
  }
  const trimmed = text.trim();
  return trimmed || `HTTP ${status}`;
}

/**
 * Classifies a raw response and, on success, parses and validates its body.
 * Every non-2xx status becomes the matching {@link ClientError} subclass.
 */
export function decodeResponse<T>(raw: RawHttpResponse, schema: ResponseSchema<T>): T {
  const text = textDecoder.decode(raw.body);
  const { status } = raw;

  if (status >= 200 && status < 300) {
    let parsed: unknown;
    if (text.trim() !== '') {
      try {
        parsed = JSON.parse(text);
      } catch (error) {
        throw new DecodeError(`Response body is not valid JSON (HTTP ${status})`, status, { cause: error });
      }
    }
    let result: ReturnType<typeof schema.safeParse>;
    try {
      result = schema.safeParse(parsed);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DecodeError(`Response could not be decoded (HTTP ${status}): ${reason}`, status, { cause: error });
    }
    if (!result.success) {
      const issues = result.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new DecodeError(`Unexpected response shape (HTTP ${status}): ${issues}`, status, {
        cause: result.error,
      });
    }
    return result.data;
  }

  const message = extractErrorMessage(text, status);
  if (status === 401 || status === 403) {
    throw new AuthenticationError(message, status);
  }
  if (status === 429) {
    const retryAfterMs = parseRetryAfter(raw.headers['retry-after']) ?? retryAfterFromBody(tryParseJson(text));
    throw new RateLimitError(message, retryAfterMs);
  }
  throw new ApiError(message, status, text || undefined);
}

/** Classifies a rejected transport call. */
export function classifyTransportFailure(
  error: unknown,
  flags: { timedOut: boolean; canceled: boolean },
): ClientError {
  if (error instanceof ClientError) return error;
  if (flags.canceled) {
    return new CanceledError('Request was canceled', { cause: error });
  }
  if (flags.timedOut) {
    return new TransientNetworkError('Request timed out', true, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransientNetworkError(`Network request failed: ${reason}`, false, { cause: error });
}
