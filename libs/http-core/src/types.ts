import type { ZodType, ZodTypeDef } from 'zod';
import type { ClientError, ErrorKind } from './errors';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean | readonly string[] | undefined;

/** Query parameters keyed by name; a key appears at most once on the wire. */
export type QueryParams = Record<string, QueryValue>;

/** Schema a successful response body is validated against. */
export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * A fully built request, ready for the auth strategy and the transport.
 * Instances are frozen; strategies and interceptors return new ones.
 */
export interface PreparedRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly path: string;
  readonly query: Readonly<QueryParams>;
  readonly headers: Readonly<HttpHeaders>;
  readonly body?: string;
}

export interface RequestSpec {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
  headers?: HttpHeaders;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
}

export interface RawHttpResponse {
  status: number;
  /** Header names are lower-case. */
  headers: HttpHeaders;
  body: Uint8Array;
}

/**
 * Sends one HTTP request. Rejects only for transport-level failures
 * (connection refused, DNS, aborted); any HTTP status resolves.
 */
export interface HttpTransport {
  (request: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export type AuthStrategy = (request: PreparedRequest) => PreparedRequest;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export interface Scheduler {
  /** Resolves after `ms`; rejects with an AbortError when `signal` fires first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface RetryOptions {
  maxRetries?: number;          // Default: 3
  baseDelayMs?: number;         // Default: 500
  maxDelayMs?: number;          // Default: 30_000
  jitter?: number;              // Default: 0.2 (±20%)
  maxSuggestedDelayMs?: number; // Default: 60_000
}

export interface RequestOutcome {
  ok: boolean;
  status?: number;
  errorKind?: ErrorKind;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export interface MetricsRequestInfo {
  client: string;
  operation: string;
  method: HttpMethod;
  path: string;
  outcome: RequestOutcome;
}

export interface MetricsSink {
  recordRequest(info: MetricsRequestInfo): void | Promise<void>;
}

export interface BeforeSendContext {
  request: PreparedRequest;
  attempt: number;
  signal: AbortSignal;
}

export interface AfterResponseContext {
  request: PreparedRequest;
  attempt: number;
  response: RawHttpResponse;
}

export interface OnErrorContext {
  /** Absent when the request could not be built or authenticated. */
  request?: PreparedRequest;
  attempt: number;
  error: ClientError;
}

/**
 * Per-attempt hooks.
 *
 * `beforeSend` runs in registration order after auth has been applied and may
 * return a replacement request; throwing aborts the call without reaching the
 * transport. `afterResponse` and `onError` run in reverse registration order and
 * are observers only: a failure inside them is logged and ignored.
 */
export interface HttpRequestInterceptor {
  beforeSend?(ctx: BeforeSendContext): PreparedRequest | void | Promise<PreparedRequest | void>;
  afterResponse?(ctx: AfterResponseContext): void | Promise<void>;
  onError?(ctx: OnErrorContext): void | Promise<void>;
}

export interface HttpClientConfig {
  /** Used in log and metrics metadata. */
  clientName: string;
  baseUrl: string;
  /** Inserted between the base URL and every request path, e.g. "v3". */
  apiVersion?: string;
  /** Per-attempt timeout. Default: 30_000. */
  timeoutMs?: number;
  defaultHeaders?: HttpHeaders;
  /** Escape every non-ASCII code point in request bodies as \uXXXX. */
  asciiJson?: boolean;
  auth?: AuthStrategy;
  retry?: RetryOptions;
  transport?: HttpTransport;
  logger?: Logger;
  interceptors?: HttpRequestInterceptor[];
  metrics?: MetricsSink;
  scheduler?: Scheduler;
  /** Source of jitter, in [0, 1). Default: Math.random. */
  random?: () => number;
}

export interface HttpRequestOptions extends RequestSpec {
  /** Name used in logs and metrics, e.g. "issues.get". */
  operation?: string;
  /**
   * Whether a rate-limited or transiently failed attempt may be re-sent.
   * Defaults to true for every method except POST.
   */
  retrySafe?: boolean;
  signal?: AbortSignal;
}

export interface HttpResponse<TBody> {
  status: number;
  headers: HttpHeaders;
  body: TBody;
  outcome: RequestOutcome;
}
