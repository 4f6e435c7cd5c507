import { z } from 'zod';
import {
  ApiError,
  AuthenticationError,
  ClientError,
  ConfigurationError,
  DecodeError,
  RateLimitError,
  toClientError,
} from './errors';
import { RequestBuilder } from './requestBuilder';
import { classifyTransportFailure, decodeResponse } from './responseDecoder';
import { RetryPolicy, retryOptionsSchema } from './retryPolicy';
import { fetchTransport } from './transport/fetchTransport';
import type {
  AuthStrategy,
  HttpClientConfig,
  HttpHeaders,
  HttpMethod,
  HttpRequestInterceptor,
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
  Logger,
  LoggerMeta,
  MetricsRequestInfo,
  MetricsSink,
  PreparedRequest,
  RawHttpResponse,
  RequestOutcome,
  ResponseSchema,
} from './types';

const DEFAULT_TIMEOUT_MS = 30_000;

const configSchema = z.object({
  clientName: z.string().min(1),
  baseUrl: z.string().url(),
  apiVersion: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  asciiJson: z.boolean().optional(),
  retry: retryOptionsSchema.optional(),
});

/** Per-call options for the verb helpers. */
export type CallOptions = Omit<HttpRequestOptions, 'method' | 'path' | 'body'>;

interface AttemptResult<T> {
  status: number;
  headers: HttpHeaders;
  body: T;
}

interface CallMeta extends LoggerMeta {
  client: string;
  operation: string;
  method: HttpMethod;
  path: string;
}

function statusOf(error: ClientError): number | undefined {
  if (error instanceof RateLimitError) return 429;
  if (error instanceof AuthenticationError || error instanceof ApiError || error instanceof DecodeError) {
    return error.status;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resilient JSON-over-HTTP client.
 *
 * Every call runs build → auth → beforeSend interceptors → transport →
 * decode under the {@link RetryPolicy}, with a fresh request and a fresh
 * timeout per attempt. Bodies are validated against the zod schema passed to
 * {@link HttpClient.request}.
 */
export class HttpClient {
  readonly clientName: string;
  private readonly builder: RequestBuilder;
  private readonly retryPolicy: RetryPolicy;
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly auth?: AuthStrategy;
  private readonly logger?: Logger;
  private readonly metrics?: MetricsSink;
  private readonly interceptors: readonly HttpRequestInterceptor[];

  constructor(config: HttpClientConfig) {
    const parsed = configSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ConfigurationError(`Invalid client configuration: ${issues}`);
    }

    this.clientName = config.clientName;
    this.builder = new RequestBuilder({
      baseUrl: config.baseUrl,
      apiVersion: config.apiVersion,
      defaultHeaders: config.defaultHeaders,
      asciiJson: config.asciiJson,
    });
    this.retryPolicy = new RetryPolicy(config.retry, { scheduler: config.scheduler, random: config.random });
    this.transport = config.transport ?? fetchTransport;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.auth = config.auth;
    this.logger = config.logger;
    this.metrics = config.metrics;
    this.interceptors = Object.freeze([...(config.interceptors ?? [])]);
  }

  async request<T>(opts: HttpRequestOptions, schema: ResponseSchema<T>): Promise<HttpResponse<T>> {
    const meta: CallMeta = {
      client: this.clientName,
      operation: opts.operation ?? `${opts.method} ${opts.path}`,
      method: opts.method,
      path: opts.path,
    };
    const retrySafe = opts.retrySafe ?? opts.method !== 'POST';
    const startedAt = Date.now();
    let attempts = 0;

    try {
      const result = await this.retryPolicy.execute(
        (attempt) => {
          attempts = attempt;
          return this.runAttempt(opts, schema, attempt, meta);
        },
        {
          retrySafe,
          signal: opts.signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger?.warn('http.request.retry', {
              ...meta,
              attempt,
              delayMs,
              errorKind: error.kind,
              status: statusOf(error),
            });
          },
        },
      );

      const outcome = this.buildOutcome(startedAt, { ok: true, status: result.status, attempts });
      this.logger?.info('http.request.success', { ...meta, status: result.status, attempts, durationMs: outcome.durationMs });
      await this.recordMetrics({ ...meta, outcome });
      return { ...result, outcome };
    } catch (caught) {
      const error = toClientError(caught);
      const outcome = this.buildOutcome(startedAt, {
        ok: false,
        status: statusOf(error),
        errorKind: error.kind,
        attempts: error.attempts ?? attempts,
      });
      this.logger?.error('http.request.failed', {
        ...meta,
        attempts: outcome.attempts,
        status: outcome.status,
        errorKind: error.kind,
        error: error.message,
      });
      await this.recordMetrics({ ...meta, outcome });
      throw error;
    }
  }

  get<T>(path: string, schema: ResponseSchema<T>, options: CallOptions = {}): Promise<HttpResponse<T>> {
    return this.request({ ...options, method: 'GET', path }, schema);
  }

  post<T>(path: string, body: unknown, schema: ResponseSchema<T>, options: CallOptions = {}): Promise<HttpResponse<T>> {
    return this.request({ ...options, method: 'POST', path, body }, schema);
  }

  put<T>(path: string, body: unknown, schema: ResponseSchema<T>, options: CallOptions = {}): Promise<HttpResponse<T>> {
    return this.request({ ...options, method: 'PUT', path, body }, schema);
  }

  patch<T>(path: string, body: unknown, schema: ResponseSchema<T>, options: CallOptions = {}): Promise<HttpResponse<T>> {
    return this.request({ ...options, method: 'PATCH', path, body }, schema);
  }

  delete<T>(path: string, schema: ResponseSchema<T>, options: CallOptions = {}): Promise<HttpResponse<T>> {
    return this.request({ ...options, method: 'DELETE', path }, schema);
  }

  private async runAttempt<T>(
    opts: HttpRequestOptions,
    schema: ResponseSchema<T>,
    attempt: number,
    meta: CallMeta,
  ): Promise<AttemptResult<T>> {
    const external = opts.signal;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(external?.reason);
    external?.addEventListener('abort', forwardAbort, { once: true });
    let timedOut = false;
    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let request: PreparedRequest | undefined;
    try {
      request = await this.applyBeforeSend(this.prepare(opts), attempt, controller.signal, meta);
      this.logger?.debug('http.request.attempt', { ...meta, attempt, maxAttempts: this.retryPolicy.maxRetries + 1 });

      let raw: RawHttpResponse;
      try {
        raw = await this.transport(
          {
            method: request.method,
            url: request.url,
            headers: { ...request.headers },
            ...(request.body !== undefined ? { body: request.body } : {}),
          },
          controller.signal,
        );
      } catch (error) {
        throw classifyTransportFailure(error, { timedOut, canceled: external?.aborted ?? false });
      }

      await this.applyAfterResponse(request, attempt, raw, meta);
      return { status: raw.status, headers: raw.headers, body: decodeResponse(raw, schema) };
    } catch (caught) {
      const error = toClientError(caught);
      await this.applyOnError(request, attempt, error, meta);
      throw error;
    } finally {
      clearTimeout(timeoutHandle);
      external?.removeEventListener('abort', forwardAbort);
    }
  }

  private prepare(opts: HttpRequestOptions): PreparedRequest {
    try {
      const request = this.builder.build(opts);
      return this.auth ? this.auth(request) : request;
    } catch (error) {
      if (error instanceof ClientError) throw error;
      throw new ConfigurationError(`Request preparation failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async applyBeforeSend(
    request: PreparedRequest,
    attempt: number,
    signal: AbortSignal,
    meta: CallMeta,
  ): Promise<PreparedRequest> {
    let current = request;
    for (const interceptor of this.interceptors) {
      if (!interceptor.beforeSend) continue;
      try {
        const replacement = await interceptor.beforeSend({ request: current, attempt, signal });
        if (replacement) {
          current = Object.freeze({ ...replacement, headers: Object.freeze({ ...replacement.headers }) });
        }
      } catch (error) {
        this.logger?.warn('http.interceptor.beforeSend.failed', { ...meta, attempt, error: errorMessage(error) });
        if (error instanceof ClientError) throw error;
        throw new ConfigurationError(`beforeSend interceptor failed: ${errorMessage(error)}`, { cause: error });
      }
    }
    return current;
  }

  private async applyAfterResponse(
    request: PreparedRequest,
    attempt: number,
    response: RawHttpResponse,
    meta: CallMeta,
  ): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.afterResponse) continue;
      try {
        await interceptor.afterResponse({ request, attempt, response });
      } catch (error) {
        this.logger?.warn('http.interceptor.afterResponse.failed', { ...meta, attempt, error: errorMessage(error) });
      }
    }
  }

  private async applyOnError(
    request: PreparedRequest | undefined,
    attempt: number,
    error: ClientError,
    meta: CallMeta,
  ): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.onError) continue;
      try {
        await interceptor.onError({ request, attempt, error });
      } catch (hookError) {
        this.logger?.warn('http.interceptor.onError.failed', { ...meta, attempt, error: errorMessage(hookError) });
      }
    }
  }

  private buildOutcome(
    startedAt: number,
    result: Pick<RequestOutcome, 'ok' | 'status' | 'errorKind' | 'attempts'>,
  ): RequestOutcome {
    const finishedAt = Date.now();
    return {
      ...result,
      startedAt: new Date(startedAt),
      finishedAt: new Date(finishedAt),
      durationMs: finishedAt - startedAt,
    };
  }

  private async recordMetrics(info: MetricsRequestInfo): Promise<void> {
    try {
      await this.metrics?.recordRequest(info);
    } catch (error) {
      this.logger?.warn('http.metrics.error', {
        client: info.client,
        operation: info.operation,
        error: errorMessage(error),
      });
    }
  }
}
