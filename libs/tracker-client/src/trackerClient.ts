import { z } from 'zod';
import {
  ConfigurationError,
  ConsoleLogger,
  HttpClient,
  PatchBuilder,
  createTokenAuth,
  isIdempotentPatch,
  parseLogLevel,
  readOptionalEnv,
  readOptionalNumberEnv,
  readRequiredEnv,
  walkPages,
} from '@trackwise/http-core';
import type {
  EnvSource,
  HttpHeaders,
  HttpRequestInterceptor,
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
  Logger,
  MetricsSink,
  Page,
  PageRequest,
  PatchBody,
  QueryParams,
  ResponseSchema,
  RetryOptions,
  Scheduler,
} from '@trackwise/http-core';
import { issueSchema, queueSchema } from './models';
import type {
  ExpandField,
  Issue,
  IssueCreateInput,
  Language,
  Queue,
  QueueCreateInput,
  QueueExpandField,
} from './models';
import { buildSearchQuery } from './search';
import type { SearchParams, SearchRequest } from './search';

const DEFAULT_BASE_URL = 'https://st-api.yandex-team.ru';
const DEFAULT_API_VERSION = 'v3';
const DEFAULT_LANGUAGE: Language = 'ru';
const DEFAULT_PAGE_SIZE = 50;

const languageSchema = z.enum(['ru', 'en']);

export interface TrackerClientConfig {
  token: string;
  /** Sent as X-Org-ID. */
  orgId?: string;
  baseUrl?: string;
  apiVersion?: string;
  /** Locale of response texts, sent as Accept-Language. Default: ru. */
  language?: Language;
  timeoutMs?: number;
  retry?: RetryOptions;
  transport?: HttpTransport;
  logger?: Logger;
  metrics?: MetricsSink;
  interceptors?: HttpRequestInterceptor[];
  scheduler?: Scheduler;
  random?: () => number;
}

export interface PaginationMeta {
  totalPages?: number;
  totalCount?: number;
}

export interface TrackerResponse<T> extends HttpResponse<T> {
  pagination: PaginationMeta;
}

export interface TrackerCallOptions {
  query?: QueryParams;
  signal?: AbortSignal;
  /** Overrides the method-based default; see HttpRequestOptions.retrySafe. */
  retrySafe?: boolean;
}

export interface PaginateOptions {
  /** Default: 50. */
  perPage?: number;
  startPage?: number;
  maxPages?: number;
  query?: QueryParams;
  signal?: AbortSignal;
}

export interface SearchPagesOptions extends Omit<PaginateOptions, 'query'> {
  expand?: ExpandField[];
}

function readCount(headers: HttpHeaders, name: string): number | undefined {
  const raw = headers[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
}

export function readPaginationMeta(headers: HttpHeaders): PaginationMeta {
  return {
    totalPages: readCount(headers, 'x-total-pages'),
    totalCount: readCount(headers, 'x-total-count'),
  };
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Client for the issue tracker REST API.
 *
 * Paths are relative to `{baseUrl}/{apiVersion}`; pagination metadata from
 * the X-Total-Pages and X-Total-Count headers is attached to every response.
 */
export class TrackerClient {
  readonly language: Language;
  private readonly http: HttpClient;

  constructor(config: TrackerClientConfig) {
    const language = languageSchema.safeParse(config.language ?? DEFAULT_LANGUAGE);
    if (!language.success) {
      throw new ConfigurationError(`Unsupported language "${String(config.language)}", expected ru or en`);
    }
    this.language = language.data;

    this.http = new HttpClient({
      clientName: 'tracker',
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      apiVersion: config.apiVersion ?? DEFAULT_API_VERSION,
      timeoutMs: config.timeoutMs,
      defaultHeaders: { 'Accept-Language': this.language },
      auth: createTokenAuth({ token: config.token, scheme: 'OAuth', headers: { 'X-Org-ID': config.orgId } }),
      retry: config.retry,
      transport: config.transport,
      logger: config.logger,
      metrics: config.metrics,
      interceptors: config.interceptors,
      scheduler: config.scheduler,
      random: config.random,
    });
  }

  // ==========================================================================
  // Generic calls
  // ==========================================================================

  get(path: string, options: TrackerCallOptions = {}): Promise<TrackerResponse<unknown>> {
    return this.call({ ...options, method: 'GET', path }, z.unknown());
  }

  post(path: string, body: unknown, options: TrackerCallOptions = {}): Promise<TrackerResponse<unknown>> {
    return this.call({ ...options, method: 'POST', path, body }, z.unknown());
  }

  patch(path: string, body: unknown, options: TrackerCallOptions = {}): Promise<TrackerResponse<unknown>> {
    return this.call({ ...options, method: 'PATCH', path, body }, z.unknown());
  }

  delete(path: string, options: TrackerCallOptions = {}): Promise<TrackerResponse<unknown>> {
    return this.call({ ...options, method: 'DELETE', path }, z.unknown());
  }

  /** Fetches one page of a listing whose body is a JSON array. */
  getPage<T>(
    path: string,
    pageRequest: PageRequest,
    itemSchema: ResponseSchema<T>,
    options: TrackerCallOptions = {},
  ): Promise<Page<T>> {
    return this.fetchPage({ ...options, method: 'GET', path }, pageRequest, itemSchema);
  }

  paginate<T>(path: string, itemSchema: ResponseSchema<T>, options: PaginateOptions = {}): AsyncGenerator<Page<T>, void, undefined> {
    const { perPage = DEFAULT_PAGE_SIZE, startPage, maxPages, query, signal } = options;
    return walkPages((pageRequest) => this.getPage(path, pageRequest, itemSchema, { query, signal }), {
      perPage,
      startPage,
      maxPages,
    });
  }

  // ==========================================================================
  // Issues
  // ==========================================================================

  async getIssue(key: string, options: { expand?: ExpandField[]; signal?: AbortSignal } = {}): Promise<Issue> {
    const response = await this.call(
      {
        method: 'GET',
        path: `issues/${segment(key)}`,
        operation: 'issues.get',
        query: { expand: options.expand?.length ? options.expand : undefined },
        signal: options.signal,
      },
      issueSchema,
    );
    return response.body;
  }

  /**
   * Creates an issue. The call is only retried when `unique` is set, since
   * the server then deduplicates repeated creates.
   */
  async createIssue(input: IssueCreateInput, options: { signal?: AbortSignal } = {}): Promise<Issue> {
    const response = await this.call(
      {
        method: 'POST',
        path: 'issues',
        operation: 'issues.create',
        body: input,
        retrySafe: input.unique !== undefined,
        signal: options.signal,
      },
      issueSchema,
    );
    return response.body;
  }

  /**
   * Applies a partial update. Array fields take encoded
   * {@link FieldUpdate}s, scalar fields take plain values.
   *
   * Only patches that replace values are retried; `add`, `remove` and
   * `replace` updates are sent once unless `retrySafe` says otherwise.
   *
   * @param options.version Rejects the update with 409 if the issue has changed since.
   */
  async updateIssue(
    key: string,
    patch: PatchBody | PatchBuilder,
    options: { version?: number; retrySafe?: boolean; signal?: AbortSignal } = {},
  ): Promise<Issue> {
    const body = patch instanceof PatchBuilder ? patch.build() : patch;
    const idempotent = patch instanceof PatchBuilder ? patch.idempotent : isIdempotentPatch(body);
    const response = await this.call(
      {
        method: 'PATCH',
        path: `issues/${segment(key)}`,
        operation: 'issues.update',
        query: { version: options.version },
        body,
        retrySafe: options.retrySafe ?? idempotent,
        signal: options.signal,
      },
      issueSchema,
    );
    return response.body;
  }

  /** Searches issues. The search is a read, so it is retried like a GET. */
  async searchIssues(
    request: SearchRequest = {},
    params: SearchParams = {},
    options: { signal?: AbortSignal } = {},
  ): Promise<Issue[]> {
    const response = await this.call(
      {
        method: 'POST',
        path: 'issues/_search',
        operation: 'issues.search',
        query: buildSearchQuery(params),
        body: request,
        retrySafe: true,
        signal: options.signal,
      },
      z.array(issueSchema),
    );
    return response.body;
  }

  searchIssuePages(request: SearchRequest = {}, options: SearchPagesOptions = {}): AsyncGenerator<Page<Issue>, void, undefined> {
    const { perPage = DEFAULT_PAGE_SIZE, startPage, maxPages, expand, signal } = options;
    return walkPages(
      (pageRequest) =>
        this.fetchPage(
          {
            method: 'POST',
            path: 'issues/_search',
            operation: 'issues.search',
            query: buildSearchQuery({ expand }),
            body: request,
            retrySafe: true,
            signal,
          },
          pageRequest,
          issueSchema,
        ),
      { perPage, startPage, maxPages },
    );
  }

  // ==========================================================================
  // Queues
  // ==========================================================================

  async getQueue(key: string, options: { expand?: QueueExpandField[]; signal?: AbortSignal } = {}): Promise<Queue> {
    const response = await this.call(
      {
        method: 'GET',
        path: `queues/${segment(key)}`,
        operation: 'queues.get',
        query: { expand: options.expand?.length ? options.expand : undefined },
        signal: options.signal,
      },
      queueSchema,
    );
    return response.body;
  }

  listQueues(options: PaginateOptions & { expand?: QueueExpandField[] } = {}): AsyncGenerator<Page<Queue>, void, undefined> {
    const { expand, query, ...rest } = options;
    return this.paginate('queues', queueSchema, {
      ...rest,
      query: expand?.length ? { ...query, expand } : query,
    });
  }

  async createQueue(input: QueueCreateInput, options: { signal?: AbortSignal } = {}): Promise<Queue> {
    const response = await this.call(
      { method: 'POST', path: 'queues', operation: 'queues.create', body: input, signal: options.signal },
      queueSchema,
    );
    return response.body;
  }

  async deleteQueue(key: string, options: { signal?: AbortSignal } = {}): Promise<void> {
    await this.call(
      { method: 'DELETE', path: `queues/${segment(key)}`, operation: 'queues.delete', signal: options.signal },
      z.unknown(),
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async call<T>(opts: HttpRequestOptions, schema: ResponseSchema<T>): Promise<TrackerResponse<T>> {
    const response = await this.http.request(opts, schema);
    return { ...response, pagination: readPaginationMeta(response.headers) };
  }

  private async fetchPage<T>(
    opts: HttpRequestOptions,
    { page, perPage }: PageRequest,
    itemSchema: ResponseSchema<T>,
  ): Promise<Page<T>> {
    const response = await this.call(
      {
        ...opts,
        operation: opts.operation ?? `${opts.path}.page`,
        query: { ...opts.query, perPage, page },
      },
      z.array(itemSchema),
    );
    return Object.freeze({
      items: Object.freeze(response.body),
      page,
      perPage,
      totalPages: response.pagination.totalPages,
      totalCount: response.pagination.totalCount,
    });
  }
}

function parseLanguage(value: string | undefined): Language | undefined {
  if (value === undefined) return undefined;
  const parsed = languageSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new ConfigurationError(`TRACKER_LANGUAGE must be ru or en, got "${value}"`);
  }
  return parsed.data;
}

/**
 * Builds a client from TRACKER_TOKEN (required), TRACKER_ORG_ID,
 * TRACKER_BASE_URL, TRACKER_API_VERSION, TRACKER_LANGUAGE and
 * TRACKER_TIMEOUT_MS. Logs to the console at LOG_LEVEL unless a logger is given.
 */
export function createTrackerClientFromEnv(
  overrides: Partial<TrackerClientConfig> = {},
  env: EnvSource = process.env,
): TrackerClient {
  return new TrackerClient({
    ...overrides,
    token: overrides.token ?? readRequiredEnv('TRACKER_TOKEN', env),
    orgId: overrides.orgId ?? readOptionalEnv('TRACKER_ORG_ID', env),
    baseUrl: overrides.baseUrl ?? readOptionalEnv('TRACKER_BASE_URL', env),
    apiVersion: overrides.apiVersion ?? readOptionalEnv('TRACKER_API_VERSION', env),
    language: overrides.language ?? parseLanguage(readOptionalEnv('TRACKER_LANGUAGE', env)),
    timeoutMs: overrides.timeoutMs ?? readOptionalNumberEnv('TRACKER_TIMEOUT_MS', env),
    logger: overrides.logger ?? new ConsoleLogger(parseLogLevel(readOptionalEnv('LOG_LEVEL', env))),
  });
}
