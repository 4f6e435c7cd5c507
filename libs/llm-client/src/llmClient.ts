import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import {
  ConfigurationError,
  ConsoleLogger,
  DecodeError,
  HttpClient,
  createTokenAuth,
  parseLogLevel,
  readOptionalEnv,
  readOptionalNumberEnv,
  readRequiredEnv,
} from '@trackwise/http-core';
import type {
  EnvSource,
  HttpRequestInterceptor,
  HttpResponse,
  HttpTransport,
  Logger,
  MetricsSink,
  RetryOptions,
  Scheduler,
} from '@trackwise/http-core';
import { Message, chatCompletionResponseSchema, completionOptionsSchema, toMessageParam } from './models';
import type { ChatCompletionResult, CompletionOptions } from './models';

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_TIMEOUT_MS = 120_000;

export interface LlmClientConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Sent as HTTP-Referer, used by OpenRouter for attribution. */
  siteUrl?: string;
  /** Sent as X-Title. */
  appName?: string;
  retry?: RetryOptions;
  transport?: HttpTransport;
  logger?: Logger;
  metrics?: MetricsSink;
  interceptors?: HttpRequestInterceptor[];
  scheduler?: Scheduler;
  random?: () => number;
}

export interface ChatCompletionOptions extends CompletionOptions {
  signal?: AbortSignal;
}

function formatIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Chat-completion client for OpenAI-compatible endpoints (OpenRouter by
 * default). Completions are retried on rate limits and transient failures.
 */
export class LlmClient {
  readonly model: string;
  private readonly http: HttpClient;

  constructor(config: LlmClientConfig) {
    if (!config.model.trim()) {
      throw new ConfigurationError('Model must not be empty');
    }
    this.model = config.model.trim();

    this.http = new HttpClient({
      clientName: 'llm',
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      auth: createTokenAuth({
        token: config.apiKey,
        scheme: 'Bearer',
        headers: { 'HTTP-Referer': config.siteUrl, 'X-Title': config.appName },
      }),
      retry: config.retry,
      transport: config.transport,
      logger: config.logger,
      metrics: config.metrics,
      interceptors: config.interceptors,
      scheduler: config.scheduler,
      random: config.random,
    });
  }

  async chatCompletion(messages: Message[], options: ChatCompletionOptions = {}): Promise<ChatCompletionResult> {
    const response = await this.send(messages, options);
    return response.body;
  }

  complete(prompt: string, options: ChatCompletionOptions = {}): Promise<string> {
    return this.contentOf([Message.user(prompt)], options);
  }

  completeWithSystem(systemPrompt: string, userPrompt: string, options: ChatCompletionOptions = {}): Promise<string> {
    return this.contentOf([Message.system(systemPrompt), Message.user(userPrompt)], options);
  }

  private async send(messages: Message[], options: ChatCompletionOptions): Promise<HttpResponse<ChatCompletionResult>> {
    if (messages.length === 0) {
      throw new ConfigurationError('Messages must not be empty');
    }
    const { signal, ...sampling } = options;
    const parsed = completionOptionsSchema.safeParse(sampling);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid completion options: ${formatIssues(parsed.error)}`);
    }

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map(toMessageParam),
      temperature: parsed.data.temperature,
      max_tokens: parsed.data.maxTokens,
      top_p: parsed.data.topP,
      frequency_penalty: parsed.data.frequencyPenalty,
      presence_penalty: parsed.data.presencePenalty,
      stop: parsed.data.stop,
    };

    return this.http.post('chat/completions', body, chatCompletionResponseSchema, {
      operation: 'chat.completions.create',
      retrySafe: true,
      signal,
    });
  }

  private async contentOf(messages: Message[], options: ChatCompletionOptions): Promise<string> {
    const { status, body } = await this.send(messages, options);
    if (body.content === undefined) {
      throw new DecodeError(`Completion response contains no content (HTTP ${status})`, status);
    }
    return body.content;
  }
}

/**
 * Builds a client from OPEN_ROUTER_TOKEN and LLM_MODEL (both required unless
 * overridden), plus LLM_BASE_URL, LLM_TIMEOUT_MS, LLM_SITE_URL and LLM_APP_NAME.
 */
export function createLlmClientFromEnv(
  overrides: Partial<LlmClientConfig> = {},
  env: EnvSource = process.env,
): LlmClient {
  return new LlmClient({
    ...overrides,
    apiKey: overrides.apiKey ?? readRequiredEnv('OPEN_ROUTER_TOKEN', env),
    model: overrides.model ?? readRequiredEnv('LLM_MODEL', env),
    baseUrl: overrides.baseUrl ?? readOptionalEnv('LLM_BASE_URL', env),
    timeoutMs: overrides.timeoutMs ?? readOptionalNumberEnv('LLM_TIMEOUT_MS', env),
    siteUrl: overrides.siteUrl ?? readOptionalEnv('LLM_SITE_URL', env),
    appName: overrides.appName ?? readOptionalEnv('LLM_APP_NAME', env),
    logger: overrides.logger ?? new ConsoleLogger(parseLogLevel(readOptionalEnv('LOG_LEVEL', env))),
  });
}
