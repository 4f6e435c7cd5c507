export { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, LlmClient, createLlmClientFromEnv } from './llmClient';
export type { ChatCompletionOptions, LlmClientConfig } from './llmClient';
export { Message, chatCompletionResponseSchema, completionOptionsSchema, toMessageParam } from './models';
export type { ChatCompletionResult, Choice, CompletionOptions, Role, Usage } from './models';
