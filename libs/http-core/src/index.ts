export * from './types';
export * from './errors';
export { HttpClient } from './HttpClient';
export type { CallOptions } from './HttpClient';
export { createTokenAuth } from './auth';
export type { TokenAuthOptions } from './auth';
export { RequestBuilder, encodeQuery, serializeJson } from './requestBuilder';
export type { RequestBuilderConfig, SerializeJsonOptions } from './requestBuilder';
export { classifyTransportFailure, decodeResponse, extractErrorMessage, parseRetryAfter } from './responseDecoder';
export { RetryPolicy, retryOptionsSchema, timerScheduler } from './retryPolicy';
export type { ExecuteOptions, RetryInfo, RetryPolicyDeps } from './retryPolicy';
export { collectItems, walkPages } from './pagination';
export type { FetchPage, Page, PageRequest, WalkPagesOptions } from './pagination';
export { FieldUpdate, PatchBuilder, encodeFieldUpdate, encodeFieldUpdates, isIdempotentPatch } from './fieldUpdate';
export type { EncodedFieldUpdate, JsonPrimitive, JsonValue, PatchBody, ReplacePair, ScalarValue } from './fieldUpdate';
export { ConsoleLogger, parseLogLevel } from './logger';
export type { LogLevel } from './logger';
export { readOptionalEnv, readOptionalNumberEnv, readRequiredEnv } from './env';
export type { EnvSource } from './env';
export { fetchTransport } from './transport/fetchTransport';
