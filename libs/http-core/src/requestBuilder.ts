import { ConfigurationError } from './errors';
import type { HttpHeaders, PreparedRequest, QueryParams, RequestSpec } from './types';

export interface RequestBuilderConfig {
  baseUrl: string;
  apiVersion?: string;
  defaultHeaders?: HttpHeaders;
  asciiJson?: boolean;
}

export interface SerializeJsonOptions {
  asciiOnly?: boolean;
}

const NON_ASCII = /[\u007f-\uffff]/g;

/**
 * Serializes a request body. JSON.stringify already escapes quotes, backslashes
 * and control characters; `asciiOnly` additionally escapes every code point
 * above U+007E, emitting astral characters as surrogate pairs.
 */
export function serializeJson(body: unknown, options: SerializeJsonOptions = {}): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(body);
  } catch (error) {
    throw new ConfigurationError(
      `Request body is not JSON-serializable: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  if (json === undefined) {
    throw new ConfigurationError(`Request body of type ${typeof body} is not JSON-serializable`);
  }
  if (!options.asciiOnly) {
    return json;
  }
  return json.replace(NON_ASCII, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

export function encodeQuery(query: QueryParams | undefined): string {
  if (!query) return '';
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    const text = typeof value === 'object' ? value.join(',') : String(value);
    pairs.push(`${encodeURIComponent(key)}=${encodeURIComponent(text)}`);
  }
  return pairs.join('&');
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+/, '').replace(/\/+$/, '');
}

/**
 * Turns a method/path/query/body description into an immutable
 * {@link PreparedRequest}. All configuration problems surface as
 * {@link ConfigurationError} before anything is sent.
 */
export class RequestBuilder {
  private readonly baseUrl: string;
  private readonly apiVersion?: string;
  private readonly defaultHeaders: HttpHeaders;
  private readonly asciiJson: boolean;

  constructor(config: RequestBuilderConfig) {
    let parsed: URL;
    try {
      parsed = new URL(config.baseUrl);
    } catch (error) {
      throw new ConfigurationError(`Malformed base URL: ${config.baseUrl}`, { cause: error });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ConfigurationError(`Base URL must use http or https: ${config.baseUrl}`);
    }
    if (parsed.search || parsed.hash) {
      throw new ConfigurationError(`Base URL must not carry a query or fragment: ${config.baseUrl}`);
    }

    this.baseUrl = config.baseUrl.trim().replace(/\/+$/, '');
    const version = config.apiVersion ? trimSlashes(config.apiVersion) : '';
    this.apiVersion = version || undefined;
    this.defaultHeaders = { ...config.defaultHeaders };
    this.asciiJson = config.asciiJson ?? false;
  }

  build(spec: RequestSpec): PreparedRequest {
    const path = trimSlashes(spec.path);
    if (this.apiVersion && (path === this.apiVersion || path.startsWith(`${this.apiVersion}/`))) {
      throw new ConfigurationError(
        `Path "${spec.path}" already contains the API version "${this.apiVersion}"`,
      );
    }

    const segments = [this.baseUrl, this.apiVersion, path].filter((segment) => segment);
    const queryString = encodeQuery(spec.query);
    const url = queryString ? `${segments.join('/')}?${queryString}` : segments.join('/');

    const headers: HttpHeaders = {
      Accept: 'application/json',
      ...this.defaultHeaders,
      ...spec.headers,
    };

    let body: string | undefined;
    if (spec.body !== undefined) {
      body = serializeJson(spec.body, { asciiOnly: this.asciiJson });
      headers['Content-Type'] = 'application/json; charset=utf-8';
    }

    const request: PreparedRequest = {
      method: spec.method,
      url,
      path,
      query: Object.freeze({ ...spec.query }),
      headers: Object.freeze(headers),
      ...(body !== undefined ? { body } : {}),
    };
    return Object.freeze(request);
  }
}
