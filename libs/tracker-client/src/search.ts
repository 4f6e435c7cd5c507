import type { JsonValue, QueryParams } from '@trackwise/http-core';
import type { ExpandField } from './models';

/**
 * Body of `POST issues/_search`. Use one of `filter`, `query`, `keys`,
 * `queue` or `filterId`; `order` only combines with `filter`.
 */
export interface SearchRequest {
  /** Field/value pairs, e.g. `{ queue: 'TREK', assignee: 'empty()' }`. */
  filter?: Record<string, JsonValue>;
  /** Query-language filter, e.g. `Queue: TREK Assignee: me()`. */
  query?: string;
  keys?: string[];
  queue?: string;
  filterId?: number;
  /** Sort direction and field, e.g. `+status` or `-createdAt`. */
  order?: string;
}

export type ScrollType = 'sorted' | 'unsorted';

export interface SearchParams {
  expand?: ExpandField[];
  perPage?: number;
  page?: number;
  /** Page anchor for relative pagination. */
  id?: string;
  scrollType?: ScrollType;
  /** Issues per scroll page. Default 100, at most 1000. */
  perScroll?: number;
  scrollTTLMillis?: number;
  scrollId?: string;
}

export function buildSearchQuery(params: SearchParams = {}): QueryParams {
  return {
    expand: params.expand && params.expand.length > 0 ? params.expand : undefined,
    perPage: params.perPage,
    page: params.page,
    id: params.id,
    scrollType: params.scrollType,
    perScroll: params.perScroll,
    scrollTTLMillis: params.scrollTTLMillis,
    scrollId: params.scrollId,
  };
}
