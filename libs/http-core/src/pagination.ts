import { ConfigurationError } from './errors';

export interface Page<T> {
  readonly items: readonly T[];
  readonly page: number;
  readonly perPage: number;
  readonly totalPages?: number;
  readonly totalCount?: number;
}

export interface PageRequest {
  page: number;
  perPage: number;
}

export type FetchPage<T> = (request: PageRequest) => Promise<Page<T>>;

export interface WalkPagesOptions {
  perPage: number;
  /** Default: 1. */
  startPage?: number;
  /** Soft limit on the number of pages yielded. */
  maxPages?: number;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Lazily walks a page-numbered listing, one call per step and never ahead of
 * the consumer.
 *
 * Ends after the page `totalPages` marks as last, after a short page (which is
 * still yielded), on an empty page (not yielded) or once `maxPages` pages have
 * been yielded. Errors from `fetchPage` end the walk.
 */
export async function* walkPages<T>(fetchPage: FetchPage<T>, options: WalkPagesOptions): AsyncGenerator<Page<T>, void, undefined> {
  const { perPage, startPage = 1, maxPages } = options;
  assertPositiveInteger('perPage', perPage);
  assertPositiveInteger('startPage', startPage);
  if (maxPages !== undefined) assertPositiveInteger('maxPages', maxPages);

  let yielded = 0;
  for (let page = startPage; ; page += 1) {
    const current = await fetchPage({ page, perPage });
    if (current.items.length === 0) return;

    yield current;
    yielded += 1;

    if (current.totalPages !== undefined && page >= current.totalPages) return;
    if (current.items.length < perPage) return;
    if (maxPages !== undefined && yielded >= maxPages) return;
  }
}

export async function collectItems<T>(pages: AsyncIterable<Page<T>>): Promise<T[]> {
  const items: T[] = [];
  for await (const page of pages) {
    items.push(...page.items);
  }
  return items;
}
