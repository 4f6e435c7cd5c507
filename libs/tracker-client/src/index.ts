export { TrackerClient, createTrackerClientFromEnv, readPaginationMeta } from './trackerClient';
export type {
  PaginateOptions,
  PaginationMeta,
  SearchPagesOptions,
  TrackerCallOptions,
  TrackerClientConfig,
  TrackerResponse,
} from './trackerClient';
export * from './models';
export { buildSearchQuery } from './search';
export type { ScrollType, SearchParams, SearchRequest } from './search';
