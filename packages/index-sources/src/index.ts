export { IndexFetcher } from './index-fetcher.js';
export { DEFAULT_SOURCE_TIMEOUT_MS, describeSource, DOW_JONES_SOURCES } from './sources.js';
export type { IIndexFetcher, IndexFetcherConfig, IndexQuote } from './types.js';
