import type { CalendarDate, IndexValue } from '@geohashing/core';
import type { HttpEffects } from '@geohashing/http';
import type { Result } from 'neverthrow';

/**
 * An index value together with where and for which day it was fetched
 */
export interface IndexQuote {
  value: IndexValue;
  /** Base URL of the source that answered */
  source: string;
  /** Day the value was requested for (already compliance-shifted) */
  fetchDate: CalendarDate;
}

export interface IndexFetcherConfig {
  /** Base URLs tried in order; defaults to DOW_JONES_SOURCES */
  sources?: readonly string[] | undefined;
  /** Per-source timeout in milliseconds */
  timeoutMs?: number | undefined;
  /** Transport overrides, used by tests to stay in-process */
  effects?: Partial<HttpEffects> | undefined;
}

export interface IIndexFetcher {
  /**
   * Fetch the index value published for `fetchDate`
   */
  fetchIndexValue(fetchDate: CalendarDate): Promise<Result<IndexQuote, Error>>;

  /**
   * Release HTTP resources
   */
  destroy(): Promise<void>;
}
