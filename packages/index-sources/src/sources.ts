/**
 * Mirrors that serve the Dow Jones opening value as plain text.
 * The date is appended as YYYY/MM/DD. Order is the preference order.
 */
export const DOW_JONES_SOURCES: readonly string[] = [
  'http://geo.crox.net/djia/',
  'http://www1.geo.crox.net/djia/',
  'http://www2.geo.crox.net/djia/',
  'http://carabiner.peeron.com/xkcd/map/data/',
];

export const DEFAULT_SOURCE_TIMEOUT_MS = 5000;

/**
 * Short name for logs: the host, or the raw string when it is not a URL
 */
export function describeSource(baseUrl: string): string {
  try {
    return new URL(baseUrl).host;
  } catch {
    return baseUrl;
  }
}
