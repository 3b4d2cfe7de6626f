export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  /** Name used in log categories and error messages */
  providerName: string;
  /** Per-request timeout in milliseconds */
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  headers?: Record<string, string> | undefined;
  timeout?: number | undefined;
}

/**
 * A completed exchange. Non-2xx statuses are returned as values, not errors,
 * so callers decide what counts as success.
 */
export interface HttpTextResponse {
  body: string;
  durationMs: number;
  status: number;
  url: string;
}

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'NetworkError';
  }
}
