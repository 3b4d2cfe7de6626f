import { getLogger, type Logger } from '@geohashing/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import type { HttpClientConfig, HttpRequestOptions, HttpTextResponse } from './types.js';
import { NetworkError, TimeoutError } from './types.js';

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Plain-text HTTP client. One attempt per request, bounded by a timeout;
 * failover and retry policy belong to the caller.
 */
export class HttpClient {
  private readonly config: HttpClientConfig;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void> | undefined;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      timeout: DEFAULT_TIMEOUT_MS,
      ...config,
      defaultHeaders: {
        Accept: 'text/plain',
        'User-Agent': 'geohashing/1.0.0',
        ...config.defaultHeaders,
      },
    };

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10000,
      keepAliveMaxTimeout: 60000,
      pipelining: 1,
    });

    this.effects = {
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      now: () => Date.now(),
      ...effects,
    };
  }

  /**
   * GET an endpoint relative to the base URL and read the body as text
   */
  async getText(endpoint: string, options: HttpRequestOptions = {}): Promise<Result<HttpTextResponse, Error>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const safeUrl = HttpUtils.sanitizeUrl(url);
    const timeout = options.timeout ?? this.config.timeout ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startTime = this.effects.now();

    this.logger.debug(`Making HTTP request - URL: ${safeUrl}, Method: GET, Timeout: ${timeout}ms`);

    try {
      const response = await this.effects.fetch(url, {
        headers: { ...this.config.defaultHeaders, ...options.headers },
        method: 'GET',
        signal: controller.signal,
      });
      const body = await response.text();
      const durationMs = this.effects.now() - startTime;

      this.logger.debug(`HTTP response - URL: ${safeUrl}, Status: ${response.status}, Duration: ${durationMs}ms`);

      return ok({ body, durationMs, status: response.status, url });
    } catch (error) {
      if (HttpUtils.isAbortError(error)) {
        return err(new TimeoutError(`Request timeout after ${timeout}ms: ${safeUrl}`, url, timeout));
      }

      const message = error instanceof Error ? error.message : String(error);
      return err(new NetworkError(`Request failed: ${safeUrl}: ${message}`, url, error));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Close the undici agent so keep-alive sockets do not hold the process open.
   * Idempotent: subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.agent.close().then(() => {
        this.logger.debug('HTTP agent closed');
      });
    }
    return this.closePromise;
  }
}
