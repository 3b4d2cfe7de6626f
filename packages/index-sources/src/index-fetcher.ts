/**
 * Index fetcher - resolves a day to its Dow Jones opening value
 *
 * Sources are tried strictly in order, one attempt each. A timeout, a
 * transport failure or any status other than 200 moves on to the next
 * source; the first 200 wins and its trimmed body is returned as-is.
 */

import { formatSlashDate, SourceUnavailableError, type CalendarDate } from '@geohashing/core';
import { HttpClient } from '@geohashing/http';
import { getLogger } from '@geohashing/logger';
import { err, ok, type Result } from 'neverthrow';

import { DEFAULT_SOURCE_TIMEOUT_MS, describeSource, DOW_JONES_SOURCES } from './sources.js';
import type { IIndexFetcher, IndexFetcherConfig, IndexQuote } from './types.js';

const logger = getLogger('IndexFetcher');

interface SourceClient {
  baseUrl: string;
  name: string;
  client: HttpClient;
}

export class IndexFetcher implements IIndexFetcher {
  private readonly sources: readonly SourceClient[];

  constructor(config: IndexFetcherConfig = {}) {
    const timeout = config.timeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;

    this.sources = (config.sources ?? DOW_JONES_SOURCES).map((baseUrl) => {
      const name = describeSource(baseUrl);
      return {
        baseUrl,
        name,
        client: new HttpClient({ baseUrl, providerName: name, timeout }, config.effects),
      };
    });
  }

  async fetchIndexValue(fetchDate: CalendarDate): Promise<Result<IndexQuote, Error>> {
    const datePath = formatSlashDate(fetchDate);
    const total = this.sources.length;
    let attemptNumber = 0;
    let lastError: Error | undefined;

    for (const { baseUrl, name, client } of this.sources) {
      attemptNumber++;

      const result = await client.getText(datePath);

      if (result.isErr()) {
        lastError = result.error;
        logger.info(
          { source: name, attemptNumber, totalSources: total, errorType: result.error.name },
          `✗ Source ${name} (${attemptNumber}/${total}): ${result.error.message}`
        );
        continue;
      }

      const { status, body, durationMs } = result.value;
      if (status !== 200) {
        lastError = new Error(`HTTP ${status} from ${name}`);
        logger.info(
          { source: name, attemptNumber, totalSources: total, status },
          `✗ Source ${name} (${attemptNumber}/${total}): HTTP ${status}`
        );
        continue;
      }

      const value = body.trim();
      logger.debug(
        { source: name, attemptNumber, totalSources: total, responseTime: durationMs, value },
        `✓ Source ${name} (${attemptNumber}/${total})`
      );

      return ok({ value, source: baseUrl, fetchDate });
    }

    logger.warn({ date: datePath, totalSources: total }, `All ${total} source(s) failed for ${datePath}`);

    return err(
      new SourceUnavailableError(
        datePath,
        this.sources.map((s) => s.baseUrl),
        lastError ? { cause: lastError } : undefined
      )
    );
  }

  async destroy(): Promise<void> {
    await Promise.all(this.sources.map(({ client }) => client.close()));
  }
}
