/**
 * Geohash service - wires compliance, index lookup, digest and decoding together
 */

import { formatIsoDate, todayCalendarDate, type CalendarDate, type IndexValue } from '@geohashing/core';
import type { IIndexFetcher } from '@geohashing/index-sources';
import { getLogger } from '@geohashing/logger';
import { err, ok, type Result } from 'neverthrow';

import { GLOBAL_COMPLIANCE, resolveCompliance, resolveFetchDate } from './compliance.js';
import { computeDigest } from './digest.js';
import { decodeLocation, rescaleToGlobe, toGraticule } from './location-decoder.js';
import type { GeohashQuery, GeohashResult, GlobalhashQuery, IndexProvenance } from './types.js';

const logger = getLogger('GeohashService');

export class GeohashService {
  constructor(
    private readonly indexFetcher: IIndexFetcher,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Hash for the graticule containing (lat, lon)
   */
  async geohash(query: GeohashQuery): Promise<Result<GeohashResult, Error>> {
    const date = query.date ?? todayCalendarDate(this.clock());
    const compliance = resolveCompliance(query.lon, query.compliance);
    const graticule = toGraticule(query.lat, query.lon);

    const indexResult = await this.resolveIndexValue(date, compliance, query.indexValue);
    if (indexResult.isErr()) {
      return err(indexResult.error);
    }

    const { indexValue, provenance } = indexResult.value;
    const digest = computeDigest(date, indexValue);
    const coordinate = decodeLocation(graticule, digest);

    logger.debug(
      { date: formatIsoDate(date), indexValue, compliance, digest },
      `Geohash for graticule ${graticule.lat},${graticule.lon}`
    );

    return ok({
      mode: 'graticule',
      coordinate,
      graticule,
      digest,
      date,
      indexValue,
      compliance,
      provenance,
    });
  }

  /**
   * Whole-globe hash: the (0, 0) hash under eastern compliance, rescaled
   */
  async globalhash(query: GlobalhashQuery = {}): Promise<Result<GeohashResult, Error>> {
    const result = await this.geohash({
      lat: 0,
      lon: 0,
      date: query.date,
      indexValue: query.indexValue,
      compliance: GLOBAL_COMPLIANCE,
    });

    return result.map((hash) => ({
      ...hash,
      mode: 'global' as const,
      coordinate: rescaleToGlobe(hash.coordinate),
    }));
  }

  private async resolveIndexValue(
    date: CalendarDate,
    compliance: GeohashResult['compliance'],
    supplied: IndexValue | number | undefined
  ): Promise<Result<{ indexValue: IndexValue; provenance: IndexProvenance }, Error>> {
    if (supplied !== undefined) {
      return ok({ indexValue: String(supplied), provenance: { kind: 'manual' } });
    }

    const fetchDate = resolveFetchDate(date, compliance);
    const quote = await this.indexFetcher.fetchIndexValue(fetchDate);

    return quote.map((q) => ({
      indexValue: q.value,
      provenance: { kind: 'fetched' as const, source: q.source, fetchDate: q.fetchDate },
    }));
  }
}
