// Handler for the geohash command
// Runs GeohashService and applies the centicule adjustment on request

import { wrapError, type CalendarDate, type ComplianceFlag, type Coordinate, type IndexValue } from '@geohashing/core';
import { adjustCenticule, GeohashService, type GeohashResult } from '@geohashing/geohash';
import { IndexFetcher, type IIndexFetcher } from '@geohashing/index-sources';
import { getLogger } from '@geohashing/logger';
import type { Result } from 'neverthrow';

const logger = getLogger('GeohashHandler');

/**
 * Parameters for the geohash command, already parsed from CLI input
 */
export type GeohashParams =
  | {
      mode: 'global';
      date?: CalendarDate | undefined;
      indexValue?: IndexValue | undefined;
      /** Move the hash into the centicule of this coordinate */
      centiculeOf?: Coordinate | undefined;
    }
  | {
      mode: 'graticule';
      /** Coordinate the user asked about */
      location: Coordinate;
      date?: CalendarDate | undefined;
      indexValue?: IndexValue | undefined;
      compliance?: ComplianceFlag | undefined;
      centiculeOf?: Coordinate | undefined;
    };

export interface GeohashReport extends GeohashResult {
  centicule: boolean;
}

export interface GeohashHandlerOptions {
  indexFetcher?: IIndexFetcher | undefined;
  clock?: (() => Date) | undefined;
}

/**
 * Handler for the geohash command
 */
export class GeohashHandler {
  private readonly indexFetcher: IIndexFetcher;
  private readonly service: GeohashService;

  constructor(options: GeohashHandlerOptions = {}) {
    this.indexFetcher = options.indexFetcher ?? new IndexFetcher();
    this.service = new GeohashService(this.indexFetcher, options.clock);
  }

  async execute(params: GeohashParams): Promise<Result<GeohashReport, Error>> {
    try {
      const result =
        params.mode === 'global'
          ? await this.service.globalhash({ date: params.date, indexValue: params.indexValue })
          : await this.service.geohash({
              lat: params.location.lat,
              lon: params.location.lon,
              date: params.date,
              indexValue: params.indexValue,
              compliance: params.compliance,
            });

      return result.map((hash) => this.applyCenticule(hash, params.centiculeOf));
    } catch (error) {
      return wrapError(error, 'Failed to compute geohash');
    }
  }

  async destroy(): Promise<void> {
    await this.indexFetcher.destroy();
  }

  private applyCenticule(hash: GeohashResult, original: Coordinate | undefined): GeohashReport {
    if (!original) {
      return { ...hash, centicule: false };
    }

    const coordinate = adjustCenticule(hash.coordinate, original);
    logger.debug({ from: hash.coordinate, to: coordinate }, 'Applied centicule adjustment');
    return { ...hash, coordinate, centicule: true };
  }
}
