import type { CalendarDate, ComplianceFlag, Coordinate, Graticule, IndexValue } from '@geohashing/core';

export type HashMode = 'graticule' | 'global';

export interface GeohashQuery {
  lat: number;
  lon: number;
  /** Defaults to today on the local clock */
  date?: CalendarDate | undefined;
  /** Fetched from the index sources when absent */
  indexValue?: IndexValue | number | undefined;
  /** Overrides the 30W classification derived from `lon` */
  compliance?: ComplianceFlag | undefined;
}

export interface GlobalhashQuery {
  date?: CalendarDate | undefined;
  indexValue?: IndexValue | number | undefined;
}

/**
 * Where the hashed index value came from
 */
export type IndexProvenance =
  | { kind: 'manual' }
  | {
      kind: 'fetched';
      /** Base URL of the answering source */
      source: string;
      /** Day the value was requested for */
      fetchDate: CalendarDate;
    };

export interface GeohashResult {
  mode: HashMode;
  coordinate: Coordinate;
  graticule: Graticule;
  digest: string;
  /** Date hashed into the digest (never compliance-shifted) */
  date: CalendarDate;
  indexValue: IndexValue;
  compliance: ComplianceFlag;
  provenance: IndexProvenance;
}
