/**
 * A day on the calendar, without time or zone. Months and days are 1-based.
 */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * Dow Jones opening value as published, e.g. "10458.68". Hashed verbatim.
 */
export type IndexValue = string;

/**
 * A 1°×1° cell named by its truncated latitude and longitude.
 * `-0` is a distinct graticule from `0` (the band just south of the equator
 * or west of Greenwich).
 */
export interface Graticule {
  readonly lat: number;
  readonly lon: number;
}

export interface Coordinate {
  readonly lat: number;
  readonly lon: number;
}

/**
 * 30W rule classification. East of -30° longitude uses the previous day's index.
 */
export type ComplianceFlag = 'east' | 'west';
