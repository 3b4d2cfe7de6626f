// Pure helpers for the geohash command: argument parsing and output formatting

import {
  formatIsoDate,
  formatSlashDate,
  InvalidCoordinateError,
  MissingCoordinateError,
  parseCalendarDate,
  type CalendarDate,
  type Coordinate,
} from '@geohashing/core';
import { parseComplianceOverride, type HashMode } from '@geohashing/geohash';
import { describeSource } from '@geohashing/index-sources';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { GeohashCommandOptions } from '../shared/schemas.js';

import type { GeohashParams, GeohashReport } from './geohash-handler.js';

const DECIMAL_NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Positional arguments as commander hands them over
 */
export interface GeohashArguments {
  latitude?: string | undefined;
  longitude?: string | undefined;
}

export interface MapLinks {
  googleMaps: string;
  openStreetMap: string;
}

/**
 * JSON payload of a successful geohash command
 */
export interface GeohashReportData {
  mode: HashMode;
  latitude: number;
  longitude: number;
  date: string;
  indexValue: string;
  indexSource: 'manual' | 'fetched';
  /** Source URL and requested day, when fetched */
  source?: string | undefined;
  fetchDate?: string | undefined;
  compliance: string;
  graticule: { latitude: number; longitude: number };
  digest: string;
  centicule: boolean;
  links: MapLinks;
}

export function parseCoordinate(axis: 'latitude' | 'longitude', raw: string): Result<number, InvalidCoordinateError> {
  const text = raw.trim();
  if (!DECIMAL_NUMBER_PATTERN.test(text)) {
    return err(new InvalidCoordinateError(axis, raw));
  }
  const value = Number(text);
  return Number.isFinite(value) ? ok(value) : err(new InvalidCoordinateError(axis, raw));
}

/**
 * Both coordinates, or a MissingCoordinateError naming what is absent
 */
export function parseLocation(args: GeohashArguments): Result<Coordinate, Error> {
  const missing: ('latitude' | 'longitude')[] = [];
  if (args.latitude === undefined) {
    missing.push('latitude');
  }
  if (args.longitude === undefined) {
    missing.push('longitude');
  }
  if (args.latitude === undefined || args.longitude === undefined) {
    return err(new MissingCoordinateError(missing));
  }

  const lat = parseCoordinate('latitude', args.latitude);
  if (lat.isErr()) {
    return err(lat.error);
  }
  const lon = parseCoordinate('longitude', args.longitude);
  if (lon.isErr()) {
    return err(lon.error);
  }

  return ok({ lat: lat.value, lon: lon.value });
}

/**
 * Turn validated CLI input into handler parameters.
 * Globalhash ignores the coordinates unless --centicule needs them.
 */
export function buildGeohashParams(args: GeohashArguments, options: GeohashCommandOptions): Result<GeohashParams, Error> {
  let date: CalendarDate | undefined;
  if (options.date !== undefined) {
    const parsed = parseCalendarDate(options.date);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    date = parsed.value;
  }

  const indexValue = options.dowJones ?? options.dj;
  const centicule = options.centicule ?? false;

  if (options.global && !centicule) {
    return ok({ mode: 'global', date, indexValue });
  }

  const location = parseLocation(args);
  if (location.isErr()) {
    return err(location.error);
  }
  const centiculeOf = centicule ? location.value : undefined;

  if (options.global) {
    return ok({ mode: 'global', date, indexValue, centiculeOf });
  }

  const override = options['30w'];
  return ok({
    mode: 'graticule',
    location: location.value,
    date,
    indexValue,
    compliance: override === undefined ? undefined : parseComplianceOverride(override),
    centiculeOf,
  });
}

/**
 * Plain decimal notation, never exponent form: 1e-7 → "0.0000001"
 */
export function formatCoordinateValue(value: number): string {
  return new Decimal(value).toFixed();
}

export function buildMapLinks(coordinate: Coordinate): MapLinks {
  const lat = formatCoordinateValue(coordinate.lat);
  const lon = formatCoordinateValue(coordinate.lon);

  return {
    googleMaps: `https://www.google.com/maps/search/?api=1&query=${lat},${lon}`,
    openStreetMap: `https://www.openstreetmap.org/?mlat=${lat}&mlon=${lon}&zoom=10`,
  };
}

/**
 * `--simple` output: latitude and longitude on separate lines
 */
export function formatSimpleOutput(coordinate: Coordinate): string {
  return `${formatCoordinateValue(coordinate.lat)}\n${formatCoordinateValue(coordinate.lon)}`;
}

// Labels padded so the digits line up whether or not the value has a sign
function formatAlignedLine(label: string, value: number): string {
  const text = formatCoordinateValue(value);
  return `${label.padEnd(11)}${text.startsWith('-') ? '' : ' '}${text}`;
}

function describeProvenance(report: GeohashReport): string {
  if (report.provenance.kind === 'manual') {
    return `${report.indexValue} (manual)`;
  }
  const { source, fetchDate } = report.provenance;
  return `${report.indexValue} (${describeSource(source)}, ${formatSlashDate(fetchDate)})`;
}

export function formatReportOutput(report: GeohashReport): string {
  const links = buildMapLinks(report.coordinate);
  const title = report.mode === 'global' ? 'Globalhash' : 'Geohash';

  return [
    formatAlignedLine('Latitude:', report.coordinate.lat),
    formatAlignedLine('Longitude:', report.coordinate.lon),
    '',
    'Google Maps:',
    `\t${links.googleMaps}`,
    'OpenStreetMap:',
    `\t${links.openStreetMap}`,
    '',
    `${title} for ${formatIsoDate(report.date)}${report.centicule ? ' (centicule)' : ''}`,
    `Dow Jones: ${describeProvenance(report)}`,
    `30W rule:  ${report.compliance}`,
  ].join('\n');
}

export function toGeohashReportData(report: GeohashReport): GeohashReportData {
  const data: GeohashReportData = {
    mode: report.mode,
    latitude: report.coordinate.lat,
    longitude: report.coordinate.lon,
    date: formatIsoDate(report.date),
    indexValue: report.indexValue,
    indexSource: report.provenance.kind,
    compliance: report.compliance,
    graticule: { latitude: report.graticule.lat, longitude: report.graticule.lon },
    digest: report.digest,
    centicule: report.centicule,
    links: buildMapLinks(report.coordinate),
  };

  if (report.provenance.kind === 'fetched') {
    data.source = report.provenance.source;
    data.fetchDate = formatIsoDate(report.provenance.fetchDate);
  }

  return data;
}
