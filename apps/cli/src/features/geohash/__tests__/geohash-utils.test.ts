import { InvalidCoordinateError, InvalidDateFormatError, MissingCoordinateError } from '@geohashing/core';
import { describe, expect, it } from 'vitest';

import type { GeohashReport } from '../geohash-handler.js';
import {
  buildGeohashParams,
  buildMapLinks,
  formatCoordinateValue,
  formatReportOutput,
  formatSimpleOutput,
  parseCoordinate,
  parseLocation,
  toGeohashReportData,
} from '../geohash-utils.js';

import { FAKE_SOURCE } from './fake-index-fetcher.js';

const REFERENCE_COORDINATE = { lat: 37.857713267707005, lon: -122.54454306955928 };

function createReport(overrides: Partial<GeohashReport> = {}): GeohashReport {
  return {
    mode: 'graticule',
    coordinate: REFERENCE_COORDINATE,
    graticule: { lat: 37, lon: -122 },
    digest: 'db9318c2259923d08b672cb305440f97',
    date: { year: 2005, month: 5, day: 26 },
    indexValue: '10458.68',
    compliance: 'west',
    provenance: { kind: 'manual' },
    centicule: false,
    ...overrides,
  };
}

describe('parseCoordinate', () => {
  it('should parse decimal degrees', () => {
    expect(parseCoordinate('latitude', '37.421542')._unsafeUnwrap()).toBe(37.421542);
    expect(parseCoordinate('longitude', ' -122.085589 ')._unsafeUnwrap()).toBe(-122.085589);
    expect(parseCoordinate('longitude', '+.5')._unsafeUnwrap()).toBe(0.5);
  });

  it('should keep negative zero', () => {
    expect(Object.is(parseCoordinate('latitude', '-0')._unsafeUnwrap(), -0)).toBe(true);
  });

  it('should reject text that is not a decimal number', () => {
    for (const input of ['north', '', '0x10', '1,5', '1e400']) {
      const result = parseCoordinate('latitude', input);

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toBeInstanceOf(InvalidCoordinateError);
    }
  });
});

describe('parseLocation', () => {
  it('should report every missing coordinate', () => {
    const error = parseLocation({})._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(MissingCoordinateError);
    expect(error.message).toBe('Missing latitude and longitude: a graticule geohash needs both latitude and longitude.');
  });

  it('should report a missing longitude', () => {
    expect(parseLocation({ latitude: '37.4' })._unsafeUnwrapErr().message).toBe(
      'Missing longitude: a graticule geohash needs both latitude and longitude.'
    );
  });
});

describe('buildGeohashParams', () => {
  it('should build graticule parameters', () => {
    const params = buildGeohashParams(
      { latitude: '37.421542', longitude: '-122.085589' },
      { date: '2005-05-26', dowJones: '10458.68', '30w': 'e' }
    );

    expect(params._unsafeUnwrap()).toEqual({
      mode: 'graticule',
      location: { lat: 37.421542, lon: -122.085589 },
      date: { year: 2005, month: 5, day: 26 },
      indexValue: '10458.68',
      compliance: 'east',
      centiculeOf: undefined,
    });
  });

  it('should accept --dj as the index value', () => {
    const params = buildGeohashParams({ latitude: '1', longitude: '2' }, { dj: '12620.90' });

    expect(params.isOk() && params.value.indexValue).toBe('12620.90');
  });

  it('should not need coordinates for the globalhash', () => {
    expect(buildGeohashParams({}, { global: true })._unsafeUnwrap()).toEqual({ mode: 'global' });
  });

  it('should need coordinates for a centicule globalhash', () => {
    expect(buildGeohashParams({}, { global: true, centicule: true })._unsafeUnwrapErr()).toBeInstanceOf(
      MissingCoordinateError
    );

    expect(
      buildGeohashParams({ latitude: '37.3', longitude: '-122.4' }, { global: true, centicule: true })._unsafeUnwrap()
    ).toEqual({ mode: 'global', centiculeOf: { lat: 37.3, lon: -122.4 } });
  });

  it('should reject impossible dates', () => {
    const params = buildGeohashParams({ latitude: '1', longitude: '2' }, { date: '2005-02-30' });

    expect(params._unsafeUnwrapErr()).toBeInstanceOf(InvalidDateFormatError);
    expect(params._unsafeUnwrapErr().message).toBe('The date provided was not in YYYY-MM-DD format.');
  });

  it('should reject missing coordinates in graticule mode', () => {
    expect(buildGeohashParams({ latitude: '37.4' }, {})._unsafeUnwrapErr()).toBeInstanceOf(MissingCoordinateError);
  });
});

describe('formatCoordinateValue', () => {
  it('should print the shortest round-trip digits', () => {
    expect(formatCoordinateValue(37.857713267707005)).toBe('37.857713267707005');
    expect(formatCoordinateValue(-122.54454306955928)).toBe('-122.54454306955928');
    expect(formatCoordinateValue(37)).toBe('37');
  });

  it('should never use exponent notation', () => {
    expect(formatCoordinateValue(1e-7)).toBe('0.0000001');
    expect(formatCoordinateValue(-1.5e-10)).toBe('-0.00000000015');
  });
});

describe('buildMapLinks', () => {
  it('should link Google Maps and OpenStreetMap', () => {
    expect(buildMapLinks(REFERENCE_COORDINATE)).toEqual({
      googleMaps: 'https://www.google.com/maps/search/?api=1&query=37.857713267707005,-122.54454306955928',
      openStreetMap: 'https://www.openstreetmap.org/?mlat=37.857713267707005&mlon=-122.54454306955928&zoom=10',
    });
  });
});

describe('formatSimpleOutput', () => {
  it('should print latitude and longitude on separate lines', () => {
    expect(formatSimpleOutput(REFERENCE_COORDINATE)).toBe('37.857713267707005\n-122.54454306955928');
  });
});

describe('formatReportOutput', () => {
  it('should align the coordinates and list the map links', () => {
    expect(formatReportOutput(createReport()).split('\n')).toEqual([
      'Latitude:   37.857713267707005',
      'Longitude: -122.54454306955928',
      '',
      'Google Maps:',
      '\thttps://www.google.com/maps/search/?api=1&query=37.857713267707005,-122.54454306955928',
      'OpenStreetMap:',
      '\thttps://www.openstreetmap.org/?mlat=37.857713267707005&mlon=-122.54454306955928&zoom=10',
      '',
      'Geohash for 2005-05-26',
      'Dow Jones: 10458.68 (manual)',
      '30W rule:  west',
    ]);
  });

  it('should pad a negative latitude and positive longitude the other way round', () => {
    const lines = formatReportOutput(createReport({ coordinate: { lat: -33.5, lon: 151.25 } })).split('\n');

    expect(lines[0]).toBe('Latitude:  -33.5');
    expect(lines[1]).toBe('Longitude:  151.25');
  });

  it('should name the source and day of a fetched index value', () => {
    const report = createReport({
      mode: 'global',
      centicule: true,
      compliance: 'east',
      provenance: { kind: 'fetched', source: FAKE_SOURCE, fetchDate: { year: 2005, month: 5, day: 25 } },
    });
    const lines = formatReportOutput(report).split('\n');

    expect(lines.slice(-3)).toEqual([
      'Globalhash for 2005-05-26 (centicule)',
      'Dow Jones: 10458.68 (djia.example.test, 2005/05/25)',
      '30W rule:  east',
    ]);
  });
});

describe('toGeohashReportData', () => {
  it('should flatten a manual report', () => {
    expect(toGeohashReportData(createReport())).toEqual({
      mode: 'graticule',
      latitude: 37.857713267707005,
      longitude: -122.54454306955928,
      date: '2005-05-26',
      indexValue: '10458.68',
      indexSource: 'manual',
      compliance: 'west',
      graticule: { latitude: 37, longitude: -122 },
      digest: 'db9318c2259923d08b672cb305440f97',
      centicule: false,
      links: buildMapLinks(REFERENCE_COORDINATE),
    });
  });

  it('should include the source of a fetched value', () => {
    const data = toGeohashReportData(
      createReport({
        provenance: { kind: 'fetched', source: FAKE_SOURCE, fetchDate: { year: 2005, month: 5, day: 26 } },
      })
    );

    expect(data.indexSource).toBe('fetched');
    expect(data.source).toBe(FAKE_SOURCE);
    expect(data.fetchDate).toBe('2005-05-26');
  });
});
