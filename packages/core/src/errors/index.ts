/**
 * Domain errors for geohash computation.
 *
 * Each carries a stable machine-readable `code` so callers (the CLI, JSON
 * output) can branch on the kind of failure without matching messages.
 */

export type GeohashErrorCode =
  | 'INVALID_COORDINATE'
  | 'INVALID_DATE_FORMAT'
  | 'MISSING_COORDINATE'
  | 'SOURCE_UNAVAILABLE';

export abstract class GeohashError extends Error {
  abstract readonly code: GeohashErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * A user-supplied date that is not a real YYYY-MM-DD calendar date
 */
export class InvalidDateFormatError extends GeohashError {
  readonly code = 'INVALID_DATE_FORMAT';

  constructor(public readonly input: string) {
    super('The date provided was not in YYYY-MM-DD format.');
  }
}

/**
 * A latitude or longitude argument that is not a decimal number
 */
export class InvalidCoordinateError extends GeohashError {
  readonly code = 'INVALID_COORDINATE';

  constructor(
    public readonly axis: 'latitude' | 'longitude',
    public readonly input: string
  ) {
    super(`The ${axis} provided was not a decimal number: "${input}".`);
  }
}

/**
 * Graticule mode requested without both coordinates
 */
export class MissingCoordinateError extends GeohashError {
  readonly code = 'MISSING_COORDINATE';

  constructor(public readonly missing: readonly ('latitude' | 'longitude')[]) {
    super(`Missing ${missing.join(' and ')}: a graticule geohash needs both latitude and longitude.`);
  }
}

/**
 * Every index source failed or had no data for the requested day
 */
export class SourceUnavailableError extends GeohashError {
  readonly code = 'SOURCE_UNAVAILABLE';

  constructor(
    public readonly fetchDate: string,
    public readonly sources: readonly string[],
    options?: ErrorOptions
  ) {
    super(
      `None of the Dow Jones sources are online, or no data exists for ${fetchDate} yet ` +
        `(tried ${sources.length}: ${sources.join(', ')}). Try providing the value manually.`,
      options
    );
  }
}

export function isGeohashError(error: unknown): error is GeohashError {
  return error instanceof GeohashError;
}
