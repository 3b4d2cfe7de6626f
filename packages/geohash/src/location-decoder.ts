/**
 * Digest → coordinate decoding
 *
 * Each 16-hex-digit half of the digest is read as the base-16 fraction 0.h,
 * rounded to the nearest double, and written back out as the shortest decimal
 * that round-trips. Those decimal digits replace the fractional part of the
 * graticule, so the visible digits depend on standard double formatting.
 */

import type { Coordinate, Graticule } from '@geohashing/core';
import { Decimal } from 'decimal.js';

import { DIGEST_PATTERN } from './digest.js';

const TWO_POW_64 = 2 ** 64;

// Largest double below m is m * (1 - 2^-53) for any m >= 1
const PREDECESSOR_FACTOR = 1 - Number.EPSILON / 2;

/**
 * Truncate a coordinate toward zero. Inputs in (-1, 0) give the -0 graticule.
 */
export function toGraticule(lat: number, lon: number): Graticule {
  return { lat: Math.trunc(lat), lon: Math.trunc(lon) };
}

export function splitDigest(digest: string): [latHalf: string, lonHalf: string] {
  if (!DIGEST_PATTERN.test(digest)) {
    throw new Error(`Invalid digest: expected 32 lowercase hex characters, got "${digest}"`);
  }
  return [digest.slice(0, 16), digest.slice(16)];
}

/**
 * Value of 0.<half> in base 16, in [0, 1).
 *
 * Number(BigInt) rounds half-to-even like any correctly rounded hex parse;
 * dividing by 2^64 is then exact. A half within 2^-54 of 1 rounds up to 1.0,
 * whose fractional digits are zero, so it maps to 0.
 */
export function digestHalfToOffset(half: string): number {
  const offset = Number(BigInt(`0x${half}`)) / TWO_POW_64;
  return offset < 1 ? offset : 0;
}

/**
 * Shortest round-trip decimal of the offset without the leading zero,
 * never in exponent form: 0.5 → ".5", 1.5e-10 → ".00000000015", 0 → ".0"
 */
export function formatFractionText(offset: number): string {
  const text = new Decimal(offset).toFixed();
  const point = text.indexOf('.');
  return point === -1 ? '.0' : text.slice(point);
}

function formatGraticuleComponent(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

/**
 * Append fraction digits to a graticule component and parse the result.
 * Parsing can round up to the next integer when the fraction is within half
 * an ulp of 1; that value is pulled back to the largest double in the cell.
 */
export function spliceFraction(component: number, fractionText: string): number {
  const value = Number(`${formatGraticuleComponent(component)}${fractionText}`);
  const ceiling = Math.abs(component) + 1;

  if (Math.abs(value) < ceiling) {
    return value;
  }
  const clamped = ceiling * PREDECESSOR_FACTOR;
  return value < 0 ? -clamped : clamped;
}

export function decodeLocation(graticule: Graticule, digest: string): Coordinate {
  const [latHalf, lonHalf] = splitDigest(digest);

  return {
    lat: spliceFraction(graticule.lat, formatFractionText(digestHalfToOffset(latHalf))),
    lon: spliceFraction(graticule.lon, formatFractionText(digestHalfToOffset(lonHalf))),
  };
}

/**
 * Stretch a (0, 0)-graticule hash over the whole globe:
 * lat → [-90, 90), lon → [-180, 180)
 */
export function rescaleToGlobe(coordinate: Coordinate): Coordinate {
  return {
    lat: coordinate.lat * 180 - 90,
    lon: coordinate.lon * 360 - 180,
  };
}
