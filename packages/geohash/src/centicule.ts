import type { Coordinate } from '@geohashing/core';
import { Decimal } from 'decimal.js';

// Exact decimal arithmetic on shortest double renderings (at most 17 significant digits)
const CenticuleDecimal = Decimal.clone({ precision: 40 });

/**
 * First digit after the decimal point of |value| as it is displayed
 */
export function tenthsDigit(value: number): number {
  return new CenticuleDecimal(value).abs().times(10).floor().mod(10).toNumber();
}

/**
 * Put the tenths digit of `src` into `dst`.
 * Works on the decimal digits of `dst` arithmetically: only the tenths
 * position changes, the integer part and every later digit stay as they are.
 */
export function replaceTenths(dst: number, src: number): number {
  const target = new CenticuleDecimal(dst);
  const delta = new CenticuleDecimal(tenthsDigit(src) - tenthsDigit(dst)).dividedBy(10);
  const magnitude = target.abs().plus(delta);

  return (target.isNegative() ? magnitude.negated() : magnitude).toNumber();
}

/**
 * Narrow a computed hash to the centicule (0.1°×0.1° cell) of the original coordinate
 */
export function adjustCenticule(computed: Coordinate, original: Coordinate): Coordinate {
  return {
    lat: replaceTenths(computed.lat, original.lat),
    lon: replaceTenths(computed.lon, original.lon),
  };
}
