import { createHash } from 'node:crypto';

import { formatIsoDate, type CalendarDate, type IndexValue } from '@geohashing/core';

export const DIGEST_PATTERN = /^[0-9a-f]{32}$/;

/**
 * Text that gets hashed: "YYYY-MM-DD-<index>"
 */
export function formatHashInput(date: CalendarDate, indexValue: IndexValue | number): string {
  return `${formatIsoDate(date)}-${String(indexValue)}`;
}

/**
 * MD5 of the date/index string as 32 lowercase hex characters.
 * The index value is hashed exactly as given; "12620.9" and "12620.90" differ.
 */
export function computeDigest(date: CalendarDate, indexValue: IndexValue | number): string {
  return createHash('md5').update(formatHashInput(date, indexValue), 'utf8').digest('hex');
}
