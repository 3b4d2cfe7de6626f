import { addDays, type CalendarDate, type ComplianceFlag } from '@geohashing/core';

/** Longitudes strictly greater than this are east of the 30W line */
export const THIRTY_WEST_LONGITUDE = -30;

/** Globalhash always uses the eastern (previous day) index value */
export const GLOBAL_COMPLIANCE: ComplianceFlag = 'east';

/**
 * Classify a longitude under the 30W rule. An explicit override wins unconditionally.
 */
export function resolveCompliance(lon: number, override?: ComplianceFlag): ComplianceFlag {
  if (override !== undefined) {
    return override;
  }
  return lon > THIRTY_WEST_LONGITUDE ? 'east' : 'west';
}

/**
 * Day whose index value must be fetched. Eastern locations use the previous
 * day's opening; the hashed date itself never shifts.
 */
export function resolveFetchDate(date: CalendarDate, compliance: ComplianceFlag): CalendarDate {
  return compliance === 'east' ? addDays(date, -1) : date;
}

const COMPLIANCE_ALIASES = new Map<string, ComplianceFlag>([
  ['e', 'east'],
  ['east', 'east'],
  ['w', 'west'],
  ['west', 'west'],
]);

/**
 * Read a user-supplied 30W override ("e", "east", "w", "west"; any case).
 * Returns undefined for anything else.
 */
export function parseComplianceOverride(text: string): ComplianceFlag | undefined {
  return COMPLIANCE_ALIASES.get(text.trim().toLowerCase());
}
