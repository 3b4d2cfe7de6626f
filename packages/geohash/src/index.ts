export { adjustCenticule, replaceTenths, tenthsDigit } from './centicule.js';
export {
  GLOBAL_COMPLIANCE,
  parseComplianceOverride,
  resolveCompliance,
  resolveFetchDate,
  THIRTY_WEST_LONGITUDE,
} from './compliance.js';
export { computeDigest, DIGEST_PATTERN, formatHashInput } from './digest.js';
export { GeohashService } from './geohash-service.js';
export {
  decodeLocation,
  digestHalfToOffset,
  formatFractionText,
  rescaleToGlobe,
  spliceFraction,
  splitDigest,
  toGraticule,
} from './location-decoder.js';
export type { GeohashQuery, GeohashResult, GlobalhashQuery, HashMode, IndexProvenance } from './types.js';
