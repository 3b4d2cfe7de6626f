export * from './geo/types.js';
export * from './geo/calendar-date.js';
export * from './errors/index.js';
export * from './utils/type-guard-utils.js';
