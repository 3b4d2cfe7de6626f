export * from './client.js';

export * from './types.js';

export * from './core/http-utils.js';
export * from './core/types.js';
