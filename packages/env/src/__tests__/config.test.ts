import { describe, expect, it } from 'vitest';

import { parseEnv } from '../config.js';

describe('parseEnv', () => {
  it('should default NODE_ENV and leave the log level unset', () => {
    expect(parseEnv({})).toEqual({ NODE_ENV: 'development' });
  });

  it('should accept a known log level', () => {
    const env = parseEnv({ GEOHASH_LOG_LEVEL: 'debug', NODE_ENV: 'test' });

    expect(env.GEOHASH_LOG_LEVEL).toBe('debug');
    expect(env.NODE_ENV).toBe('test');
  });

  it('should ignore unrelated variables', () => {
    expect(parseEnv({ HOME: '/home/test', PATH: '/usr/bin' })).toEqual({ NODE_ENV: 'development' });
  });

  it('should list every invalid variable in the error', () => {
    expect(() => parseEnv({ GEOHASH_LOG_LEVEL: 'loud', NODE_ENV: 'staging' })).toThrow(
      /Environment validation failed:\n {2}- GEOHASH_LOG_LEVEL: .*\n {2}- NODE_ENV: /
    );
  });
});
