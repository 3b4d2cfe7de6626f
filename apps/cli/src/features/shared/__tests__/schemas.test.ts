import { describe, expect, it } from 'vitest';

import { GeohashCommandOptionsSchema } from '../schemas.js';

describe('GeohashCommandOptionsSchema', () => {
  it('should accept the options commander produces', () => {
    const result = GeohashCommandOptionsSchema.safeParse({
      date: '2005-05-26',
      dowJones: '10458.68',
      '30w': 'east',
      simple: true,
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ date: '2005-05-26', dowJones: '10458.68', '30w': 'east', simple: true });
    }
  });

  it('should reject unknown compliance values', () => {
    expect(GeohashCommandOptionsSchema.safeParse({ '30w': 'north' }).success).toBe(false);
  });

  it('should reject conflicting index values', () => {
    const result = GeohashCommandOptionsSchema.safeParse({ dowJones: '10458.68', dj: '10000' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Cannot specify different values for --dow-jones and --dj');
    }
  });

  it('should reject --json together with --simple', () => {
    const result = GeohashCommandOptionsSchema.safeParse({ json: true, simple: true });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Cannot specify both --json and --simple');
    }
  });
});
