import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

export const COMPLIANCE_CHOICES = ['e', 'w', 'east', 'west'] as const;

/**
 * Geohash command options (validated at CLI boundary)
 */
export const GeohashCommandOptionsSchema = z
  .object({
    date: z.string().optional(),
    dowJones: z.string().min(1, '--dow-jones needs a value').optional(),
    dj: z.string().min(1, '--dj needs a value').optional(),
    '30w': z.enum(COMPLIANCE_CHOICES).optional(),
    global: z.boolean().optional(),
    simple: z.boolean().optional(),
    centicule: z.boolean().optional(),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape)
  .refine((data) => !(data.dowJones !== undefined && data.dj !== undefined && data.dowJones !== data.dj), {
    message: 'Cannot specify different values for --dow-jones and --dj',
  })
  .refine((data) => !(data.json && data.simple), {
    message: 'Cannot specify both --json and --simple',
  });

export type GeohashCommandOptions = z.infer<typeof GeohashCommandOptionsSchema>;
