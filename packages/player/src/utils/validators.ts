/**
 * Zod schemas for runtime validation of player configuration
 */

import { z } from 'zod';

export const RepeatModeSchema = z.enum(['off', 'one']);

export const PlayerConfigSchema = z
  .object({
    volume: z.number().min(0).max(1).default(0.8),
    repeat: RepeatModeSchema.default('off'),
    shuffle: z.boolean().default(false),
    tickIntervalMs: z.number().int().positive().default(16),
  })
  .strict();

export type ResolvedPlayerConfig = z.output<typeof PlayerConfigSchema>;

/** Seek offsets and volume levels arrive from sliders; NaN and Infinity are rejected */
export const FiniteNumberSchema = z.number().finite();
