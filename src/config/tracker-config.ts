import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const targetSchema = z.object({
  categoryName: z.string().min(1),
  seriesName: z.string().min(1),
});

export const trackerConfigSchema = z.object({
  targets: z.array(targetSchema).min(1),
  verificationTiers: z.array(z.string().min(1)).default(['Grail', 'Chase']),
  staticPackCostsCents: z.record(z.string(), z.number().int().nonnegative()).default({}),
  buyback: z
    .object({
      floorRatio: z.number().nonnegative().default(0.8),
      costMarkupRatio: z.number().nonnegative().default(1.1),
    })
    .default({}),
});

export type SeriesTarget = z.infer<typeof targetSchema>;
export type TrackerConfig = z.infer<typeof trackerConfigSchema>;

/**
 * Validate a raw tracker config object. Throws ConfigurationError with the
 * flattened zod issues when the shape is wrong.
 */
export function parseTrackerConfig(raw: unknown): TrackerConfig {
  const result = trackerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid tracker configuration', {
      context: { issues: result.error.flatten() },
    });
  }
  return result.data;
}

export async function loadTrackerConfig(filePath: string): Promise<TrackerConfig> {
  const resolved = path.resolve(filePath);
  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read tracker configuration at ${resolved}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Tracker configuration at ${resolved} is not valid JSON`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  return parseTrackerConfig(raw);
}
