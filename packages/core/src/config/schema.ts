import { z } from 'zod';
import { DEFAULT_CONCURRENCY, DEFAULT_THRESHOLDS } from '../constants.js';

/**
 * Complexity limits for one run. A function is flagged when any metric is
 * strictly greater than its limit.
 */
export interface Thresholds {
  cyclomaticLimit: number;
  cognitiveLimit: number;
  nestingLimit: number;
  lineLimit: number;
}

const limit = z.number().int().positive();

const thresholdsSchema = z
  .object({
    cyclomatic: limit.default(DEFAULT_THRESHOLDS.cyclomaticLimit),
    cognitive: limit.default(DEFAULT_THRESHOLDS.cognitiveLimit),
    nesting: limit.default(DEFAULT_THRESHOLDS.nestingLimit),
    lines: limit.default(DEFAULT_THRESHOLDS.lineLimit),
  })
  .strict()
  .default({});

/**
 * Schema for `.tangle.yml`.
 *
 * ```yaml
 * thresholds: { cyclomatic: 10, cognitive: 15, nesting: 3, lines: 50 }
 * exclude: ["**\/*.test.ts"]
 * concurrency: 8
 * ```
 */
export const configSchema = z
  .object({
    thresholds: thresholdsSchema,
    exclude: z.array(z.string()).default([]),
    concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  })
  .strict();

/** Raw file contents as written in YAML */
export type TangleConfigInput = z.input<typeof configSchema>;

/**
 * Resolved configuration for a run.
 */
export interface TangleConfig {
  thresholds: Thresholds;
  exclude: string[];
  concurrency: number;
}

/**
 * Map the validated file format onto the engine's threshold names.
 */
export function toTangleConfig(parsed: z.output<typeof configSchema>): TangleConfig {
  return {
    thresholds: {
      cyclomaticLimit: parsed.thresholds.cyclomatic,
      cognitiveLimit: parsed.thresholds.cognitive,
      nestingLimit: parsed.thresholds.nesting,
      lineLimit: parsed.thresholds.lines,
    },
    exclude: parsed.exclude,
    concurrency: parsed.concurrency,
  };
}

/** Configuration used when no `.tangle.yml` exists */
export function defaultConfig(): TangleConfig {
  return toTangleConfig(configSchema.parse({}));
}
