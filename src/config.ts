/**
 * Pipeline configuration: defaults, validation, and the command-line
 * capacity rule.
 */

import { z } from "zod";

export const MIN_CAPACITY = 1;
export const MAX_CAPACITY = 100_000;
export const DEFAULT_CAPACITY = 10;

export const PipelineConfigSchema = z.object({
  capacity: z.number().int().min(MIN_CAPACITY).max(MAX_CAPACITY).default(DEFAULT_CAPACITY),
  totalQuota: z.number().int().min(0).default(10_000),
  burstRangeMax: z.number().int().min(1).default(19),
  // Delays are in simulated nanoseconds.
  pacingDelay: z.number().min(0).finite().default(1000),
  serviceDelay: z.number().min(0).finite().default(100),
  pollInterval: z.number().positive().finite().default(100),
  seed: z.number().int().default(1),
  stopOnDrain: z.boolean().default(false),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/**
 * Fill in defaults and validate.
 * @throws ZodError when a supplied field is out of range.
 */
export function resolveConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return PipelineConfigSchema.parse(input);
}

/**
 * Command-line capacity rule: read the leading integer, fall back to the
 * default when there is none, then clamp into [MIN_CAPACITY, MAX_CAPACITY].
 */
export function clampCapacity(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_CAPACITY;

  const parsed = Number.parseInt(raw.trim(), 10);
  if (Number.isNaN(parsed)) return DEFAULT_CAPACITY;

  return Math.min(MAX_CAPACITY, Math.max(MIN_CAPACITY, parsed));
}
