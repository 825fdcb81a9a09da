/**
 * Runtime validation schemas for CLI command options
 *
 * Uses Zod for type-safe runtime validation of Commander.js options.
 */

import { z } from "zod";
import { PIPELINE_KINDS } from "../../pipeline/types.js";

/**
 * Integer in [1, max]
 *
 * @param name - Option name used in the error message
 * @param max - Largest accepted value
 */
function positiveInt(name: string, max: number) {
  return z
    .number()
    .int()
    .min(1)
    .max(max)
    .refine((n) => !isNaN(n), {
      message: `${name} must be a valid number between 1-${max}`,
    });
}

/**
 * Schema for ingest command options
 */
export const IngestCommandOptionsSchema = z.object({
  // Detected from the file extension when omitted
  format: z.string().min(1).optional(),
  pipeline: z.enum(PIPELINE_KINDS).optional(),
  strict: z.boolean().optional(),
  timeout: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : undefined))
    .pipe(positiveInt("timeout", 86_400_000).optional()),
  json: z.boolean().optional(),
});

/**
 * Schema for stats command options
 */
export const StatsCommandOptionsSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Schema for visualize command options
 */
export const VisualizeCommandOptionsSchema = z.object({
  limit: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : 100))
    .pipe(positiveInt("limit", 1000)),
  json: z.boolean().optional(),
});

/**
 * Schema for clear command options
 */
export const ClearCommandOptionsSchema = z.object({
  force: z.boolean().optional(),
});

export type IngestCommandOptions = z.infer<typeof IngestCommandOptionsSchema>;
export type StatsCommandOptions = z.infer<typeof StatsCommandOptionsSchema>;
export type VisualizeCommandOptions = z.infer<typeof VisualizeCommandOptionsSchema>;
export type ClearCommandOptions = z.infer<typeof ClearCommandOptionsSchema>;
