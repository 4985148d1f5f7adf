/**
 * Configuration schema.
 */

import { z } from "zod";
import { LOG_LEVELS } from "../../utils/logger.js";

export const SchedulerConfigSchema = z.object({
  /** Longest gap between two due-job checks */
  tickIntervalMs: z.coerce.number().int().positive().default(1000),
  /** Concurrent command workers */
  workers: z.coerce.number().int().positive().default(4),
  /** Bound on a single command run */
  commandTimeoutMs: z.coerce.number().int().positive().default(300_000),
  /** Forward window for cron searches */
  cronSearchYears: z.coerce.number().int().positive().max(100).default(4),
  /** IANA timezone for cron triggers built by the scheduler helpers */
  timezone: z.string().min(1).optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
});

export const ConfigSchema = z.object({
  scheduler: SchedulerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AppConfig = z.infer<typeof ConfigSchema>;
