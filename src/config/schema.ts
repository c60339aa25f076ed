/**
 * Configuration schema for the intake engine
 */

import { z } from "zod";
import { CONFIG_PATHS } from "./paths.js";

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

/**
 * Readiness gate
 */
export const ReadinessConfigSchema = z.object({
  threshold: z.number().min(0).max(100).default(85),
});

export type ReadinessConfig = z.infer<typeof ReadinessConfigSchema>;

/**
 * Background planning
 */
export const PlanningConfigSchema = z.object({
  enabled: z.boolean().default(true),
  stepTimeoutMs: z.number().int().min(1000).default(120000),
});

export type PlanningConfig = z.infer<typeof PlanningConfigSchema>;

/**
 * Session storage
 */
export const SessionsConfigSchema = z.object({
  storageDir: z.string().min(1).default(CONFIG_PATHS.sessions),
  maxSessions: z.number().int().min(1).default(50),
  retentionDays: z.number().int().min(1).max(3650).default(30),
});

export type SessionsConfig = z.infer<typeof SessionsConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
  logToFile: z.boolean().default(false),
  logDir: z.string().min(1).default(CONFIG_PATHS.logs),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Complete configuration schema
 */
export const IntakeConfigSchema = z.object({
  readiness: ReadinessConfigSchema.default({}),
  planning: PlanningConfigSchema.default({}),
  sessions: SessionsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type IntakeConfig = z.infer<typeof IntakeConfigSchema>;

/**
 * Shape of a config file: every key optional, no defaults filled in, so a
 * merge only sees what the file actually sets
 */
export const PartialIntakeConfigSchema = z.object({
  readiness: ReadinessConfigSchema.partial().optional(),
  planning: PlanningConfigSchema.partial().optional(),
  sessions: SessionsConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type PartialIntakeConfig = z.infer<typeof PartialIntakeConfigSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): {
  success: boolean;
  data?: IntakeConfig;
  error?: z.ZodError;
} {
  const result = IntakeConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Create default configuration
 */
export function createDefaultConfig(): IntakeConfig {
  return IntakeConfigSchema.parse({});
}
