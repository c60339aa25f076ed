/**
 * Configuration loader for the intake engine
 *
 * Sources, lowest priority first:
 * 1. Built-in defaults
 * 2. Global config (~/.intake/config.json), lenient
 * 3. Project config (<cwd>/.intake/config.json, or INTAKE_CONFIG_PATH), strict
 * 4. INTAKE_LOG_LEVEL
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import {
  createDefaultConfig,
  IntakeConfigSchema,
  PartialIntakeConfigSchema,
  type IntakeConfig,
  type PartialIntakeConfig,
} from "./schema.js";
import { CONFIG_PATHS, getProjectConfigPath } from "./paths.js";
import { ConfigError, type ConfigIssue } from "../utils/errors.js";
import { getLogger, isLogLevel } from "../utils/logger.js";
import type { z } from "zod";

export interface LoadConfigOptions {
  /** Working directory for the project config */
  cwd?: string;
  /** Override of ~/.intake/config.json */
  globalConfigPath?: string;
  env?: NodeJS.ProcessEnv;
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    message: i.message,
  }));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Load configuration from all sources
 *
 * @param configPath - Explicit project config; takes precedence over INTAKE_CONFIG_PATH
 */
export async function loadConfig(
  configPath?: string,
  options: LoadConfigOptions = {},
): Promise<IntakeConfig> {
  const env = options.env ?? process.env;
  let config = createDefaultConfig();

  const globalConfig = await loadConfigFile(options.globalConfigPath ?? CONFIG_PATHS.config, {
    strict: false,
  });
  if (globalConfig) {
    config = mergeConfig(config, globalConfig);
  }

  const projectConfigPath =
    configPath ?? env["INTAKE_CONFIG_PATH"] ?? getProjectConfigPath(options.cwd);
  const projectConfig = await loadConfigFile(projectConfigPath);
  if (projectConfig) {
    config = mergeConfig(config, projectConfig);
  }

  const envLevel = env["INTAKE_LOG_LEVEL"]?.toLowerCase();
  if (envLevel) {
    if (isLogLevel(envLevel)) {
      config = mergeConfig(config, { logging: { level: envLevel } });
    } else {
      getLogger().warn(`Ignoring unknown INTAKE_LOG_LEVEL "${envLevel}"`);
    }
  }

  const result = IntakeConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", { issues: toIssues(result.error) });
  }
  return result.data;
}

/**
 * Load a single config file, returning null if not found
 *
 * A lenient load ignores a file that does not validate instead of throwing.
 */
export async function loadConfigFile(
  configPath: string,
  options: { strict?: boolean } = {},
): Promise<PartialIntakeConfig | null> {
  const { strict = true } = options;

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw new ConfigError("Failed to load configuration", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    if (!strict) {
      getLogger().warn(`Ignoring unparseable config at ${configPath}`);
      return null;
    }
    throw new ConfigError("Configuration is not valid JSON5", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = PartialIntakeConfigSchema.strict().safeParse(parsed);
  if (!result.success) {
    if (!strict) {
      getLogger().warn(`Ignoring invalid config at ${configPath}`);
      return null;
    }
    throw new ConfigError("Invalid configuration", {
      issues: toIssues(result.error),
      configPath,
    });
  }

  return result.data;
}

/**
 * Merge a partial config over a complete one, section by section
 */
export function mergeConfig(base: IntakeConfig, override: PartialIntakeConfig): IntakeConfig {
  return {
    readiness: { ...base.readiness, ...override.readiness },
    planning: { ...base.planning, ...override.planning },
    sessions: { ...base.sessions, ...override.sessions },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Save configuration to file
 *
 * @param configPath - Path to save to (defaults to the project config)
 * @param global - If true, saves to the global config instead
 */
export async function saveConfig(
  config: IntakeConfig,
  configPath?: string,
  global: boolean = false,
): Promise<string> {
  const resolvedPath =
    configPath ?? (global ? CONFIG_PATHS.config : getProjectConfigPath());

  const result = IntakeConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError("Cannot save invalid configuration", {
      issues: toIssues(result.error),
      configPath: resolvedPath,
    });
  }

  await fs.mkdir(path.dirname(resolvedPath), { recursive: true });
  await fs.writeFile(resolvedPath, JSON.stringify(result.data, null, 2), "utf-8");
  return resolvedPath;
}
