/**
 * Configuration
 */

export {
  IntakeConfigSchema,
  PartialIntakeConfigSchema,
  LOG_LEVELS,
  createDefaultConfig,
  validateConfig,
  type IntakeConfig,
  type PartialIntakeConfig,
  type LoggingConfig,
  type PlanningConfig,
  type ReadinessConfig,
  type SessionsConfig,
} from "./schema.js";

export {
  loadConfig,
  loadConfigFile,
  mergeConfig,
  saveConfig,
  type LoadConfigOptions,
} from "./loader.js";

export { CONFIG_PATHS, INTAKE_HOME, PROJECT_CONFIG_DIR, getProjectConfigPath } from "./paths.js";
