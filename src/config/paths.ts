/**
 * Centralized configuration paths
 *
 * Global state lives in ~/.intake/; a project may override settings in
 * ./.intake/config.json.
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Base directory for global configuration and sessions
 */
export const INTAKE_HOME = join(homedir(), ".intake");

/** Directory name of the project-level override */
export const PROJECT_CONFIG_DIR = ".intake";

export const CONFIG_PATHS = {
  /** Base directory: ~/.intake/ */
  home: INTAKE_HOME,

  /** Global config file: ~/.intake/config.json */
  config: join(INTAKE_HOME, "config.json"),

  /** Session storage: ~/.intake/sessions/ */
  sessions: join(INTAKE_HOME, "sessions"),

  /** Log files: ~/.intake/logs/ */
  logs: join(INTAKE_HOME, "logs"),
} as const;

/**
 * Project config path for a working directory
 */
export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, PROJECT_CONFIG_DIR, "config.json");
}
