/**
 * Wiring shared by the commands that touch stored sessions
 */

import type { ILogObj, Logger } from "tslog";
import { loadConfig, type LoadConfigOptions } from "../config/loader.js";
import type { IntakeConfig } from "../config/schema.js";
import { PlanningCoordinator } from "../planning/coordinator.js";
import { HeuristicPlanningProvider } from "../planning/heuristic-provider.js";
import { IntakeLifecycle } from "../sessions/lifecycle.js";
import { SessionStore } from "../sessions/storage.js";
import { initializeLogging } from "../utils/logger.js";

export interface RuntimeOptions extends LoadConfigOptions {
  /** Project config file (-c, --config) */
  config?: string;
}

export interface IntakeRuntime {
  config: IntakeConfig;
  logger: Logger<ILogObj>;
  store: SessionStore;
  /** Absent when planning.enabled is false */
  coordinator?: PlanningCoordinator;
  lifecycle: IntakeLifecycle;
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<IntakeRuntime> {
  const config = await loadConfig(options.config, options);

  const logger = initializeLogging({
    level: config.logging.level,
    logToFile: config.logging.logToFile,
    logDir: config.logging.logDir,
  });

  const store = new SessionStore({
    storageDir: config.sessions.storageDir,
    maxSessions: config.sessions.maxSessions,
    logger,
  });

  const coordinator = config.planning.enabled
    ? new PlanningCoordinator(new HeuristicPlanningProvider(), {
        stepTimeoutMs: config.planning.stepTimeoutMs,
        logger,
      })
    : undefined;

  const lifecycle = new IntakeLifecycle({
    store,
    coordinator,
    readinessThreshold: config.readiness.threshold,
    logger,
  });

  return { config, logger, store, coordinator, lifecycle };
}
