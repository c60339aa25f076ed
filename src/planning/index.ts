/**
 * Background planning
 */

export * from "./types.js";
export * from "./status.js";
export * from "./eligibility.js";
export {
  PlanningCoordinator,
  DEFAULT_STEP_TIMEOUT_MS,
  type PlanStatusChange,
  type PlanStatusListener,
  type PlanningCoordinatorOptions,
} from "./coordinator.js";
export {
  HeuristicPlanningProvider,
  PlanTemplatesSchema,
  getPlanTemplates,
  type PlanTemplates,
} from "./heuristic-provider.js";
