/**
 * intake-engine: business classification and progress scoring for
 * conversational intake flows
 *
 * Each turn: merge extracted facts → classify the business (until a
 * profile is accepted) → score progress → decide the phase → persist, and
 * start background planning once the facts allow it.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Classification
export {
  BUSINESS_CATEGORIES,
  BUSINESS_MODELS,
  PROBLEM_PATTERNS,
  classifyBusiness,
  extractSignals,
  getPatternTable,
  loadPatternTable,
  scoreCategory,
  shouldAcceptProfile,
  PROFILE_ACCEPTANCE_THRESHOLD,
  UNKNOWN_CATEGORY_THRESHOLD,
} from "./classifier/index.js";
export type {
  BusinessCategory,
  BusinessModel,
  BusinessProfile,
  PatternTable,
} from "./classifier/index.js";

// Scoring
export {
  FactMapSchema,
  FactUpdateSchema,
  calculateProgress,
  findInformationGaps,
  getInformationSchema,
  loadInformationSchema,
  mergeFacts,
  scoreField,
  detectComprehensiveInfo,
} from "./scoring/index.js";
export type {
  FactMap,
  FactUpdate,
  FactValue,
  InformationGap,
  InformationSchema,
  ProgressResult,
} from "./scoring/index.js";

// Phases
export {
  PHASES,
  DEFAULT_READINESS_THRESHOLD,
  evaluatePhase,
  phaseForProgress,
  isReadyForGeneration,
  shouldBuild,
  detectBuildTrigger,
} from "./phases/index.js";
export type { Phase, PhaseDecision, PhaseInput } from "./phases/index.js";

// Background planning
export {
  PlanningCoordinator,
  HeuristicPlanningProvider,
  isPlanningEligible,
  transitionStatus,
  createIdleStatus,
} from "./planning/index.js";
export type {
  BackgroundPlanStatus,
  Plan,
  PlanningInput,
  PlanningProvider,
  PlanStatusChange,
} from "./planning/index.js";

// Sessions
export { IntakeLifecycle, SessionStore, createSessionStore } from "./sessions/index.js";
export type {
  IntakeSession,
  SessionMetadata,
  TurnInput,
  TurnResult,
} from "./sessions/index.js";

// Configuration
export { loadConfig, saveConfig, createDefaultConfig } from "./config/index.js";
export type { IntakeConfig } from "./config/index.js";

// Errors
export {
  IntakeError,
  ConfigError,
  FileSystemError,
  ValidationError,
  SessionError,
  PlanningError,
  TimeoutError,
  isIntakeError,
  formatError,
} from "./utils/errors.js";

// Logging
export { createLogger, setLogger, getLogger } from "./utils/logger.js";
