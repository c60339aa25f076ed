/**
 * Conversation phases
 */

export {
  DEFAULT_READINESS_THRESHOLD,
  PHASES,
  PHASE_DEFINITIONS,
  PROBLEM_FIELDS,
  evaluatePhase,
  hasRecognisedProblem,
  isReadyForGeneration,
  phaseForProgress,
  shouldBuild,
  type Phase,
  type PhaseDecision,
  type PhaseInput,
} from "./machine.js";

export { BUILD_TRIGGER_PHRASES, detectBuildTrigger } from "./triggers.js";
