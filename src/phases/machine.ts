/**
 * Phase state machine
 *
 * Maps smoothed progress to a named conversation phase and decides when
 * the conversation is ready for generation or should start building now.
 */

import { isEmptyFactValue, type FactMap } from "../scoring/facts.js";
import { detectBuildTrigger } from "./triggers.js";

export const PHASES = [
  "initial",
  "problem_discovery",
  "process_understanding",
  "impact_analysis",
  "requirements_gathering",
  "ready_to_build",
] as const;

export type Phase = (typeof PHASES)[number];

/**
 * Upper bounds (exclusive) of each phase but the last
 */
const PHASE_BREAKPOINTS: ReadonlyArray<readonly [number, Phase]> = [
  [20, "initial"],
  [40, "problem_discovery"],
  [60, "process_understanding"],
  [80, "impact_analysis"],
  [95, "requirements_gathering"],
];

export const DEFAULT_READINESS_THRESHOLD = 85;

/**
 * Display text per phase
 */
export const PHASE_DEFINITIONS: Record<Phase, { range: string; focus: string }> = {
  initial: { range: "0-19%", focus: "Basic business understanding" },
  problem_discovery: { range: "20-39%", focus: "Specific challenge identification" },
  process_understanding: { range: "40-59%", focus: "Current workflow mapping" },
  impact_analysis: { range: "60-79%", focus: "Scale and business impact" },
  requirements_gathering: { range: "80-94%", focus: "Solution specifications" },
  ready_to_build: { range: "95-100%", focus: "Confirmed and ready" },
};

/**
 * Fact fields that hold a problem statement
 */
export const PROBLEM_FIELDS = ["specific_problem", "specific_challenge", "surface_problem"] as const;

export function phaseForProgress(progress: number): Phase {
  for (const [bound, phase] of PHASE_BREAKPOINTS) {
    if (progress < bound) return phase;
  }
  return "ready_to_build";
}

export function isReadyForGeneration(
  progress: number,
  threshold: number = DEFAULT_READINESS_THRESHOLD,
): boolean {
  return progress >= threshold;
}

/**
 * A known business type plus a stated problem
 */
export function hasRecognisedProblem(facts: FactMap): boolean {
  const businessType = facts["business_type"];
  if (isEmptyFactValue(businessType) || businessType === "unknown") return false;
  return PROBLEM_FIELDS.some((field) => !isEmptyFactValue(facts[field]));
}

export interface PhaseInput {
  utterance: string;
  progress: number;
  comprehensiveDetected: boolean;
  facts: FactMap;
}

export interface PhaseDecision {
  phase: Phase;
  readyForGeneration: boolean;
  shouldBuild: boolean;
  /** Trigger phrase found in the utterance */
  trigger: string | null;
}

/**
 * Derive the phase decision for one turn
 */
export function evaluatePhase(
  input: PhaseInput,
  threshold: number = DEFAULT_READINESS_THRESHOLD,
): PhaseDecision {
  const trigger = detectBuildTrigger(input.utterance);
  const readyForGeneration = isReadyForGeneration(input.progress, threshold);

  const shouldBuild =
    trigger !== null &&
    (readyForGeneration || input.comprehensiveDetected || hasRecognisedProblem(input.facts));

  return {
    phase: phaseForProgress(input.progress),
    readyForGeneration,
    shouldBuild,
    trigger,
  };
}

/**
 * Convenience wrapper for the build decision alone
 */
export function shouldBuild(input: PhaseInput, threshold?: number): boolean {
  return evaluatePhase(input, threshold).shouldBuild;
}
