/**
 * Phase state machine tests
 */

import { describe, it, expect } from "vitest";
import {
  evaluatePhase,
  hasRecognisedProblem,
  isReadyForGeneration,
  phaseForProgress,
  shouldBuild,
  type PhaseInput,
} from "./machine.js";

const baseInput: PhaseInput = {
  utterance: "",
  progress: 0,
  comprehensiveDetected: false,
  facts: {},
};

describe("phaseForProgress", () => {
  it.each([
    [0, "initial"],
    [19, "initial"],
    [20, "problem_discovery"],
    [39, "problem_discovery"],
    [40, "process_understanding"],
    [60, "impact_analysis"],
    [80, "requirements_gathering"],
    [94, "requirements_gathering"],
    [95, "ready_to_build"],
    [100, "ready_to_build"],
  ])("should map %i to %s", (progress, phase) => {
    expect(phaseForProgress(progress)).toBe(phase);
  });
});

describe("isReadyForGeneration", () => {
  it("should use 85 by default", () => {
    expect(isReadyForGeneration(84)).toBe(false);
    expect(isReadyForGeneration(85)).toBe(true);
  });

  it("should accept a configured threshold", () => {
    expect(isReadyForGeneration(70, 70)).toBe(true);
  });
});

describe("hasRecognisedProblem", () => {
  it("should need a business type and a problem", () => {
    expect(hasRecognisedProblem({ business_type: "dental clinic" })).toBe(false);
    expect(
      hasRecognisedProblem({ business_type: "dental clinic", surface_problem: "missed calls" }),
    ).toBe(true);
  });

  it("should not count an unknown business type", () => {
    expect(
      hasRecognisedProblem({ business_type: "unknown", specific_problem: "missed calls" }),
    ).toBe(false);
  });
});

describe("evaluatePhase", () => {
  it("should not build without a trigger phrase, even at 100", () => {
    const decision = evaluatePhase({
      ...baseInput,
      utterance: "sounds good to me",
      progress: 100,
      comprehensiveDetected: true,
    });

    expect(decision.phase).toBe("ready_to_build");
    expect(decision.readyForGeneration).toBe(true);
    expect(decision.shouldBuild).toBe(false);
    expect(decision.trigger).toBeNull();
  });

  it("should build on a trigger once ready", () => {
    const decision = evaluatePhase({ ...baseInput, utterance: "OK, build it", progress: 88 });

    expect(decision.trigger).toBe("build it");
    expect(decision.shouldBuild).toBe(true);
  });

  it("should build on a trigger with comprehensive info", () => {
    expect(
      shouldBuild({ ...baseInput, utterance: "let's go", progress: 40, comprehensiveDetected: true }),
    ).toBe(true);
  });

  it("should build on a trigger with a recognised business and problem", () => {
    expect(
      shouldBuild({
        ...baseInput,
        utterance: "Go ahead",
        progress: 30,
        facts: { business_type: "bakery", specific_problem: "orders arrive by phone" },
      }),
    ).toBe(true);
  });

  it("should not build on a trigger alone", () => {
    expect(shouldBuild({ ...baseInput, utterance: "go ahead", progress: 50 })).toBe(false);
  });

  it("should honour a custom readiness threshold", () => {
    const decision = evaluatePhase({ ...baseInput, utterance: "do it", progress: 80 }, 80);
    expect(decision.readyForGeneration).toBe(true);
    expect(decision.shouldBuild).toBe(true);
  });
});
