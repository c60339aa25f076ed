/**
 * Tests for score command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

vi.mock("@clack/prompts", () => ({
  log: {
    info: vi.fn(),
    step: vi.fn(),
    message: vi.fn(),
    success: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
  },
}));

const FACTS = {
  specific_problem: "Order confirmations are copied by hand between two systems",
  detailed_workflow:
    "A clerk reads each order email, types it into the warehouse system, then emails the customer",
  budget: null,
};

describe("score command", () => {
  let dir: string;
  let factsFile: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), "intake-score-"));
    factsFile = join(dir, "facts.json");
    await writeFile(factsFile, JSON.stringify(FACTS), "utf-8");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe("runScore", () => {
    it("should score a new conversation without smoothing", async () => {
      const { runScore } = await import("./score.js");

      const result = await runScore(factsFile);

      expect(result.progress).toBe(30);
      expect(result.rawCalculated).toBe(30);
      expect(result.smoothed).toBe(false);
      expect(result.phase).toBe("problem_discovery");
    });

    it("should cap the jump from the previous progress", async () => {
      const prompts = await import("@clack/prompts");
      const { runScore } = await import("./score.js");

      const result = await runScore(factsFile, { previous: "10" });

      expect(result.progress).toBe(25);
      expect(result.smoothed).toBe(true);
      expect(prompts.log.info).toHaveBeenCalledWith(
        expect.stringContaining("Raw score 30, smoothed from 10"),
      );
    });

    it("should list the largest remaining gaps", async () => {
      const { runScore } = await import("./score.js");

      const result = await runScore(factsFile);

      expect(result.gaps).toHaveLength(5);
      expect(result.gaps.map((gap) => gap.field)).not.toContain("specific_problem");
    });

    it("should print JSON when requested", async () => {
      const { runScore } = await import("./score.js");
      const consoleLog = vi.spyOn(console, "log").mockImplementation(() => {});

      await runScore(factsFile, { json: true });

      const output: unknown = JSON.parse(String(consoleLog.mock.calls[0]?.[0]));
      expect(output).toMatchObject({ progress: 30, phase: "problem_discovery" });
    });

    it("should reject an out of range previous progress", async () => {
      const { runScore } = await import("./score.js");

      await expect(runScore(factsFile, { previous: "150" })).rejects.toThrow(
        "Validation failed for --previous",
      );
    });

    it("should reject a facts file that is not an object", async () => {
      await writeFile(factsFile, JSON.stringify(["not", "facts"]), "utf-8");
      const { runScore } = await import("./score.js");

      await expect(runScore(factsFile)).rejects.toThrow(/Invalid JSON file/);
    });

    it("should reject a missing facts file", async () => {
      const { runScore } = await import("./score.js");

      await expect(runScore(join(dir, "missing.json"))).rejects.toThrow(
        /Failed to read JSON file/,
      );
    });
  });
});
