/**
 * Build trigger tests
 */

import { describe, it, expect } from "vitest";
import { detectBuildTrigger } from "./triggers.js";

describe("detectBuildTrigger", () => {
  it("should find trigger phrases case-insensitively", () => {
    expect(detectBuildTrigger("Great, START NOW please")).toBe("start now");
    expect(detectBuildTrigger("Let's go!")).toBe("let's go");
  });

  it("should accept typographic apostrophes", () => {
    expect(detectBuildTrigger("Let’s build")).toBe("let's build");
  });

  it("should match on word boundaries", () => {
    expect(detectBuildTrigger("I'm a beginner with software")).toBeNull();
    expect(detectBuildTrigger("we implemented a fix last year")).toBeNull();
  });

  it("should return null without a trigger", () => {
    expect(detectBuildTrigger("we have 30 clients")).toBeNull();
  });

  it("should accept a custom phrase list", () => {
    expect(detectBuildTrigger("ship it", ["ship it"])).toBe("ship it");
  });
});
