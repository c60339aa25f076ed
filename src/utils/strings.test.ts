/**
 * Tests for string utilities
 */

import { describe, it, expect } from "vitest";
import { containsPhrase, escapeRegExp, findSubstrings, pluralize, truncate } from "./strings.js";

describe("truncate", () => {
  it("should leave short strings alone", () => {
    expect(truncate("law firm", 50)).toBe("law firm");
  });

  it("should cut long strings to the limit including the suffix", () => {
    expect(truncate("We run a small bakery", 10)).toBe("We run ...");
  });
});

describe("pluralize", () => {
  it("should pluralize counts other than one", () => {
    expect(pluralize("session", 1)).toBe("session");
    expect(pluralize("session", 0)).toBe("sessions");
    expect(pluralize("entity", 2, "entities")).toBe("entities");
  });
});

describe("escapeRegExp", () => {
  it("should escape regex metacharacters", () => {
    expect(escapeRegExp("a.b*(c)")).toBe("a\\.b\\*\\(c\\)");
  });
});

describe("containsPhrase", () => {
  it("should match on word boundaries, ignoring case", () => {
    expect(containsPhrase("OK, Go Ahead please", "go ahead")).toBe(true);
    expect(containsPhrase("let's build it", "build it")).toBe(true);
  });

  it("should not match inside longer words", () => {
    expect(containsPhrase("rebuild items", "build it")).toBe(false);
    expect(containsPhrase("yesterday", "yes")).toBe(false);
  });
});

describe("findSubstrings", () => {
  it("should return matches in candidate order", () => {
    expect(findSubstrings("we use slack and excel", ["excel", "zoom", "slack"])).toEqual([
      "excel",
      "slack",
    ]);
  });
});
