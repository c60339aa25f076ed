/**
 * Build trigger phrases
 *
 * Explicit requests to start building, matched on word boundaries so
 * "beginner" does not read as "begin".
 */

import { containsPhrase } from "../utils/strings.js";

export const BUILD_TRIGGER_PHRASES: readonly string[] = [
  "start now",
  "begin",
  "build it",
  "let's go",
  "lets go",
  "do it",
  "start building",
  "get started",
  "build this",
  "create this",
  "implement",
  "go ahead",
  "make it",
  "let's build",
  "ready to build",
];

/**
 * Return the first trigger phrase found in an utterance, or null
 */
export function detectBuildTrigger(
  utterance: string,
  phrases: readonly string[] = BUILD_TRIGGER_PHRASES,
): string | null {
  const normalized = utterance.replace(/[‘’]/g, "'").toLowerCase();
  return phrases.find((phrase) => containsPhrase(normalized, phrase)) ?? null;
}
