/**
 * Comprehensive-info fast path
 *
 * Looks for literal signal families across every fact value regardless of
 * field names. A total at or above the configured threshold lets the
 * scorer skip the weighted pass.
 */

import { factText, type FactMap } from "./facts.js";
import type { InformationSchema } from "./schema.js";

export interface ComprehensiveDetection {
  /** Sum of the matched families' points, capped at 100 */
  score: number;
  /** Names of the families that matched, in table order */
  patternsFound: string[];
  comprehensive: boolean;
}

export function detectComprehensiveInfo(
  facts: FactMap,
  schema: InformationSchema,
): ComprehensiveDetection {
  const text = factText(facts);
  let score = 0;
  const patternsFound: string[] = [];

  for (const family of schema.comprehensive.families) {
    const matches = family.terms.filter((term) => text.includes(term)).length;
    if (matches >= family.minMatches) {
      score += family.points;
      patternsFound.push(family.name);
    }
  }

  const capped = Math.min(score, 100);
  return {
    score: capped,
    patternsFound,
    comprehensive: capped >= schema.comprehensive.threshold,
  };
}
