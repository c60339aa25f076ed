/**
 * Field scoring
 */

import { isEmptyFactValue, stringifyFactValue, type FactValue } from "./facts.js";
import type { FieldRule } from "./schema.js";

/** Share of points a vague answer earns */
export const VAGUE_FRACTION = 0.2;
/** Share of points an answer below minLength earns */
export const SHORT_FRACTION = 0.3;
/** Share of points an answer without a number earns */
export const UNQUANTIFIED_FRACTION = 0.2;
/** Share of points a list below minItems earns */
export const SHORT_LIST_FRACTION = 0.5;

const MAX_QUALITY_MULTIPLIER = 2.0;
const QUALITY_UNIT_LENGTH = 20;

/**
 * Score one fact value against its field rule
 *
 * Rules are checked in order and the first that applies decides the score.
 */
export function scoreField(value: FactValue | null | undefined, rule: FieldRule): number {
  if (value === null || value === undefined || isEmptyFactValue(value)) {
    return 0;
  }

  const text = stringifyFactValue(value);

  if (rule.antiVagueTerms && rule.antiVagueTerms.length > 0) {
    const lower = text.toLowerCase();
    if (rule.antiVagueTerms.some((term) => lower.includes(term))) {
      return rule.points * VAGUE_FRACTION;
    }
  }

  if (rule.minLength !== undefined && text.length < rule.minLength) {
    return rule.points * SHORT_FRACTION;
  }

  if (rule.requiresNumbers && !/\d/.test(text)) {
    return rule.points * UNQUANTIFIED_FRACTION;
  }

  if (rule.listPreferred && Array.isArray(value)) {
    return value.length >= rule.minItems ? rule.points : rule.points * SHORT_LIST_FRACTION;
  }

  if (rule.qualityMultiplier) {
    const multiplier = Math.min(text.length / QUALITY_UNIT_LENGTH, MAX_QUALITY_MULTIPLIER);
    return rule.points * multiplier;
  }

  return rule.points;
}
