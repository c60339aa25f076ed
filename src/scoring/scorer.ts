/**
 * Progress Scorer
 *
 * Turns the accumulated fact map into a 0-100 completeness score. The
 * comprehensive-info fast path runs first; otherwise every schema field
 * is scored, categories are capped at their weight, and the total is
 * smoothed against the previous turn so progress climbs gradually and
 * never falls.
 */

import { detectComprehensiveInfo } from "./comprehensive.js";
import type { FactMap } from "./facts.js";
import { scoreField } from "./field-score.js";
import {
  getInformationSchema,
  type FieldRule,
  type InformationCategoryName,
  type InformationSchema,
} from "./schema.js";

/** Largest single-turn increase while raw progress is at or below 70 */
export const MAX_JUMP = 15;
/** Largest single-turn increase once raw progress is above 70 */
export const MAX_JUMP_NEAR_COMPLETION = 25;
const NEAR_COMPLETION_RAW = 70;

export interface CategoryScore {
  score: number;
  max: number;
  /** 0-100 */
  percentage: number;
}

export interface ProgressResult {
  /** Smoothed progress, integer 0-100 */
  progress: number;
  /** Progress before smoothing, integer 0-100 */
  rawCalculated: number;
  /** Empty when the fast path decided the result */
  categoryBreakdown: Partial<Record<InformationCategoryName, CategoryScore>>;
  comprehensiveDetected: boolean;
  smoothed: boolean;
  patternsFound: string[];
}

export interface ProgressOptions {
  schema?: InformationSchema;
}

/**
 * Clamp a prior progress value into [0, 100]; non-finite values become 0
 */
export function normalizeProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(Math.min(Math.max(value, 0), 100));
}

/**
 * Apply the per-turn jump cap and the monotonic floor
 *
 * `raw` is the unrounded total; the result is rounded.
 */
export function smoothProgress(raw: number, previous: number): number {
  if (previous <= 0) return Math.round(raw);
  const maxJump = raw > NEAR_COMPLETION_RAW ? MAX_JUMP_NEAR_COMPLETION : MAX_JUMP;
  return Math.round(Math.max(previous, Math.min(raw, previous + maxJump)));
}

function scoreCategories(
  facts: FactMap,
  schema: InformationSchema,
): { total: number; breakdown: Partial<Record<InformationCategoryName, CategoryScore>> } {
  const breakdown: Partial<Record<InformationCategoryName, CategoryScore>> = {};
  let total = 0;

  for (const category of schema.categories) {
    // weights are fractions; round away float noise such as 0.15 * 100
    const max = Math.round(category.weight * 10000) / 100;
    let score = 0;
    for (const [field, rule] of Object.entries(category.fields)) {
      score += scoreField(facts[field], rule);
    }
    score = Math.min(score, max);

    breakdown[category.name] = {
      score,
      max,
      percentage: max > 0 ? Math.min((score / max) * 100, 100) : 0,
    };
    total += score;
  }

  return { total, breakdown };
}

/**
 * Score a fact map against the information schema
 */
export function calculateProgress(
  facts: FactMap,
  previousProgress: number = 0,
  options: ProgressOptions = {},
): ProgressResult {
  const schema = options.schema ?? getInformationSchema();
  const previous = normalizeProgress(previousProgress);

  const detection = detectComprehensiveInfo(facts, schema);
  if (detection.comprehensive) {
    const raw = Math.round(detection.score);
    return {
      progress: Math.max(previous, raw),
      rawCalculated: raw,
      categoryBreakdown: {},
      comprehensiveDetected: true,
      smoothed: false,
      patternsFound: detection.patternsFound,
    };
  }

  const { total, breakdown } = scoreCategories(facts, schema);
  const unrounded = Math.min(total, 100);
  const raw = Math.round(unrounded);
  const progress = smoothProgress(unrounded, previous);

  return {
    progress,
    rawCalculated: raw,
    categoryBreakdown: breakdown,
    comprehensiveDetected: false,
    smoothed: progress !== raw,
    patternsFound: detection.patternsFound,
  };
}

export interface InformationGap {
  category: InformationCategoryName;
  field: string;
  currentScore: number;
  maxScore: number;
  /** Points the field could still add */
  missing: number;
}

function maxFieldScore(rule: FieldRule): number {
  return rule.qualityMultiplier ? rule.points * 2 : rule.points;
}

/**
 * Schema fields that still score below their maximum, largest gap first
 */
export function findInformationGaps(
  facts: FactMap,
  schema: InformationSchema = getInformationSchema(),
): InformationGap[] {
  const gaps: InformationGap[] = [];

  for (const category of schema.categories) {
    for (const [field, rule] of Object.entries(category.fields)) {
      const currentScore = scoreField(facts[field], rule);
      const maxScore = maxFieldScore(rule);
      if (currentScore < maxScore) {
        gaps.push({
          category: category.name,
          field,
          currentScore,
          maxScore,
          missing: maxScore - currentScore,
        });
      }
    }
  }

  // ties keep schema order
  return gaps.sort((a, b) => b.missing - a.missing);
}
