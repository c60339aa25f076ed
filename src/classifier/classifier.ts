/**
 * Business Classifier
 *
 * Scores an utterance against every category in the pattern table and
 * derives the profile attributes (model, industry, size, market) from the
 * shared signal lists. Pure: the table is the only input besides the text.
 */

import { findSubstrings } from "../utils/strings.js";
import { getPatternTable, type CategoryPattern, type PatternTable } from "./patterns.js";
import type {
  BusinessCategory,
  BusinessModel,
  BusinessProfile,
  ClassificationSignals,
  ProblemPattern,
  ScoredCategory,
  SizeIndicator,
  TargetMarket,
} from "./types.js";

/**
 * Below this score the winner is reported as unknown
 */
export const UNKNOWN_CATEGORY_THRESHOLD = 0.25;

/**
 * A profile replaces the accepted one only above this confidence
 */
export const PROFILE_ACCEPTANCE_THRESHOLD = 0.3;

export const MAX_SUGGESTED_QUESTIONS = 4;

const SCORE_WEIGHTS = {
  keywords: 0.4,
  phrases: 0.3,
  problems: 0.2,
  modelAlignment: 0.1,
  categoryName: 0.3,
  strongIndicator: 0.15,
} as const;

const HEADCOUNT_PATTERN = /\b(\d+)\s*(?:employees?|people|team members?)\b/;

/**
 * Extract the signals every category score draws on
 */
export function extractSignals(text: string, table: PatternTable): ClassificationSignals {
  const keywords: string[] = [];
  for (const pattern of table.categories) {
    for (const keyword of pattern.keywords) {
      if (text.includes(keyword) && !keywords.includes(keyword)) {
        keywords.push(keyword);
      }
    }
  }

  return {
    keywords,
    businessModel: detectBusinessModel(text, table),
    industry:
      table.industries.find((entry) => matchesAny(text, entry.keywords))?.industry ?? "general",
    size: detectSize(text, table),
    problems: table.problemPatterns
      .filter((entry) => matchesAny(text, entry.keywords))
      .map((entry) => entry.tag),
    tools: findSubstrings(text, table.tools),
  };
}

function matchesAny(text: string, candidates: readonly string[]): boolean {
  return candidates.some((candidate) => text.includes(candidate));
}

function detectBusinessModel(text: string, table: PatternTable): BusinessModel | "unknown" {
  return table.businessModels.find((entry) => matchesAny(text, entry.keywords))?.model ?? "unknown";
}

function detectSize(text: string, table: PatternTable): SizeIndicator {
  const bySize = table.sizes.find((entry) => matchesAny(text, entry.keywords));
  if (bySize) return bySize.size;

  const headcount = HEADCOUNT_PATTERN.exec(text);
  if (headcount?.[1]) {
    const count = parseInt(headcount[1], 10);
    if (count <= 1) return "solo";
    if (count <= 10) return "small";
    if (count <= 50) return "medium";
    return "large";
  }

  return "unknown";
}

/**
 * Confidence score for one category, in [0, 1]
 */
export function scoreCategory(
  pattern: CategoryPattern,
  signals: ClassificationSignals,
  text: string,
): number {
  let score = 0;

  if (pattern.keywords.length > 0) {
    let matches = 0;
    for (const keyword of pattern.keywords) {
      if (text.includes(keyword)) {
        matches += 1;
      } else if (keyword.split(/\s+/).some((word) => word.length > 0 && text.includes(word))) {
        matches += 0.5;
      }
    }
    score += Math.min(
      (matches / pattern.keywords.length) * SCORE_WEIGHTS.keywords,
      SCORE_WEIGHTS.keywords,
    );
  }

  if (pattern.phrases.length > 0) {
    const matches = pattern.phrases.filter((phrase) => text.includes(phrase.toLowerCase())).length;
    score += Math.min(
      (matches / pattern.phrases.length) * SCORE_WEIGHTS.phrases,
      SCORE_WEIGHTS.phrases,
    );
  }

  if (pattern.problems.length > 0) {
    const matches = pattern.problems.filter((problem) => text.includes(problem)).length;
    score += Math.min(
      (matches / pattern.problems.length) * SCORE_WEIGHTS.problems,
      SCORE_WEIGHTS.problems,
    );
  }

  if (signals.businessModel !== "unknown" && pattern.alignedModels.includes(signals.businessModel)) {
    score += SCORE_WEIGHTS.modelAlignment;
  }

  if (text.includes(pattern.category)) {
    score += SCORE_WEIGHTS.categoryName;
  }

  if (matchesAny(text, pattern.strongIndicators)) {
    score += SCORE_WEIGHTS.strongIndicator;
  }

  return Math.min(Math.max(score, 0), 1);
}

function determineSubcategory(pattern: CategoryPattern | undefined, text: string): string {
  return pattern?.subcategories.find((entry) => matchesAny(text, entry.keywords))?.name ?? "general";
}

function determineTargetMarket(text: string, table: PatternTable): TargetMarket {
  return table.targetMarkets.find((entry) => matchesAny(text, entry.keywords))?.market ?? "unknown";
}

function suggestQuestions(
  pattern: CategoryPattern | undefined,
  problems: readonly ProblemPattern[],
  table: PatternTable,
): string[] {
  const bank = pattern && pattern.questions.length > 0 ? pattern.questions : table.genericQuestions;
  const questions = bank.slice(0, MAX_SUGGESTED_QUESTIONS);

  if (problems.includes("scaling_issues")) {
    questions.push(table.followUpQuestions.scaling_issues);
  }
  if (problems.includes("manual_operations")) {
    questions.push(table.followUpQuestions.manual_operations);
  }

  return questions.slice(0, MAX_SUGGESTED_QUESTIONS);
}

/**
 * Classify a business from free-form text
 *
 * `context` is accepted for callers that track prior turns; the scores
 * are computed from the text alone.
 */
export function classifyBusiness(
  text: string,
  _context: Record<string, unknown> = {},
  table: PatternTable = getPatternTable(),
): BusinessProfile {
  const normalized = text.toLowerCase();
  const signals = extractSignals(normalized, table);

  const categoryScores: Partial<Record<ScoredCategory, number>> = {};
  let best: CategoryPattern | undefined;
  let bestScore = -1;

  for (const pattern of table.categories) {
    const score = scoreCategory(pattern, signals, normalized);
    categoryScores[pattern.category] = score;
    if (score > bestScore) {
      best = pattern;
      bestScore = score;
    }
  }

  const confidence = Math.max(bestScore, 0);
  const accepted = best !== undefined && confidence >= UNKNOWN_CATEGORY_THRESHOLD ? best : undefined;
  const category: BusinessCategory = accepted?.category ?? "unknown";

  return {
    category,
    subcategory: determineSubcategory(accepted, normalized),
    industry: signals.industry,
    businessModel: signals.businessModel,
    targetMarket: determineTargetMarket(normalized, table),
    sizeIndicator: signals.size,
    confidence,
    keywordsMatched: signals.keywords,
    problemPatterns: signals.problems,
    toolsMentioned: signals.tools,
    suggestedQuestions: suggestQuestions(accepted, signals.problems, table),
    categoryScores: fillScores(categoryScores),
  };
}

function fillScores(scores: Partial<Record<ScoredCategory, number>>): Record<ScoredCategory, number> {
  return {
    saas: scores.saas ?? 0,
    ecommerce: scores.ecommerce ?? 0,
    agency: scores.agency ?? 0,
    marketplace: scores.marketplace ?? 0,
    professional_services: scores.professional_services ?? 0,
    healthcare: scores.healthcare ?? 0,
    fintech: scores.fintech ?? 0,
    edtech: scores.edtech ?? 0,
    logistics: scores.logistics ?? 0,
    hospitality: scores.hospitality ?? 0,
    retail: scores.retail ?? 0,
    manufacturing: scores.manufacturing ?? 0,
    nonprofit: scores.nonprofit ?? 0,
    media: scores.media ?? 0,
    real_estate: scores.real_estate ?? 0,
  };
}

/**
 * Whether a new profile should replace the accepted one
 */
export function shouldAcceptProfile(profile: BusinessProfile): boolean {
  return profile.confidence > PROFILE_ACCEPTANCE_THRESHOLD;
}
