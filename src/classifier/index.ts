/**
 * Business classification
 */

export type {
  BusinessCategory,
  BusinessModel,
  BusinessProfile,
  ClassificationSignals,
  ProblemPattern,
  ScoredCategory,
  SizeIndicator,
  TargetMarket,
} from "./types.js";
export { BUSINESS_CATEGORIES, BUSINESS_MODELS, PROBLEM_PATTERNS } from "./types.js";

export {
  CategoryPatternSchema,
  PatternTableSchema,
  getPatternTable,
  loadPatternTable,
  type CategoryPattern,
  type PatternTable,
} from "./patterns.js";

export {
  classifyBusiness,
  extractSignals,
  scoreCategory,
  shouldAcceptProfile,
  MAX_SUGGESTED_QUESTIONS,
  PROFILE_ACCEPTANCE_THRESHOLD,
  UNKNOWN_CATEGORY_THRESHOLD,
} from "./classifier.js";
