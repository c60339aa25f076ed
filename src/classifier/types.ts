/**
 * Business classification types
 */

/**
 * Business categories, in table order
 */
export const BUSINESS_CATEGORIES = [
  "saas",
  "ecommerce",
  "agency",
  "marketplace",
  "professional_services",
  "healthcare",
  "fintech",
  "edtech",
  "logistics",
  "hospitality",
  "retail",
  "manufacturing",
  "nonprofit",
  "media",
  "real_estate",
  "unknown",
] as const;

export type BusinessCategory = (typeof BUSINESS_CATEGORIES)[number];

/**
 * Categories that carry a pattern entry
 */
export type ScoredCategory = Exclude<BusinessCategory, "unknown">;

/**
 * Business models, in match priority order
 */
export const BUSINESS_MODELS = [
  "subscription",
  "transactional",
  "marketplace",
  "service",
  "product",
] as const;

export type BusinessModel = (typeof BUSINESS_MODELS)[number];

export const SIZE_INDICATORS = ["solo", "small", "medium", "large"] as const;

export type SizeIndicator = (typeof SIZE_INDICATORS)[number] | "unknown";

export const TARGET_MARKETS = ["b2b", "b2c", "b2b2c"] as const;

export type TargetMarket = (typeof TARGET_MARKETS)[number] | "unknown";

export const PROBLEM_PATTERNS = [
  "manual_operations",
  "scaling_issues",
  "customer_management",
  "financial_management",
  "communication",
  "data_management",
  "automation_needs",
] as const;

export type ProblemPattern = (typeof PROBLEM_PATTERNS)[number];

/**
 * Result of classifying one utterance
 */
export interface BusinessProfile {
  category: BusinessCategory;
  subcategory: string;
  industry: string;
  businessModel: BusinessModel | "unknown";
  targetMarket: TargetMarket;
  sizeIndicator: SizeIndicator;
  /** Winning score in [0, 1], reported even when the category fell back to unknown */
  confidence: number;
  keywordsMatched: string[];
  problemPatterns: ProblemPattern[];
  toolsMentioned: string[];
  /** At most four */
  suggestedQuestions: string[];
  categoryScores: Record<ScoredCategory, number>;
}

/**
 * Signals extracted from the text before category scoring
 */
export interface ClassificationSignals {
  keywords: string[];
  businessModel: BusinessModel | "unknown";
  industry: string;
  size: SizeIndicator;
  problems: ProblemPattern[];
  tools: string[];
}
