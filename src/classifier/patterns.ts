/**
 * Category pattern table
 *
 * Keyword, phrase and problem signals per business category, plus the
 * shared signal lists the classifier extracts before scoring. The table
 * lives in data/business-patterns.json and is frozen after loading.
 */

import { z } from "zod";
import { dataFileUrl, loadDataFile } from "../utils/data.js";
import {
  BUSINESS_CATEGORIES,
  BUSINESS_MODELS,
  PROBLEM_PATTERNS,
  SIZE_INDICATORS,
  TARGET_MARKETS,
} from "./types.js";

const ScoredCategorySchema = z.enum(BUSINESS_CATEGORIES).exclude(["unknown"]);

export const CategoryPatternSchema = z.object({
  category: ScoredCategorySchema,
  keywords: z.array(z.string().min(1)).min(1),
  phrases: z.array(z.string().min(1)),
  problems: z.array(z.string().min(1)),
  strongIndicators: z.array(z.string().min(1)),
  alignedModels: z.array(z.enum(BUSINESS_MODELS)),
  subcategories: z.array(
    z.object({ name: z.string().min(1), keywords: z.array(z.string().min(1)).min(1) }),
  ),
  questions: z.array(z.string().min(1)),
});

export type CategoryPattern = z.infer<typeof CategoryPatternSchema>;

export const PatternTableSchema = z
  .object({
    categories: z.array(CategoryPatternSchema),
    businessModels: z.array(
      z.object({ model: z.enum(BUSINESS_MODELS), keywords: z.array(z.string().min(1)).min(1) }),
    ),
    industries: z.array(
      z.object({ industry: z.string().min(1), keywords: z.array(z.string().min(1)).min(1) }),
    ),
    sizes: z.array(
      z.object({ size: z.enum(SIZE_INDICATORS), keywords: z.array(z.string().min(1)).min(1) }),
    ),
    problemPatterns: z.array(
      z.object({ tag: z.enum(PROBLEM_PATTERNS), keywords: z.array(z.string().min(1)).min(1) }),
    ),
    tools: z.array(z.string().min(1)),
    targetMarkets: z.array(
      z.object({ market: z.enum(TARGET_MARKETS), keywords: z.array(z.string().min(1)).min(1) }),
    ),
    genericQuestions: z.array(z.string().min(1)).min(1),
    followUpQuestions: z.object({
      scaling_issues: z.string().min(1),
      manual_operations: z.string().min(1),
    }),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    for (const [index, pattern] of table.categories.entries()) {
      if (seen.has(pattern.category)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["categories", index, "category"],
          message: `Duplicate category: ${pattern.category}`,
        });
      }
      seen.add(pattern.category);
    }
    for (const category of ScoredCategorySchema.options) {
      if (!seen.has(category)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["categories"],
          message: `Missing category: ${category}`,
        });
      }
    }
  });

export type PatternTable = z.infer<typeof PatternTableSchema>;

let cachedTable: PatternTable | null = null;

/**
 * Load a pattern table from a JSON file
 */
export function loadPatternTable(location: URL | string): PatternTable {
  return loadDataFile(location, PatternTableSchema);
}

/**
 * Get the bundled pattern table (loaded on first use)
 */
export function getPatternTable(): PatternTable {
  if (!cachedTable) {
    cachedTable = loadPatternTable(dataFileUrl("business-patterns.json"));
  }
  return cachedTable;
}
