/**
 * Information schema
 *
 * Weighted information categories, the quality rule for each field, and
 * the literal signal families of the comprehensive-info fast path. Loaded
 * from data/information-schema.json and frozen.
 */

import { z } from "zod";
import { dataFileUrl, loadDataFile } from "../utils/data.js";

export const INFORMATION_CATEGORIES = [
  "business_context",
  "problem_discovery",
  "current_process",
  "scale_impact",
  "solution_requirements",
] as const;

export type InformationCategoryName = (typeof INFORMATION_CATEGORIES)[number];

export const FieldRuleSchema = z.object({
  points: z.number().nonnegative(),
  antiVagueTerms: z.array(z.string().min(1)).optional(),
  minLength: z.number().int().positive().optional(),
  requiresNumbers: z.boolean().optional(),
  listPreferred: z.boolean().optional(),
  minItems: z.number().int().positive().default(1),
  qualityMultiplier: z.boolean().optional(),
});

export type FieldRule = z.infer<typeof FieldRuleSchema>;

export const InformationCategorySchema = z.object({
  name: z.enum(INFORMATION_CATEGORIES),
  weight: z.number().min(0).max(1),
  fields: z.record(FieldRuleSchema),
});

export type InformationCategory = z.infer<typeof InformationCategorySchema>;

export const SignalFamilySchema = z.object({
  name: z.string().min(1),
  points: z.number().nonnegative(),
  minMatches: z.number().int().positive(),
  terms: z.array(z.string().min(1)).min(1),
});

export type SignalFamily = z.infer<typeof SignalFamilySchema>;

export const InformationSchemaSchema = z
  .object({
    categories: z.array(InformationCategorySchema).min(1),
    comprehensive: z.object({
      threshold: z.number().min(0).max(100),
      families: z.array(SignalFamilySchema),
    }),
  })
  .superRefine((schema, ctx) => {
    const names = schema.categories.map((category) => category.name);
    const duplicate = names.find((name, index) => names.indexOf(name) !== index);
    if (duplicate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["categories"],
        message: `Duplicate category: ${duplicate}`,
      });
    }

    const totalWeight = schema.categories.reduce((sum, category) => sum + category.weight, 0);
    if (totalWeight > 1 + 1e-9) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["categories"],
        message: `Category weights sum to ${totalWeight}, above 1`,
      });
    }
  });

export type InformationSchema = z.infer<typeof InformationSchemaSchema>;

let cachedSchema: InformationSchema | null = null;

export function loadInformationSchema(location: URL | string): InformationSchema {
  return loadDataFile(location, InformationSchemaSchema);
}

/**
 * Get the bundled information schema (loaded on first use)
 */
export function getInformationSchema(): InformationSchema {
  if (!cachedSchema) {
    cachedSchema = loadInformationSchema(dataFileUrl("information-schema.json"));
  }
  return cachedSchema;
}

/**
 * Look up the rule for a field across all categories
 */
export function findFieldRule(
  schema: InformationSchema,
  field: string,
): { category: InformationCategoryName; rule: FieldRule } | undefined {
  for (const category of schema.categories) {
    const rule = category.fields[field];
    if (rule) return { category: category.name, rule };
  }
  return undefined;
}
