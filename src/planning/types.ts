/**
 * Planning types
 *
 * A plan is a non-generative architecture sketch: requirements, the
 * systems to integrate with, and the database, API and page outline.
 */

import { z } from "zod";
import type { BusinessProfile } from "../classifier/types.js";
import type { FactMap } from "../scoring/facts.js";

export const PROBLEM_AREAS = ["support", "sales", "operations", "data", "process"] as const;

export type ProblemArea = (typeof PROBLEM_AREAS)[number];

export const RequirementsSchema = z.object({
  summary: z.string(),
  problem: z.string(),
  problemArea: z.enum(PROBLEM_AREAS),
  features: z.array(z.string()),
  constraints: z.array(z.string()),
  successMetrics: z.array(z.string()),
});

export type Requirements = z.infer<typeof RequirementsSchema>;

export const IntegrationSchema = z.object({
  name: z.string(),
  purpose: z.string(),
});

export type Integration = z.infer<typeof IntegrationSchema>;

export const DatabasePlanSchema = z.object({
  entities: z.array(z.object({ name: z.string(), fields: z.array(z.string()) })),
});

export type DatabasePlan = z.infer<typeof DatabasePlanSchema>;

export const BackendPlanSchema = z.object({
  endpoints: z.array(
    z.object({
      method: z.enum(["GET", "POST", "PATCH", "DELETE"]),
      path: z.string(),
      description: z.string(),
    }),
  ),
});

export type BackendPlan = z.infer<typeof BackendPlanSchema>;

export const FrontendPlanSchema = z.object({
  pages: z.array(
    z.object({ name: z.string(), route: z.string(), endpoints: z.array(z.string()) }),
  ),
});

export type FrontendPlan = z.infer<typeof FrontendPlanSchema>;

export const SolutionRecommendationSchema = z.object({
  solutionType: z.string(),
  technicalStack: z.string(),
  coreFeatures: z.array(z.string()),
  estimatedImpact: z.string(),
});

export type SolutionRecommendation = z.infer<typeof SolutionRecommendationSchema>;

export const PlanSchema = z.object({
  provider: z.string(),
  requirements: RequirementsSchema,
  integrations: z.array(IntegrationSchema),
  database: DatabasePlanSchema,
  backend: BackendPlanSchema,
  frontend: FrontendPlanSchema,
  recommendation: SolutionRecommendationSchema.optional(),
  createdAt: z.string().datetime(),
});

export type Plan = z.infer<typeof PlanSchema>;

/**
 * What a planning run starts from
 */
export interface PlanningInput {
  sessionId: string;
  facts: FactMap;
  profile: BusinessProfile | null;
}

/**
 * The generation collaborator's seam; every step may be slow or fail
 */
export interface PlanningProvider {
  readonly name: string;
  deriveRequirements(input: PlanningInput): Promise<Requirements>;
  identifyIntegrations(input: PlanningInput, requirements: Requirements): Promise<Integration[]>;
  planDatabase(input: PlanningInput, requirements: Requirements): Promise<DatabasePlan>;
  planBackend(
    database: DatabasePlan,
    requirements: Requirements,
    integrations: Integration[],
  ): Promise<BackendPlan>;
  planFrontend(backend: BackendPlan, requirements: Requirements): Promise<FrontendPlan>;
  recommendSolution?(
    input: PlanningInput,
    requirements: Requirements,
  ): Promise<SolutionRecommendation>;
}
