/**
 * Heuristic planning provider
 *
 * Builds a plan from the fact map and the business profile alone, with no
 * generation service: entities come from the business category, endpoints
 * from entities, pages from endpoints. Deterministic for a given input.
 */

import { z } from "zod";
import { PROBLEM_FIELDS } from "../phases/machine.js";
import { isEmptyFactValue, stringifyFactValue, type FactValue } from "../scoring/facts.js";
import { dataFileUrl, loadDataFile } from "../utils/data.js";
import {
  PROBLEM_AREAS,
  type BackendPlan,
  type DatabasePlan,
  type FrontendPlan,
  type Integration,
  type PlanningInput,
  type PlanningProvider,
  type ProblemArea,
  type Requirements,
  type SolutionRecommendation,
} from "./types.js";

const EntityListSchema = z.array(z.string().min(1)).min(1);

const SolutionTemplateSchema = z.object({
  solutionType: z.string().min(1),
  technicalStack: z.string().min(1),
  coreFeatures: z.array(z.string().min(1)),
});

export const PlanTemplatesSchema = z.object({
  entities: z.object({ unknown: EntityListSchema }).catchall(EntityListSchema),
  entityFields: z.array(z.string().min(1)).min(1),
  solutions: z.object({
    support: SolutionTemplateSchema,
    sales: SolutionTemplateSchema,
    operations: SolutionTemplateSchema,
    data: SolutionTemplateSchema,
    process: SolutionTemplateSchema,
  }),
  problemAreaKeywords: z.object({
    support: z.array(z.string().min(1)),
    sales: z.array(z.string().min(1)),
    operations: z.array(z.string().min(1)),
    data: z.array(z.string().min(1)),
  }),
  integrationPurposes: z.record(z.string().min(1)),
});

export type PlanTemplates = z.infer<typeof PlanTemplatesSchema>;

let cachedTemplates: PlanTemplates | null = null;

export function getPlanTemplates(): PlanTemplates {
  if (!cachedTemplates) {
    cachedTemplates = loadDataFile(dataFileUrl("plan-templates.json"), PlanTemplatesSchema);
  }
  return cachedTemplates;
}

function textOf(value: FactValue | undefined): string | undefined {
  if (value === undefined || isEmptyFactValue(value)) return undefined;
  return stringifyFactValue(value);
}

function listOf(value: FactValue | undefined): string[] {
  if (value === undefined || isEmptyFactValue(value)) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.map(stringifyFactValue).filter((item) => item.trim().length > 0);
}

function isProblemArea(value: string): value is ProblemArea {
  return PROBLEM_AREAS.some((area) => area === value);
}

function slugify(str: string): string {
  return str
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function titleCase(resource: string): string {
  return resource
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export class HeuristicPlanningProvider implements PlanningProvider {
  readonly name = "heuristic";
  private readonly templates: PlanTemplates;

  constructor(templates: PlanTemplates = getPlanTemplates()) {
    this.templates = templates;
  }

  async deriveRequirements(input: PlanningInput): Promise<Requirements> {
    const { facts, profile } = input;
    const problem =
      PROBLEM_FIELDS.map((field) => textOf(facts[field])).find((text) => text !== undefined) ??
      "Unspecified problem";
    const business = textOf(facts["business_type"]) ?? profile?.category ?? "business";

    return {
      summary: `${business}: ${problem}`,
      problem,
      problemArea: this.detectProblemArea(
        textOf(facts["problem_area"]),
        [problem, textOf(facts["detailed_workflow"]) ?? ""].join(" "),
      ),
      features: listOf(facts["must_have_features"]),
      constraints: listOf(facts["constraints"]),
      successMetrics: listOf(facts["success_metrics"]),
    };
  }

  async identifyIntegrations(input: PlanningInput): Promise<Integration[]> {
    const names = [
      ...listOf(input.facts["tools_used"]).map((tool) => tool.toLowerCase().trim()),
      ...(input.profile?.toolsMentioned ?? []),
    ];

    return [...new Set(names)].map((name) => ({
      name,
      purpose: this.templates.integrationPurposes[name] ?? `Sync data with ${name}`,
    }));
  }

  async planDatabase(input: PlanningInput): Promise<DatabasePlan> {
    const category = input.profile?.category ?? "unknown";
    const names = this.templates.entities[category] ?? this.templates.entities.unknown;

    return {
      entities: names.map((name) => ({ name, fields: [...this.templates.entityFields] })),
    };
  }

  async planBackend(
    database: DatabasePlan,
    _requirements: Requirements,
    integrations: Integration[],
  ): Promise<BackendPlan> {
    const endpoints: BackendPlan["endpoints"] = [];

    for (const entity of database.entities) {
      const base = `/api/${entity.name}`;
      endpoints.push(
        { method: "GET", path: base, description: `List ${entity.name}` },
        { method: "POST", path: base, description: `Create a record in ${entity.name}` },
        { method: "GET", path: `${base}/:id`, description: `Fetch one record from ${entity.name}` },
        { method: "PATCH", path: `${base}/:id`, description: `Update a record in ${entity.name}` },
      );
    }

    for (const integration of integrations) {
      endpoints.push({
        method: "POST",
        path: `/api/integrations/${slugify(integration.name)}/sync`,
        description: integration.purpose,
      });
    }

    return { endpoints };
  }

  async planFrontend(backend: BackendPlan): Promise<FrontendPlan> {
    const byResource = new Map<string, string[]>();
    const listEndpoints: string[] = [];
    const integrationEndpoints: string[] = [];

    for (const endpoint of backend.endpoints) {
      const label = `${endpoint.method} ${endpoint.path}`;
      const resource = endpoint.path.split("/")[2];
      if (!resource) continue;

      if (resource === "integrations") {
        integrationEndpoints.push(label);
        continue;
      }

      const labels = byResource.get(resource) ?? [];
      labels.push(label);
      byResource.set(resource, labels);
      if (endpoint.method === "GET" && !endpoint.path.endsWith("/:id")) {
        listEndpoints.push(label);
      }
    }

    const pages: FrontendPlan["pages"] = [{ name: "Dashboard", route: "/", endpoints: listEndpoints }];
    for (const [resource, labels] of byResource) {
      pages.push({ name: titleCase(resource), route: `/${resource}`, endpoints: labels });
    }
    if (integrationEndpoints.length > 0) {
      pages.push({ name: "Integrations", route: "/integrations", endpoints: integrationEndpoints });
    }

    return { pages };
  }

  async recommendSolution(
    input: PlanningInput,
    requirements: Requirements,
  ): Promise<SolutionRecommendation> {
    const solution = this.templates.solutions[requirements.problemArea];
    const timeSpent =
      textOf(input.facts["time_investment"]) ??
      textOf(input.facts["time_spent"]) ??
      "significant time";

    return {
      solutionType: solution.solutionType,
      technicalStack: solution.technicalStack,
      coreFeatures: [...solution.coreFeatures],
      estimatedImpact: `Will reduce ${timeSpent} spent on ${requirements.problem}`,
    };
  }

  private detectProblemArea(explicit: string | undefined, text: string): ProblemArea {
    const requested = explicit?.toLowerCase().trim();
    if (requested && isProblemArea(requested)) return requested;

    const lower = text.toLowerCase();
    const keywords = this.templates.problemAreaKeywords;
    const areas = ["support", "sales", "operations", "data"] as const;
    return areas.find((area) => keywords[area].some((word) => lower.includes(word))) ?? "process";
  }
}
