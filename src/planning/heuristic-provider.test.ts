/**
 * Heuristic planning provider tests
 */

import { describe, it, expect } from "vitest";
import { HeuristicPlanningProvider, getPlanTemplates } from "./heuristic-provider.js";
import type { PlanningInput } from "./types.js";
import { classifyBusiness } from "../classifier/classifier.js";

const lawFirm = classifyBusiness("I run a law firm with 15 attorneys handling corporate litigation");

const INPUT: PlanningInput = {
  sessionId: "session-1",
  facts: {
    specific_problem: "Client intake forms are retyped into our billing system",
    detailed_workflow: "A paralegal copies each form by hand",
    tools_used: ["Excel", "QuickBooks"],
    time_investment: "10 hours a week",
    must_have_features: ["intake form", "billing sync"],
    constraints: "must run on premises",
  },
  profile: { ...lawFirm, toolsMentioned: ["slack", "excel"] },
};

describe("HeuristicPlanningProvider", () => {
  const provider = new HeuristicPlanningProvider();

  describe("deriveRequirements", () => {
    it("should build requirements from the facts", async () => {
      expect(await provider.deriveRequirements(INPUT)).toEqual({
        summary: "professional_services: Client intake forms are retyped into our billing system",
        problem: "Client intake forms are retyped into our billing system",
        problemArea: "process",
        features: ["intake form", "billing sync"],
        constraints: ["must run on premises"],
        successMetrics: [],
      });
    });

    it("should prefer the stated business type in the summary", async () => {
      const requirements = await provider.deriveRequirements({
        ...INPUT,
        facts: { ...INPUT.facts, business_type: "boutique law practice" },
      });

      expect(requirements.summary).toBe(
        "boutique law practice: Client intake forms are retyped into our billing system",
      );
    });

    it("should detect the problem area from keywords", async () => {
      const requirements = await provider.deriveRequirements({
        ...INPUT,
        facts: { specific_problem: "Support tickets sit unanswered for days" },
      });

      expect(requirements.problemArea).toBe("support");
    });

    it("should honour an explicit problem area", async () => {
      const requirements = await provider.deriveRequirements({
        ...INPUT,
        facts: { ...INPUT.facts, problem_area: "Sales" },
      });

      expect(requirements.problemArea).toBe("sales");
    });

    it("should ignore an unrecognised problem area", async () => {
      const requirements = await provider.deriveRequirements({
        ...INPUT,
        facts: { ...INPUT.facts, problem_area: "logistics" },
      });

      expect(requirements.problemArea).toBe("process");
    });

    it("should fall back when no problem was stated", async () => {
      const requirements = await provider.deriveRequirements({
        sessionId: "session-2",
        facts: {},
        profile: null,
      });

      expect(requirements.problem).toBe("Unspecified problem");
      expect(requirements.summary).toBe("business: Unspecified problem");
    });
  });

  describe("identifyIntegrations", () => {
    it("should merge stated tools with detected ones", async () => {
      expect(await provider.identifyIntegrations(INPUT)).toEqual([
        { name: "excel", purpose: "Import existing spreadsheet data" },
        { name: "quickbooks", purpose: "Sync invoices and payments" },
        { name: "slack", purpose: "Send notifications to team channels" },
      ]);
    });

    it("should describe an unknown tool generically", async () => {
      const integrations = await provider.identifyIntegrations({
        sessionId: "session-2",
        facts: { tools_used: "Clio" },
        profile: null,
      });

      expect(integrations).toEqual([{ name: "clio", purpose: "Sync data with clio" }]);
    });
  });

  describe("planDatabase", () => {
    it("should pick entities for the business category", async () => {
      const database = await provider.planDatabase(INPUT);

      expect(database.entities.map((entity) => entity.name)).toEqual([
        "clients",
        "matters",
        "documents",
        "time_entries",
      ]);
      expect(database.entities[0]?.fields).toEqual([
        "id",
        "name",
        "status",
        "created_at",
        "updated_at",
      ]);
    });

    it("should use generic entities without a profile", async () => {
      const database = await provider.planDatabase({ ...INPUT, profile: null });

      expect(database.entities.map((entity) => entity.name)).toEqual([
        "customers",
        "requests",
        "tasks",
      ]);
    });
  });

  describe("planBackend and planFrontend", () => {
    const database = { entities: [{ name: "time_entries", fields: ["id"] }] };
    const integrations = [{ name: "Google Cloud", purpose: "Store documents" }];

    it("should expose CRUD routes per entity and a sync route per integration", async () => {
      const backend = await provider.planBackend(
        database,
        await provider.deriveRequirements(INPUT),
        integrations,
      );

      expect(backend.endpoints.map((endpoint) => `${endpoint.method} ${endpoint.path}`)).toEqual([
        "GET /api/time_entries",
        "POST /api/time_entries",
        "GET /api/time_entries/:id",
        "PATCH /api/time_entries/:id",
        "POST /api/integrations/google-cloud/sync",
      ]);
      expect(backend.endpoints[4]?.description).toBe("Store documents");
    });

    it("should lay out a dashboard, a page per resource and an integrations page", async () => {
      const requirements = await provider.deriveRequirements(INPUT);
      const backend = await provider.planBackend(database, requirements, integrations);

      const frontend = await provider.planFrontend(backend);

      expect(frontend.pages).toEqual([
        { name: "Dashboard", route: "/", endpoints: ["GET /api/time_entries"] },
        {
          name: "Time Entries",
          route: "/time_entries",
          endpoints: [
            "GET /api/time_entries",
            "POST /api/time_entries",
            "GET /api/time_entries/:id",
            "PATCH /api/time_entries/:id",
          ],
        },
        {
          name: "Integrations",
          route: "/integrations",
          endpoints: ["POST /api/integrations/google-cloud/sync"],
        },
      ]);
    });
  });

  describe("recommendSolution", () => {
    it("should pick the template for the problem area", async () => {
      const requirements = await provider.deriveRequirements(INPUT);

      expect(await provider.recommendSolution(INPUT, requirements)).toEqual({
        solutionType: "Workflow Automation System",
        technicalStack: "Node.js API + React + PostgreSQL",
        coreFeatures: ["Process Builder", "Task Management", "Integration Hub", "Monitoring"],
        estimatedImpact:
          "Will reduce 10 hours a week spent on Client intake forms are retyped into our billing system",
      });
    });
  });

  it("should load the bundled templates once", () => {
    expect(getPlanTemplates()).toBe(getPlanTemplates());
    expect(Object.isFrozen(getPlanTemplates())).toBe(true);
  });
});
