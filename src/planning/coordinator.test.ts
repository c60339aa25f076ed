/**
 * Planning Coordinator Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { PlanningCoordinator, type PlanStatusChange } from "./coordinator.js";
import type { Plan, PlanningInput, PlanningProvider, Requirements } from "./types.js";
import { createLogger } from "../utils/logger.js";

const NOW = new Date("2026-05-04T12:00:00.000Z");
const quietLogger = createLogger({ level: "fatal", prettyPrint: false });

const REQUIREMENTS: Requirements = {
  summary: "retail: stock counts drift",
  problem: "stock counts drift",
  problemArea: "operations",
  features: [],
  constraints: [],
  successMetrics: [],
};

const INPUT: PlanningInput = {
  sessionId: "session-1",
  facts: { specific_problem: "stock counts drift" },
  profile: null,
};

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function fakeProvider(overrides: Partial<PlanningProvider> = {}): PlanningProvider {
  return {
    name: "fake",
    deriveRequirements: async () => REQUIREMENTS,
    identifyIntegrations: async () => [{ name: "slack", purpose: "notify" }],
    planDatabase: async () => ({ entities: [{ name: "tasks", fields: ["id"] }] }),
    planBackend: async () => ({
      endpoints: [{ method: "GET", path: "/api/tasks", description: "List tasks" }],
    }),
    planFrontend: async () => ({
      pages: [{ name: "Dashboard", route: "/", endpoints: ["GET /api/tasks"] }],
    }),
    ...overrides,
  };
}

function createCoordinator(
  provider: PlanningProvider,
  stepTimeoutMs?: number,
): PlanningCoordinator {
  return new PlanningCoordinator(provider, {
    logger: quietLogger,
    now: () => NOW,
    stepTimeoutMs,
  });
}

describe("PlanningCoordinator", () => {
  let changes: PlanStatusChange[];

  beforeEach(() => {
    changes = [];
  });

  it("should report idle for an unknown session", () => {
    const coordinator = createCoordinator(fakeProvider());

    expect(coordinator.getStatus("nobody")).toEqual({
      status: "idle",
      progress: 0,
      lastUpdate: "2026-05-04T12:00:00.000Z",
    });
    expect(coordinator.getPlan("nobody")).toBeUndefined();
  });

  it("should move to planning synchronously and finish with a plan", async () => {
    const coordinator = createCoordinator(fakeProvider());
    coordinator.onStatusChange((change) => changes.push(change));

    expect(coordinator.tryStart("session-1", INPUT)).toBe(true);
    expect(coordinator.getStatus("session-1").status).toBe("planning");
    expect(coordinator.getStatus("session-1").progress).toBe(5);

    const final = await coordinator.whenSettled("session-1");

    expect(final.status).toBe("plan_ready");
    expect(final.progress).toBe(100);
    expect(changes.map((change) => [change.status.status, change.status.progress])).toEqual([
      ["planning", 5],
      ["analyzing", 15],
      ["planning_architecture", 30],
      ["planning_architecture", 50],
      ["planning_architecture", 70],
      ["planning_architecture", 90],
      ["plan_ready", 100],
    ]);

    const expected: Plan = {
      provider: "fake",
      requirements: REQUIREMENTS,
      integrations: [{ name: "slack", purpose: "notify" }],
      database: { entities: [{ name: "tasks", fields: ["id"] }] },
      backend: { endpoints: [{ method: "GET", path: "/api/tasks", description: "List tasks" }] },
      frontend: { pages: [{ name: "Dashboard", route: "/", endpoints: ["GET /api/tasks"] }] },
      createdAt: "2026-05-04T12:00:00.000Z",
    };
    expect(coordinator.getPlan("session-1")).toEqual(expected);
    expect(changes[6]?.plan).toEqual(expected);
    expect(changes[5]?.plan).toBeUndefined();
  });

  it("should include a recommendation when the provider offers one", async () => {
    const coordinator = createCoordinator(
      fakeProvider({
        recommendSolution: async () => ({
          solutionType: "Operations Dashboard",
          technicalStack: "Node.js",
          coreFeatures: ["Alerts"],
          estimatedImpact: "less drift",
        }),
      }),
    );

    coordinator.tryStart("session-1", INPUT);
    await coordinator.whenSettled("session-1");

    expect(coordinator.getPlan("session-1")?.recommendation?.solutionType).toBe(
      "Operations Dashboard",
    );
  });

  it("should refuse a second run while one is in flight", async () => {
    const gate = deferred<Requirements>();
    const coordinator = createCoordinator(
      fakeProvider({ deriveRequirements: () => gate.promise }),
    );

    expect(coordinator.tryStart("session-1", INPUT)).toBe(true);
    expect(coordinator.tryStart("session-1", INPUT)).toBe(false);

    gate.resolve(REQUIREMENTS);
    await coordinator.whenSettled("session-1");

    expect(coordinator.getStatus("session-1").status).toBe("plan_ready");
    expect(coordinator.tryStart("session-1", INPUT)).toBe(false);
  });

  it("should run sessions independently", async () => {
    const gate = deferred<Requirements>();
    const coordinator = createCoordinator(
      fakeProvider({ deriveRequirements: () => gate.promise }),
    );

    expect(coordinator.tryStart("session-1", INPUT)).toBe(true);
    expect(coordinator.tryStart("session-2", { ...INPUT, sessionId: "session-2" })).toBe(true);

    gate.resolve(REQUIREMENTS);
    await coordinator.whenSettled("session-1");
    await coordinator.whenSettled("session-2");

    expect(coordinator.getStatus("session-2").status).toBe("plan_ready");
  });

  it("should record a failing step as an error and allow a restart", async () => {
    let failDatabase = true;
    const coordinator = createCoordinator(
      fakeProvider({
        planDatabase: async () => {
          if (failDatabase) throw new Error("database planner offline");
          return { entities: [] };
        },
      }),
    );

    coordinator.tryStart("session-1", INPUT);
    const failed = await coordinator.whenSettled("session-1");

    expect(failed).toEqual({
      status: "error",
      progress: 30,
      error: 'Planning step "database" failed: database planner offline',
      lastUpdate: "2026-05-04T12:00:00.000Z",
    });
    expect(coordinator.getPlan("session-1")).toBeUndefined();

    failDatabase = false;
    expect(coordinator.tryStart("session-1", INPUT)).toBe(true);
    expect((await coordinator.whenSettled("session-1")).status).toBe("plan_ready");
  });

  it("should fail a step that exceeds the step timeout", async () => {
    const never = deferred<Requirements>();
    const coordinator = createCoordinator(
      fakeProvider({ deriveRequirements: () => never.promise }),
      20,
    );

    coordinator.tryStart("session-1", INPUT);
    const failed = await coordinator.whenSettled("session-1");

    expect(failed.status).toBe("error");
    expect(failed.progress).toBe(5);
    expect(failed.error).toBe(
      'Planning step "requirements" failed: Planning step "requirements" timed out after 20ms',
    );
  });

  it("should keep running when a listener throws", async () => {
    const coordinator = createCoordinator(fakeProvider());
    coordinator.onStatusChange(() => {
      throw new Error("listener broke");
    });
    coordinator.onStatusChange((change) => changes.push(change));

    coordinator.tryStart("session-1", INPUT);
    await coordinator.whenSettled("session-1");

    expect(changes).toHaveLength(7);
    expect(coordinator.getStatus("session-1").status).toBe("plan_ready");
  });

  it("should stop notifying after unsubscribe", async () => {
    const coordinator = createCoordinator(fakeProvider());
    const unsubscribe = coordinator.onStatusChange((change) => changes.push(change));
    unsubscribe();

    coordinator.tryStart("session-1", INPUT);
    await coordinator.whenSettled("session-1");

    expect(changes).toEqual([]);
  });

  describe("restore", () => {
    it("should turn an in-flight status into an interrupted error", () => {
      const coordinator = createCoordinator(fakeProvider());

      coordinator.restore("session-1", {
        status: "planning_architecture",
        progress: 50,
        lastUpdate: "2026-05-01T08:00:00.000Z",
      });

      expect(coordinator.getStatus("session-1")).toEqual({
        status: "error",
        progress: 50,
        error: "interrupted",
        lastUpdate: "2026-05-04T12:00:00.000Z",
      });
      expect(coordinator.tryStart("session-1", INPUT)).toBe(true);
    });

    it("should keep a ready plan", () => {
      const coordinator = createCoordinator(fakeProvider());
      const plan: Plan = {
        provider: "fake",
        requirements: REQUIREMENTS,
        integrations: [],
        database: { entities: [] },
        backend: { endpoints: [] },
        frontend: { pages: [] },
        createdAt: "2026-05-01T08:00:00.000Z",
      };

      coordinator.restore(
        "session-1",
        { status: "plan_ready", progress: 100, lastUpdate: "2026-05-01T08:00:00.000Z" },
        plan,
      );

      expect(coordinator.getStatus("session-1").status).toBe("plan_ready");
      expect(coordinator.getPlan("session-1")).toEqual(plan);
      expect(coordinator.tryStart("session-1", INPUT)).toBe(false);
    });
  });

  it("should not publish for a forgotten session", async () => {
    const gate = deferred<Requirements>();
    const coordinator = createCoordinator(
      fakeProvider({ deriveRequirements: () => gate.promise }),
    );
    coordinator.tryStart("session-1", INPUT);
    coordinator.onStatusChange((change) => changes.push(change));

    coordinator.forget("session-1");
    gate.resolve(REQUIREMENTS);
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(changes).toEqual([]);
    expect(coordinator.getStatus("session-1").status).toBe("idle");
  });
});
