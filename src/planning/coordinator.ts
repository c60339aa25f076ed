/**
 * Planning Coordinator
 *
 * Runs at most one background planning job per session. A run is started
 * by the turn pipeline without awaiting it; status changes are published
 * to listeners and can be read at any time.
 */

import type { ILogObj, Logger } from "tslog";
import { timeout } from "../utils/async.js";
import { errorMessage, PlanningError } from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import {
  canStartPlanning,
  createIdleStatus,
  isPlanningInFlight,
  PLAN_CHECKPOINTS,
  transitionStatus,
  type BackgroundPlanStatus,
  type PlanStatusName,
} from "./status.js";
import type { Plan, PlanningInput, PlanningProvider } from "./types.js";

export const DEFAULT_STEP_TIMEOUT_MS = 120_000;

export interface PlanStatusChange {
  sessionId: string;
  status: BackgroundPlanStatus;
  /** Set once the status is plan_ready */
  plan?: Plan;
}

export type PlanStatusListener = (change: PlanStatusChange) => void;

export interface PlanningCoordinatorOptions {
  /** Per-step limit on provider calls */
  stepTimeoutMs?: number;
  logger?: Logger<ILogObj>;
  now?: () => Date;
}

interface SessionEntry {
  status: BackgroundPlanStatus;
  plan?: Plan;
  running?: Promise<void>;
}

export class PlanningCoordinator {
  private readonly sessions: Map<string, SessionEntry> = new Map();
  private readonly listeners: PlanStatusListener[] = [];
  private readonly stepTimeoutMs: number;
  private readonly logger: Logger<ILogObj>;
  private readonly now: () => Date;

  constructor(
    private readonly provider: PlanningProvider,
    options: PlanningCoordinatorOptions = {},
  ) {
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.logger = createChildLogger(options.logger ?? getLogger(), "planning");
    this.now = options.now ?? (() => new Date());
  }

  getStatus(sessionId: string): BackgroundPlanStatus {
    const entry = this.sessions.get(sessionId);
    return entry ? { ...entry.status } : createIdleStatus(this.now());
  }

  getPlan(sessionId: string): Plan | undefined {
    return this.sessions.get(sessionId)?.plan;
  }

  /**
   * Start a run unless one is in flight or a plan is already ready
   *
   * The gate check and the move to `planning` happen synchronously, so two
   * calls in the same tick cannot both start a run.
   *
   * @returns whether a run was started
   */
  tryStart(sessionId: string, input: PlanningInput): boolean {
    const entry = this.entryFor(sessionId);
    if (!canStartPlanning(entry.status)) {
      this.logger.debug(`Planning not started for ${sessionId}: status is ${entry.status.status}`);
      return false;
    }

    entry.plan = undefined;
    this.update(sessionId, entry, "planning", PLAN_CHECKPOINTS.started);
    this.logger.info(`Planning started for ${sessionId} with ${this.provider.name}`);

    const run: Promise<void> = this.execute(sessionId, entry, input)
      .then((plan) => {
        entry.plan = plan;
        this.update(sessionId, entry, "plan_ready", PLAN_CHECKPOINTS.ready);
        this.logger.info(`Plan ready for ${sessionId}`);
      })
      .catch((error: unknown) => {
        const message = errorMessage(error);
        this.logger.error(
          error instanceof PlanningError
            ? error
            : new PlanningError(message, {
                sessionId,
                cause: error instanceof Error ? error : undefined,
              }),
        );
        if (isPlanningInFlight(entry.status)) {
          entry.status = transitionStatus(entry.status, "error", {
            error: message,
            now: this.now(),
          });
          this.notify(sessionId, entry);
        }
      })
      .finally(() => {
        if (entry.running === run) {
          entry.running = undefined;
        }
      });

    entry.running = run;
    return true;
  }

  /**
   * Subscribe to status changes
   *
   * @returns unsubscribe function
   */
  onStatusChange(listener: PlanStatusListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /**
   * Seed a session's status from storage
   *
   * No run survives a restart, so an in-flight status comes back as an
   * interrupted error and may be retried.
   */
  restore(sessionId: string, status: BackgroundPlanStatus, plan?: Plan): void {
    let restored = { ...status };
    if (isPlanningInFlight(status)) {
      restored = transitionStatus(status, "error", { error: "interrupted", now: this.now() });
      this.logger.warn(`Planning for ${sessionId} was interrupted by a restart`);
    }
    this.sessions.set(sessionId, { status: restored, plan });
  }

  /**
   * Resolve once the session's current run (if any) has settled
   */
  async whenSettled(sessionId: string): Promise<BackgroundPlanStatus> {
    const running = this.sessions.get(sessionId)?.running;
    if (running) {
      await running;
    }
    return this.getStatus(sessionId);
  }

  /**
   * Drop a session; a run still in flight finishes without publishing
   */
  forget(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  private entryFor(sessionId: string): SessionEntry {
    let entry = this.sessions.get(sessionId);
    if (!entry) {
      entry = { status: createIdleStatus(this.now()) };
      this.sessions.set(sessionId, entry);
    }
    return entry;
  }

  private async execute(
    sessionId: string,
    entry: SessionEntry,
    input: PlanningInput,
  ): Promise<Plan> {
    const provider = this.provider;

    const requirements = await this.step(sessionId, "requirements", () =>
      provider.deriveRequirements(input),
    );
    this.update(sessionId, entry, "analyzing", PLAN_CHECKPOINTS.requirements);

    const integrations = await this.step(sessionId, "integrations", () =>
      provider.identifyIntegrations(input, requirements),
    );
    this.update(sessionId, entry, "planning_architecture", PLAN_CHECKPOINTS.integrations);

    const database = await this.step(sessionId, "database", () =>
      provider.planDatabase(input, requirements),
    );
    this.update(sessionId, entry, "planning_architecture", PLAN_CHECKPOINTS.database);

    const backend = await this.step(sessionId, "backend", () =>
      provider.planBackend(database, requirements, integrations),
    );
    this.update(sessionId, entry, "planning_architecture", PLAN_CHECKPOINTS.backend);

    const frontend = await this.step(sessionId, "frontend", () =>
      provider.planFrontend(backend, requirements),
    );
    this.update(sessionId, entry, "planning_architecture", PLAN_CHECKPOINTS.frontend);

    const plan: Plan = {
      provider: provider.name,
      requirements,
      integrations,
      database,
      backend,
      frontend,
      createdAt: this.now().toISOString(),
    };

    if (provider.recommendSolution) {
      const recommend = provider.recommendSolution.bind(provider);
      plan.recommendation = await this.step(sessionId, "recommendation", () =>
        recommend(input, requirements),
      );
    }

    return plan;
  }

  private async step<T>(sessionId: string, name: string, work: () => Promise<T>): Promise<T> {
    try {
      return await timeout(work(), this.stepTimeoutMs, `Planning step "${name}"`);
    } catch (error) {
      throw new PlanningError(`Planning step "${name}" failed: ${errorMessage(error)}`, {
        sessionId,
        step: name,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private update(
    sessionId: string,
    entry: SessionEntry,
    to: PlanStatusName,
    progress: number,
  ): void {
    if (this.sessions.get(sessionId) !== entry) {
      throw new PlanningError(`Planning run for ${sessionId} was superseded`, {
        sessionId,
        recoverable: false,
      });
    }
    entry.status = transitionStatus(entry.status, to, { progress, now: this.now() });
    this.notify(sessionId, entry);
  }

  private notify(sessionId: string, entry: SessionEntry): void {
    if (this.sessions.get(sessionId) !== entry) return;
    const change: PlanStatusChange = {
      sessionId,
      status: { ...entry.status },
      plan: entry.plan,
    };
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (error) {
        this.logger.warn(`Plan status listener failed: ${errorMessage(error)}`);
      }
    }
  }
}
