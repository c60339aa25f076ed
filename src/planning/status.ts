/**
 * Background plan status
 *
 * idle -> planning -> analyzing -> planning_architecture -> plan_ready,
 * with error reachable from any in-flight state and error -> idle | planning
 * as the only way back.
 */

import { z } from "zod";
import { PlanningError } from "../utils/errors.js";

export const PLAN_STATUSES = [
  "idle",
  "planning",
  "analyzing",
  "planning_architecture",
  "plan_ready",
  "error",
] as const;

export type PlanStatusName = (typeof PLAN_STATUSES)[number];

export const BackgroundPlanStatusSchema = z.object({
  status: z.enum(PLAN_STATUSES),
  progress: z.number().min(0).max(100),
  error: z.string().optional(),
  lastUpdate: z.string().datetime(),
});

export type BackgroundPlanStatus = z.infer<typeof BackgroundPlanStatusSchema>;

/**
 * Progress checkpoints of one planning run
 */
export const PLAN_CHECKPOINTS = {
  started: 5,
  requirements: 15,
  integrations: 30,
  database: 50,
  backend: 70,
  frontend: 90,
  ready: 100,
} as const;

const TRANSITIONS: Record<PlanStatusName, readonly PlanStatusName[]> = {
  idle: ["planning"],
  planning: ["analyzing", "error"],
  analyzing: ["planning_architecture", "error"],
  planning_architecture: ["planning_architecture", "plan_ready", "error"],
  plan_ready: [],
  error: ["idle", "planning"],
};

export function createIdleStatus(now: Date = new Date()): BackgroundPlanStatus {
  return { status: "idle", progress: 0, lastUpdate: now.toISOString() };
}

/**
 * A run may start only from idle or error
 */
export function canStartPlanning(status: BackgroundPlanStatus): boolean {
  return status.status === "idle" || status.status === "error";
}

export function isPlanningInFlight(status: BackgroundPlanStatus): boolean {
  return (
    status.status === "planning" ||
    status.status === "analyzing" ||
    status.status === "planning_architecture"
  );
}

export function canTransition(from: PlanStatusName, to: PlanStatusName): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Move to the next status, rejecting illegal moves and progress that goes backwards
 * within a run
 */
export function transitionStatus(
  current: BackgroundPlanStatus,
  to: PlanStatusName,
  options: { progress?: number; error?: string; now?: Date } = {},
): BackgroundPlanStatus {
  if (!canTransition(current.status, to)) {
    throw new PlanningError(`Invalid plan status transition: ${current.status} -> ${to}`, {
      recoverable: false,
    });
  }

  const restarting = to === "planning" || to === "idle";
  let progress: number;
  if (to === "idle") {
    progress = 0;
  } else if (to === "error") {
    progress = current.progress;
  } else {
    progress = Math.min(Math.max(options.progress ?? current.progress, 0), 100);
    if (!restarting && progress < current.progress) {
      throw new PlanningError(
        `Plan progress cannot decrease (${current.progress} -> ${progress})`,
        { recoverable: false },
      );
    }
  }

  const next: BackgroundPlanStatus = {
    status: to,
    progress,
    lastUpdate: (options.now ?? new Date()).toISOString(),
  };
  if (to === "error") {
    next.error = options.error ?? "Unknown planning error";
  }
  return next;
}
