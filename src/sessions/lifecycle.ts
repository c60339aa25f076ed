/**
 * Intake Lifecycle
 *
 * Runs one conversational turn end to end: merge the extracted facts,
 * classify until a profile is accepted, score, decide the phase, persist,
 * and start background planning when the facts allow it. Turns of one
 * session are serialised; sessions are independent.
 *
 * Each change is built on a copy of the cached session and replaces the
 * cached one only once the store has saved it.
 */

import { randomUUID } from "node:crypto";
import type { ILogObj, Logger } from "tslog";
import { classifyBusiness, shouldAcceptProfile } from "../classifier/classifier.js";
import { getPatternTable, type PatternTable } from "../classifier/patterns.js";
import type { BusinessProfile } from "../classifier/types.js";
import {
  DEFAULT_READINESS_THRESHOLD,
  evaluatePhase,
  type PhaseDecision,
} from "../phases/machine.js";
import type { PlanningCoordinator, PlanStatusChange } from "../planning/coordinator.js";
import { isPlanningEligible } from "../planning/eligibility.js";
import {
  createIdleStatus,
  isPlanningInFlight,
  type BackgroundPlanStatus,
} from "../planning/status.js";
import { mergeFacts, type FactUpdate } from "../scoring/facts.js";
import { getInformationSchema, type InformationSchema } from "../scoring/schema.js";
import {
  calculateProgress,
  findInformationGaps,
  type InformationGap,
  type ProgressResult,
} from "../scoring/scorer.js";
import { errorMessage, SessionError } from "../utils/errors.js";
import { createChildLogger, getLogger, logEvent } from "../utils/logger.js";
import type { SessionStore } from "./storage.js";
import { SessionIdSchema, type IntakeSession, type SessionMetadata } from "./types.js";

/** Gaps reported with each turn */
const MAX_REPORTED_GAPS = 3;

export interface TurnInput {
  utterance: string;
  /** Facts the extraction step pulled from this utterance */
  extracted?: FactUpdate;
}

export interface TurnResult {
  sessionId: string;
  /** The session's accepted profile after this turn */
  profile: BusinessProfile | null;
  /** This turn's classification, when one ran */
  classification: BusinessProfile | null;
  profileAccepted: boolean;
  progress: ProgressResult;
  decision: PhaseDecision;
  gaps: InformationGap[];
  planningStarted: boolean;
  planStatus: BackgroundPlanStatus;
}

export interface IntakeLifecycleOptions {
  store: SessionStore;
  /** Without a coordinator no background planning runs */
  coordinator?: PlanningCoordinator;
  readinessThreshold?: number;
  /** Create a session on the first turn for an unknown id (default true) */
  createIfMissing?: boolean;
  schema?: InformationSchema;
  patternTable?: PatternTable;
  logger?: Logger<ILogObj>;
  now?: () => Date;
}

export class IntakeLifecycle {
  private readonly sessions: Map<string, IntakeSession> = new Map();
  private readonly queues: Map<string, Promise<void>> = new Map();
  private readonly store: SessionStore;
  private readonly coordinator?: PlanningCoordinator;
  private readonly readinessThreshold: number;
  private readonly createIfMissing: boolean;
  private readonly schema: InformationSchema;
  private readonly patternTable: PatternTable;
  private readonly logger: Logger<ILogObj>;
  private readonly now: () => Date;

  constructor(options: IntakeLifecycleOptions) {
    this.store = options.store;
    this.coordinator = options.coordinator;
    this.readinessThreshold = options.readinessThreshold ?? DEFAULT_READINESS_THRESHOLD;
    this.createIfMissing = options.createIfMissing ?? true;
    this.schema = options.schema ?? getInformationSchema();
    this.patternTable = options.patternTable ?? getPatternTable();
    this.logger = createChildLogger(options.logger ?? getLogger(), "sessions");
    this.now = options.now ?? (() => new Date());

    this.coordinator?.onStatusChange((change) => this.persistPlanStatus(change));
  }

  /**
   * Create and store an empty session
   */
  async startSession(sessionId: string = randomUUID()): Promise<IntakeSession> {
    return this.enqueue(sessionId, async () => {
      if (this.sessions.has(sessionId) || (await this.store.exists(sessionId))) {
        throw new SessionError(`Session already exists: ${sessionId}`, { sessionId });
      }
      const session = this.createSession(sessionId);
      await this.commit(session);
      return session;
    });
  }

  /**
   * The session from memory, then storage; null when neither has it
   */
  async getSession(sessionId: string): Promise<IntakeSession | null> {
    const cached = this.sessions.get(sessionId);
    if (cached) return cached;

    const stored = await this.store.load(sessionId);
    if (!stored) return null;

    // a concurrent caller may have loaded it while we waited
    const raced = this.sessions.get(sessionId);
    if (raced) return raced;

    if (this.coordinator) {
      this.coordinator.restore(sessionId, stored.planStatus, stored.plan);
      stored.planStatus = this.coordinator.getStatus(sessionId);
    }
    this.sessions.set(sessionId, stored);
    return stored;
  }

  listSessions(): Promise<SessionMetadata[]> {
    return this.store.listSessions();
  }

  processTurn(sessionId: string, input: TurnInput): Promise<TurnResult> {
    return this.enqueue(sessionId, () => this.runTurn(sessionId, input));
  }

  /**
   * Record the reply the conversation layer sent back
   */
  appendAssistantMessage(sessionId: string, content: string): Promise<void> {
    return this.enqueue(sessionId, async () => {
      const session = await this.requireSession(sessionId);
      const timestamp = this.now().toISOString();
      await this.commit({
        ...session,
        messages: [...session.messages, { role: "assistant", content, timestamp }],
        updatedAt: timestamp,
      });
    });
  }

  /**
   * Drop a session from memory once its queued work has run
   *
   * A session with a plan still in flight stays cached so the finished
   * plan can be stored.
   *
   * @returns whether the session was evicted
   */
  async closeSession(sessionId: string): Promise<boolean> {
    await this.coordinator?.whenSettled(sessionId);
    return this.enqueueFinal(sessionId, async () => {
      if (this.coordinator && isPlanningInFlight(this.coordinator.getStatus(sessionId))) {
        this.logger.debug(`Session ${sessionId} kept open: planning in flight`);
        return false;
      }
      this.evict(sessionId);
      return true;
    });
  }

  /**
   * Evict a session and delete it from storage; a plan in flight is dropped
   *
   * @returns whether a session was stored under this id
   */
  deleteSession(sessionId: string): Promise<boolean> {
    return this.enqueueFinal(sessionId, async () => {
      this.evict(sessionId);
      const deleted = await this.store.delete(sessionId);
      if (deleted) {
        logEvent(this.logger, "session_deleted", { sessionId });
      }
      return deleted;
    });
  }

  /** Sessions held in memory */
  get openSessionCount(): number {
    return this.sessions.size;
  }

  /** Sessions with a work queue */
  get queuedSessionCount(): number {
    return this.queues.size;
  }

  /**
   * Wait for the session's background plan and for its status to be stored
   */
  async whenPlanningSettled(sessionId: string): Promise<BackgroundPlanStatus> {
    if (!this.coordinator) {
      return (await this.getSession(sessionId))?.planStatus ?? createIdleStatus(this.now());
    }
    const status = await this.coordinator.whenSettled(sessionId);
    await this.queues.get(sessionId);
    return status;
  }

  private async runTurn(sessionId: string, input: TurnInput): Promise<TurnResult> {
    const session = await this.loadOrCreate(sessionId);
    const timestamp = this.now().toISOString();

    let facts = mergeFacts(session.facts, input.extracted ?? {});

    let profile = session.profile;
    let classification: BusinessProfile | null = null;
    let profileAccepted = false;
    if (!profile) {
      classification = classifyBusiness(input.utterance, {}, this.patternTable);
      if (shouldAcceptProfile(classification)) {
        profile = classification;
        profileAccepted = true;
        facts = mergeFacts(facts, {
          business_type: classification.category,
          business_subcategory: classification.subcategory,
        });
        logEvent(this.logger, "profile_accepted", {
          sessionId,
          category: classification.category,
          confidence: classification.confidence,
        });
      }
    }

    const progress = calculateProgress(facts, session.progress, { schema: this.schema });
    const decision = evaluatePhase(
      {
        utterance: input.utterance,
        progress: progress.progress,
        comprehensiveDetected: progress.comprehensiveDetected,
        facts,
      },
      this.readinessThreshold,
    );

    const next: IntakeSession = {
      ...session,
      messages: [...session.messages, { role: "user", content: input.utterance, timestamp }],
      facts,
      profile,
      progress: progress.progress,
      phase: decision.phase,
      readyForGeneration: decision.readyForGeneration,
      updatedAt: timestamp,
    };
    await this.commit(next);

    let planningStarted = false;
    if (this.coordinator && isPlanningEligible(facts, this.schema)) {
      planningStarted = this.coordinator.tryStart(sessionId, {
        sessionId,
        facts: { ...facts },
        profile,
      });
      // stored by the status listener's queued save
      next.planStatus = this.coordinator.getStatus(sessionId);
    }

    this.logger.debug(
      `Turn for ${sessionId}: progress ${progress.progress}, phase ${decision.phase}`,
    );

    return {
      sessionId,
      profile,
      classification,
      profileAccepted,
      progress,
      decision,
      gaps: findInformationGaps(facts, this.schema).slice(0, MAX_REPORTED_GAPS),
      planningStarted,
      planStatus: { ...next.planStatus },
    };
  }

  private persistPlanStatus(change: PlanStatusChange): void {
    this.enqueue(change.sessionId, async () => {
      const session = this.sessions.get(change.sessionId);
      if (!session) return;
      await this.commit({
        ...session,
        planStatus: change.status,
        plan: change.plan ?? session.plan,
      });
    }).catch((error: unknown) => {
      this.logger.error(
        `Failed to store plan status for ${change.sessionId}: ${errorMessage(error)}`,
      );
    });
  }

  private async loadOrCreate(sessionId: string): Promise<IntakeSession> {
    const existing = await this.getSession(sessionId);
    if (existing) return existing;

    if (!this.createIfMissing) {
      throw new SessionError(`Session not found: ${sessionId}`, { sessionId });
    }
    if (!SessionIdSchema.safeParse(sessionId).success) {
      throw new SessionError(`Invalid session id: ${sessionId}`, { sessionId });
    }
    // cached by the turn's commit
    return this.createSession(sessionId);
  }

  private async requireSession(sessionId: string): Promise<IntakeSession> {
    const session = await this.getSession(sessionId);
    if (!session) {
      throw new SessionError(`Session not found: ${sessionId}`, { sessionId });
    }
    return session;
  }

  private createSession(sessionId: string): IntakeSession {
    const timestamp = this.now().toISOString();
    return {
      id: sessionId,
      createdAt: timestamp,
      updatedAt: timestamp,
      messages: [],
      facts: {},
      profile: null,
      progress: 0,
      phase: "initial",
      readyForGeneration: false,
      planStatus: createIdleStatus(this.now()),
    };
  }

  private async commit(session: IntakeSession): Promise<void> {
    const isNew = !this.sessions.has(session.id);
    await this.store.save(session);
    this.sessions.set(session.id, session);
    if (isNew) {
      logEvent(this.logger, "session_started", { sessionId: session.id });
    }
  }

  private evict(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.coordinator?.forget(sessionId);
  }

  /**
   * Enqueue work and drop the session's queue afterwards unless more work
   * was chained behind it
   */
  private async enqueueFinal<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const result = this.enqueue(sessionId, task);
    const tail = this.queues.get(sessionId);
    try {
      return await result;
    } finally {
      if (this.queues.get(sessionId) === tail) {
        this.queues.delete(sessionId);
      }
    }
  }

  /**
   * Chain work behind the session's previous work, which may have failed
   */
  private enqueue<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);
    this.queues.set(
      sessionId,
      result.then(
        () => undefined,
        () => undefined,
      ),
    );
    return result;
  }
}
