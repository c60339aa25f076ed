/**
 * Session Storage
 *
 * Persists intake sessions as one directory per session:
 *
 *   ~/.intake/sessions/
 *     <session-id>/
 *       metadata.json       - listing fields
 *       conversation.jsonl  - messages, one per line
 *       state.json          - facts, profile, progress and plan status
 *
 * Everything read back is validated; a file that fails validation raises
 * a SessionError instead of loading a partial session.
 */

import type { Dirent } from "node:fs";
import { access, mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ILogObj, Logger } from "tslog";
import { CONFIG_PATHS } from "../config/paths.js";
import { errorMessage, SessionError } from "../utils/errors.js";
import { readJsonFile, writeJsonFile } from "../utils/files.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import { truncate } from "../utils/strings.js";
import { parseJsonSafe, safeValidate } from "../utils/validation.js";
import {
  ConversationMessageSchema,
  SessionExportSchema,
  SessionIdSchema,
  SessionMetadataSchema,
  SessionStateSchema,
  type ConversationMessage,
  type IntakeSession,
  type SessionExport,
  type SessionMetadata,
  type SessionState,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const TITLE_LENGTH = 50;

export interface SessionStoreConfig {
  storageDir: string;
  /** Sessions kept by pruneOldSessions */
  maxSessions: number;
  logger?: Logger<ILogObj>;
}

interface SessionFiles {
  metadata: string;
  conversation: string;
  state: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Listing title: the first user message's first line
 */
export function generateTitle(messages: readonly ConversationMessage[]): string {
  const first = messages.find((msg) => msg.role === "user" && msg.content.trim().length > 0);
  if (!first) return "Untitled session";
  const firstLine = first.content.trim().split("\n")[0] ?? "";
  return truncate(firstLine, TITLE_LENGTH);
}

export function toMetadata(session: IntakeSession): SessionMetadata {
  return {
    id: session.id,
    title: generateTitle(session.messages),
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    messageCount: session.messages.length,
    progress: session.progress,
    phase: session.phase,
    category: session.profile?.category ?? null,
    planStatus: session.planStatus.status,
  };
}

function toState(session: IntakeSession): SessionState {
  return {
    facts: session.facts,
    profile: session.profile,
    progress: session.progress,
    phase: session.phase,
    readyForGeneration: session.readyForGeneration,
    planStatus: session.planStatus,
    plan: session.plan,
  };
}

function fromParts(
  metadata: SessionMetadata,
  messages: ConversationMessage[],
  state: SessionState,
): IntakeSession {
  const session: IntakeSession = {
    id: metadata.id,
    createdAt: metadata.createdAt,
    updatedAt: metadata.updatedAt,
    messages,
    facts: state.facts,
    profile: state.profile,
    progress: state.progress,
    phase: state.phase,
    readyForGeneration: state.readyForGeneration,
    planStatus: state.planStatus,
  };
  if (state.plan) {
    session.plan = state.plan;
  }
  return session;
}

export class SessionStore {
  private readonly config: SessionStoreConfig;
  private readonly logger: Logger<ILogObj>;

  constructor(config: Partial<SessionStoreConfig> = {}) {
    this.config = {
      storageDir: config.storageDir ?? CONFIG_PATHS.sessions,
      maxSessions: config.maxSessions ?? 50,
    };
    this.logger = createChildLogger(config.logger ?? getLogger(), "sessions");
  }

  get storageDir(): string {
    return this.config.storageDir;
  }

  /**
   * Directory of one session; rejects ids that are not safe path segments
   */
  getSessionDir(sessionId: string): string {
    if (!SessionIdSchema.safeParse(sessionId).success) {
      throw new SessionError(`Invalid session id: ${sessionId}`, { sessionId });
    }
    return join(this.config.storageDir, sessionId);
  }

  private getSessionFiles(sessionId: string): SessionFiles {
    const sessionDir = this.getSessionDir(sessionId);
    return {
      metadata: join(sessionDir, "metadata.json"),
      conversation: join(sessionDir, "conversation.jsonl"),
      state: join(sessionDir, "state.json"),
    };
  }

  async exists(sessionId: string): Promise<boolean> {
    try {
      await access(this.getSessionFiles(sessionId).metadata);
      return true;
    } catch (error) {
      if (error instanceof SessionError || isNotFound(error)) return false;
      throw error;
    }
  }

  async save(session: IntakeSession): Promise<void> {
    const files = this.getSessionFiles(session.id);
    await mkdir(this.getSessionDir(session.id), { recursive: true });

    const conversation = session.messages.map((msg) => JSON.stringify(msg)).join("\n");

    // metadata last: its presence marks the session as complete
    await writeFile(files.conversation, conversation ? conversation + "\n" : "", "utf-8");
    await writeJsonFile(files.state, toState(session), { ensureDir: false });
    await writeJsonFile(files.metadata, toMetadata(session), { ensureDir: false });
    this.logger.debug(`Saved session ${session.id} (${session.messages.length} messages)`);
  }

  /**
   * Load a session, or null when none is stored under this id
   */
  async load(sessionId: string): Promise<IntakeSession | null> {
    if (!(await this.exists(sessionId))) return null;

    const files = this.getSessionFiles(sessionId);
    try {
      const metadata = await readJsonFile(files.metadata, SessionMetadataSchema);
      const state = await readJsonFile(files.state, SessionStateSchema);
      const messages = await this.readConversation(files.conversation);
      return fromParts(metadata, messages, state);
    } catch (error) {
      throw new SessionError(`Session ${sessionId} is corrupt: ${errorMessage(error)}`, {
        sessionId,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private async readConversation(filePath: string): Promise<ConversationMessage[]> {
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    return content
      .split("\n")
      .filter((line) => line.trim())
      .map((line, index) => {
        const parsed = parseJsonSafe(line, ConversationMessageSchema);
        if (!parsed.success) {
          throw new Error(`conversation line ${index + 1}: ${parsed.error}`);
        }
        return parsed.data;
      });
  }

  /**
   * Metadata of every stored session, most recently updated first
   *
   * Directories without valid metadata are skipped with a warning.
   */
  async listSessions(): Promise<SessionMetadata[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.config.storageDir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const sessions: SessionMetadata[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;

      const metadataPath = join(this.config.storageDir, entry.name, "metadata.json");
      let content: string;
      try {
        content = await readFile(metadataPath, "utf-8");
      } catch (error) {
        if (isNotFound(error)) continue;
        throw error;
      }

      const parsed = parseJsonSafe(content, SessionMetadataSchema);
      if (parsed.success) {
        sessions.push(parsed.data);
      } else {
        this.logger.warn(`Skipping session ${entry.name}: ${parsed.error}`);
      }
    }

    return sessions.sort(
      (a, b) => new Date(b.updatedAt).getTime() - new Date(a.updatedAt).getTime(),
    );
  }

  async getMostRecent(): Promise<SessionMetadata | null> {
    const sessions = await this.listSessions();
    return sessions[0] ?? null;
  }

  /**
   * @returns whether a session was stored under this id
   */
  async delete(sessionId: string): Promise<boolean> {
    const existed = await this.exists(sessionId);
    await rm(this.getSessionDir(sessionId), { recursive: true, force: true });
    if (existed) {
      this.logger.debug(`Deleted session ${sessionId}`);
    }
    return existed;
  }

  /**
   * Keep the newest sessions and delete the rest
   *
   * @returns number of sessions deleted
   */
  async pruneOldSessions(keep: number = this.config.maxSessions): Promise<number> {
    const sessions = await this.listSessions();
    let deletedCount = 0;

    for (const session of sessions.slice(Math.max(keep, 0))) {
      if (await this.delete(session.id)) {
        deletedCount++;
      }
    }

    return deletedCount;
  }

  /**
   * Delete sessions not updated within the given number of days
   *
   * @returns number of sessions deleted
   */
  async cleanupOlderThan(days: number, now: Date = new Date()): Promise<number> {
    const cutoff = now.getTime() - days * DAY_MS;
    const sessions = await this.listSessions();
    let deletedCount = 0;

    for (const session of sessions) {
      if (new Date(session.updatedAt).getTime() >= cutoff) continue;
      if (await this.delete(session.id)) {
        deletedCount++;
      }
    }

    return deletedCount;
  }

  /**
   * Write a session as a single JSON document
   */
  async exportSession(sessionId: string, outputPath: string): Promise<void> {
    const session = await this.load(sessionId);
    if (!session) {
      throw new SessionError(`Session not found: ${sessionId}`, { sessionId });
    }

    const document: SessionExport = {
      version: 1,
      metadata: toMetadata(session),
      messages: session.messages,
      state: toState(session),
    };
    await writeJsonFile(outputPath, document);
  }

  /**
   * Store an exported session, optionally under a new id
   *
   * Refuses to overwrite an existing session.
   */
  async importSession(inputPath: string, sessionId?: string): Promise<IntakeSession> {
    const document = await readJsonFile(inputPath, SessionExportSchema);
    const id = sessionId ?? document.metadata.id;

    const validId = safeValidate(SessionIdSchema, id);
    if (!validId.success) {
      throw new SessionError(`Invalid session id: ${id}`, { sessionId: id });
    }
    if (await this.exists(id)) {
      throw new SessionError(`Session already exists: ${id}`, { sessionId: id });
    }

    const session = fromParts({ ...document.metadata, id }, document.messages, document.state);
    await this.save(session);
    return session;
  }
}

export function createSessionStore(config: Partial<SessionStoreConfig> = {}): SessionStore {
  return new SessionStore(config);
}
