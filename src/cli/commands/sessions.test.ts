/**
 * Tests for sessions command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createIdleStatus } from "../../planning/status.js";
import { SessionStore } from "../../sessions/storage.js";
import type { IntakeSession } from "../../sessions/types.js";
import { createLogger } from "../../utils/logger.js";

vi.mock("@clack/prompts", () => ({
  log: {
    info: vi.fn(),
    step: vi.fn(),
    message: vi.fn(),
    success: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
  },
}));

const MINUTE_MS = 60 * 1000;

function makeSession(id: string, minutesAgo: number): IntakeSession {
  const at = new Date(Date.now() - minutesAgo * MINUTE_MS);
  return {
    id,
    createdAt: at.toISOString(),
    updatedAt: at.toISOString(),
    messages: [{ role: "user", content: `Message for ${id}`, timestamp: at.toISOString() }],
    facts: { business_type: "bakery" },
    profile: null,
    progress: 10,
    phase: "initial",
    readyForGeneration: false,
    planStatus: createIdleStatus(at),
  };
}

describe("sessions command", () => {
  let dir: string;
  let storageDir: string;
  let configPath: string;
  let store: SessionStore;

  function options() {
    return { config: configPath, globalConfigPath: join(dir, "global.json"), env: {} };
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), "intake-sessions-cli-"));
    storageDir = join(dir, "sessions");
    configPath = join(dir, "config.json");
    await writeFile(
      configPath,
      JSON.stringify({
        sessions: { storageDir, maxSessions: 2 },
        logging: { level: "fatal" },
      }),
      "utf-8",
    );
    store = new SessionStore({
      storageDir,
      logger: createLogger({ level: "fatal", prettyPrint: false }),
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe("runSessionsList", () => {
    it("should list the newest session first", async () => {
      await store.save(makeSession("older", 30));
      await store.save(makeSession("newer", 5));
      const { runSessionsList } = await import("./sessions.js");

      const sessions = await runSessionsList(options());

      expect(sessions.map((session) => session.id)).toEqual(["newer", "older"]);
      expect(sessions[0]?.title).toBe("Message for newer");
    });

    it("should warn when nothing is stored", async () => {
      const prompts = await import("@clack/prompts");
      const { runSessionsList } = await import("./sessions.js");

      const sessions = await runSessionsList(options());

      expect(sessions).toEqual([]);
      expect(prompts.log.warning).toHaveBeenCalledWith(
        "No sessions stored yet. Run 'intake turn' to start one.",
      );
    });

    it("should print JSON when requested", async () => {
      await store.save(makeSession("a", 1));
      const { runSessionsList } = await import("./sessions.js");
      const consoleLog = vi.spyOn(console, "log").mockImplementation(() => {});

      await runSessionsList({ ...options(), json: true });

      const output: unknown = JSON.parse(String(consoleLog.mock.calls[0]?.[0]));
      expect(output).toMatchObject([{ id: "a", progress: 10, planStatus: "idle" }]);
    });
  });

  describe("runSessionsShow", () => {
    it("should return the stored session", async () => {
      const session = makeSession("a", 1);
      await store.save(session);
      const prompts = await import("@clack/prompts");
      const { runSessionsShow } = await import("./sessions.js");

      const shown = await runSessionsShow("a", options());

      expect(shown).toEqual(session);
      expect(prompts.log.message).toHaveBeenCalledWith('business_type: "bakery"');
    });

    it("should reject an unknown session", async () => {
      const { runSessionsShow } = await import("./sessions.js");

      await expect(runSessionsShow("nope", options())).rejects.toThrow("Session not found: nope");
    });
  });

  describe("runSessionsDelete", () => {
    it("should delete a stored session", async () => {
      await store.save(makeSession("a", 1));
      const { runSessionsDelete } = await import("./sessions.js");

      expect(await runSessionsDelete("a", options())).toBe(true);
      expect(await store.exists("a")).toBe(false);
    });

    it("should warn about a missing session", async () => {
      const prompts = await import("@clack/prompts");
      const { runSessionsDelete } = await import("./sessions.js");

      expect(await runSessionsDelete("a", options())).toBe(false);
      expect(prompts.log.warning).toHaveBeenCalledWith("No session a");
    });
  });

  describe("runSessionsPrune", () => {
    it("should keep the configured number of sessions by default", async () => {
      await store.save(makeSession("first", 30));
      await store.save(makeSession("second", 20));
      await store.save(makeSession("third", 10));
      const { runSessionsPrune } = await import("./sessions.js");

      const result = await runSessionsPrune(options());

      expect(result).toEqual({ deletedByCount: 1, deletedByAge: 0 });
      expect((await store.listSessions()).map((session) => session.id)).toEqual([
        "third",
        "second",
      ]);
    });

    it("should delete sessions past the retention window", async () => {
      await store.save(makeSession("fresh", 1));
      await store.save(makeSession("stale", 10 * 24 * 60));
      const { runSessionsPrune } = await import("./sessions.js");

      const result = await runSessionsPrune({ ...options(), keep: "10", olderThan: "7" });

      expect(result).toEqual({ deletedByCount: 0, deletedByAge: 1 });
      expect(await store.exists("stale")).toBe(false);
      expect(await store.exists("fresh")).toBe(true);
    });

    it("should reject a negative keep count", async () => {
      const { runSessionsPrune } = await import("./sessions.js");

      await expect(runSessionsPrune({ ...options(), keep: "-1" })).rejects.toThrow(
        "Validation failed for --keep",
      );
    });
  });

  describe("export and import", () => {
    it("should copy a session under a new id", async () => {
      await store.save(makeSession("a", 1));
      const file = join(dir, "export.json");
      const { runSessionsExport, runSessionsImport } = await import("./sessions.js");

      await runSessionsExport("a", file, options());
      const imported = await runSessionsImport(file, { ...options(), id: "copy" });

      expect(imported.id).toBe("copy");
      expect((await store.load("copy"))?.facts).toEqual({ business_type: "bakery" });
    });
  });
});
