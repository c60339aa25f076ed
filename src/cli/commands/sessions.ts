/**
 * Sessions command - Inspect and maintain stored sessions
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { z } from "zod";
import type { IntakeSession, SessionMetadata } from "../../sessions/types.js";
import { errorMessage, SessionError } from "../../utils/errors.js";
import { pluralize, truncate } from "../../utils/strings.js";
import { validate } from "../../utils/validation.js";
import { createRuntime, type RuntimeOptions } from "../runtime.js";

const CountSchema = z.coerce.number().int().min(0);

export interface SessionsOptions extends RuntimeOptions {
  json?: boolean;
}

export interface PruneOptions extends SessionsOptions {
  /** Sessions to keep (defaults to sessions.maxSessions) */
  keep?: string;
  /** Also delete sessions idle for this many days (defaults to sessions.retentionDays) */
  olderThan?: string;
}

export interface PruneResult {
  deletedByCount: number;
  deletedByAge: number;
}

type Action<A extends unknown[]> = (...args: A) => Promise<unknown>;

function handled<A extends unknown[]>(action: Action<A>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      p.log.error(errorMessage(error));
      process.exit(1);
    }
  };
}

export function registerSessionsCommand(program: Command): void {
  const sessionsCmd = program.command("sessions").description("Manage stored intake sessions");

  sessionsCmd
    .command("list")
    .description("List sessions, most recently updated first")
    .option("-c, --config <path>", "Project config file")
    .option("--json", "Output as JSON")
    .action(handled((options: SessionsOptions) => runSessionsList(options)));

  sessionsCmd
    .command("show <id>")
    .description("Show a session's facts, progress and plan status")
    .option("-c, --config <path>", "Project config file")
    .option("--json", "Output as JSON")
    .action(handled((id: string, options: SessionsOptions) => runSessionsShow(id, options)));

  sessionsCmd
    .command("delete <id>")
    .description("Delete a session")
    .option("-c, --config <path>", "Project config file")
    .option("--json", "Output as JSON")
    .action(handled((id: string, options: SessionsOptions) => runSessionsDelete(id, options)));

  sessionsCmd
    .command("prune")
    .description("Delete the oldest sessions")
    .option("--keep <n>", "Number of sessions to keep")
    .option("--older-than <days>", "Delete sessions not updated for this many days")
    .option("-c, --config <path>", "Project config file")
    .option("--json", "Output as JSON")
    .action(handled((options: PruneOptions) => runSessionsPrune(options)));

  sessionsCmd
    .command("export <id> <file>")
    .description("Write a session to a single JSON file")
    .option("-c, --config <path>", "Project config file")
    .action(
      handled((id: string, file: string, options: SessionsOptions) =>
        runSessionsExport(id, file, options),
      ),
    );

  sessionsCmd
    .command("import <file>")
    .description("Store a session from an exported JSON file")
    .option("--id <id>", "Store under a different session id")
    .option("-c, --config <path>", "Project config file")
    .action(
      handled((file: string, options: SessionsOptions & { id?: string }) =>
        runSessionsImport(file, options),
      ),
    );
}

export async function runSessionsList(options: SessionsOptions = {}): Promise<SessionMetadata[]> {
  const { store } = await createRuntime(options);
  const sessions = await store.listSessions();

  if (options.json) {
    console.log(JSON.stringify(sessions, null, 2));
    return sessions;
  }

  if (sessions.length === 0) {
    p.log.warning("No sessions stored yet. Run 'intake turn' to start one.");
    return sessions;
  }

  p.log.info(chalk.bold(`${sessions.length} ${pluralize("session", sessions.length)}`));
  for (const session of sessions) {
    p.log.message(
      `${chalk.cyan(session.id)}  ${String(session.progress).padStart(3)}%  ` +
        `${session.phase}  ${chalk.dim(truncate(session.title, 40))}`,
    );
  }
  return sessions;
}

export async function runSessionsShow(
  id: string,
  options: SessionsOptions = {},
): Promise<IntakeSession> {
  const { store } = await createRuntime(options);
  const session = await store.load(id);
  if (!session) {
    throw new SessionError(`Session not found: ${id}`, { sessionId: id });
  }

  if (options.json) {
    console.log(JSON.stringify(session, null, 2));
    return session;
  }

  p.log.info(chalk.bold(`Session ${session.id}`));
  p.log.info(`Updated: ${session.updatedAt} | Messages: ${session.messages.length}`);
  p.log.info(`Progress: ${session.progress}% | Phase: ${session.phase}`);
  if (session.profile) {
    p.log.info(`Business: ${session.profile.category} (${session.profile.subcategory})`);
  }
  p.log.info(`Plan: ${session.planStatus.status} (${session.planStatus.progress}%)`);
  if (session.plan?.recommendation) {
    p.log.info(`Recommended: ${session.plan.recommendation.solutionType}`);
  }

  const facts = Object.entries(session.facts);
  if (facts.length > 0) {
    p.log.info(chalk.bold("Facts:"));
    for (const [key, value] of facts) {
      p.log.message(`${key}: ${JSON.stringify(value)}`);
    }
  }
  return session;
}

export async function runSessionsDelete(
  id: string,
  options: SessionsOptions = {},
): Promise<boolean> {
  const { lifecycle } = await createRuntime(options);
  const deleted = await lifecycle.deleteSession(id);

  if (options.json) {
    console.log(JSON.stringify({ id, deleted }));
    return deleted;
  }

  if (deleted) {
    p.log.success(`Deleted session ${id}`);
  } else {
    p.log.warning(`No session ${id}`);
  }
  return deleted;
}

/**
 * Keep the newest sessions, then drop those past the retention window
 */
export async function runSessionsPrune(options: PruneOptions = {}): Promise<PruneResult> {
  const { store, config } = await createRuntime(options);
  const keep =
    options.keep === undefined
      ? config.sessions.maxSessions
      : validate(CountSchema, options.keep, "--keep");
  const days =
    options.olderThan === undefined
      ? config.sessions.retentionDays
      : validate(CountSchema, options.olderThan, "--older-than");

  const result: PruneResult = {
    deletedByCount: await store.pruneOldSessions(keep),
    deletedByAge: await store.cleanupOlderThan(days),
  };

  if (options.json) {
    console.log(JSON.stringify(result));
    return result;
  }

  const total = result.deletedByCount + result.deletedByAge;
  p.log.success(`Pruned ${total} ${pluralize("session", total)}`);
  return result;
}

export async function runSessionsExport(
  id: string,
  file: string,
  options: SessionsOptions = {},
): Promise<void> {
  const { store } = await createRuntime(options);
  await store.exportSession(id, file);
  p.log.success(`Exported ${id} to ${file}`);
}

export async function runSessionsImport(
  file: string,
  options: SessionsOptions & { id?: string } = {},
): Promise<IntakeSession> {
  const { store } = await createRuntime(options);
  const session = await store.importSession(file, options.id);
  p.log.success(`Imported session ${session.id}`);
  return session;
}
