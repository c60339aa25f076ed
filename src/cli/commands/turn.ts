/**
 * Turn command - Run one conversational turn against a stored session
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { FactUpdateSchema, type FactMap } from "../../scoring/facts.js";
import type { TurnResult } from "../../sessions/lifecycle.js";
import { errorMessage, withErrorHandling } from "../../utils/errors.js";
import { readJsonFile } from "../../utils/files.js";
import { logTiming } from "../../utils/logger.js";
import { createRuntime, type RuntimeOptions } from "../runtime.js";

export interface TurnOptions extends RuntimeOptions {
  session: string;
  message: string;
  /** JSON file with the facts extracted from this message */
  facts?: string;
  json?: boolean;
}

export function registerTurnCommand(program: Command): void {
  program
    .command("turn")
    .description("Process one user message for a session")
    .requiredOption("-s, --session <id>", "Session id (created on first use)")
    .requiredOption("-m, --message <text>", "The user's message")
    .option("-f, --facts <file>", "JSON file with facts extracted from the message")
    .option("-c, --config <path>", "Project config file")
    .option("--json", "Output as JSON")
    .action(async (options: TurnOptions) => {
      try {
        await runTurn(options);
      } catch (error) {
        p.log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

/**
 * Run turn command programmatically
 *
 * Waits for any background planning the turn started, so the stored plan
 * status is final when the process exits.
 */
export async function runTurn(options: TurnOptions): Promise<TurnResult> {
  const extracted: FactMap = options.facts
    ? await readJsonFile(options.facts, FactUpdateSchema)
    : {};

  const { lifecycle, logger } = await createRuntime(options);

  const turn = await logTiming(logger, "turn", () =>
    withErrorHandling(
      () => lifecycle.processTurn(options.session, { utterance: options.message, extracted }),
      { operation: "turn" },
    ),
  );
  const result: TurnResult = turn.planningStarted
    ? { ...turn, planStatus: await lifecycle.whenPlanningSettled(options.session) }
    : turn;

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  const { progress, decision } = result;
  p.log.info(chalk.bold(`Session ${result.sessionId}`));
  if (result.profileAccepted && result.profile) {
    p.log.success(`Business: ${result.profile.category} (${result.profile.subcategory})`);
  }
  p.log.info(`Progress: ${progress.progress}% ${chalk.dim(`(raw ${progress.rawCalculated})`)}`);
  p.log.info(`Phase: ${decision.phase}`);

  if (decision.shouldBuild) {
    p.log.success(`Build requested ("${decision.trigger ?? ""}")`);
  } else if (decision.readyForGeneration) {
    p.log.success("Ready for generation");
  }

  p.log.info(`Plan: ${formatPlanStatus(result)}`);

  if (result.gaps.length > 0) {
    p.log.info(`Ask about: ${result.gaps.map((gap) => gap.field).join(", ")}`);
  }

  return result;
}

function formatPlanStatus(result: TurnResult): string {
  const { status, progress, error } = result.planStatus;
  switch (status) {
    case "plan_ready":
      return chalk.green(`${status} (${progress}%)`);
    case "error":
      return chalk.red(`${status}: ${error ?? "unknown error"}`);
    case "idle":
      return chalk.dim(status);
    default:
      return chalk.yellow(`${status} (${progress}%)`);
  }
}
