#!/usr/bin/env node

/**
 * intake CLI Entry Point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerClassifyCommand } from "./commands/classify.js";
import { registerScoreCommand } from "./commands/score.js";
import { registerTurnCommand } from "./commands/turn.js";
import { registerSessionsCommand } from "./commands/sessions.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("intake")
  .description("Classify businesses and score conversational intake progress")
  .version(VERSION, "-v, --version", "Output the current version");

registerClassifyCommand(program);
registerScoreCommand(program);
registerTurnCommand(program);
registerSessionsCommand(program);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
