/**
 * Classify command - Guess the business category of a description
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { classifyBusiness, shouldAcceptProfile } from "../../classifier/classifier.js";
import type { BusinessProfile } from "../../classifier/types.js";
import { errorMessage } from "../../utils/errors.js";

export interface ClassifyOptions {
  json?: boolean;
}

export interface ClassifyResult {
  profile: BusinessProfile;
  /** Whether a session would keep this profile */
  accepted: boolean;
}

export function registerClassifyCommand(program: Command): void {
  program
    .command("classify <text...>")
    .description("Classify a business from a free-form description")
    .option("--json", "Output as JSON")
    .action((words: string[], options: ClassifyOptions) => {
      try {
        runClassify(words.join(" "), options);
      } catch (error) {
        p.log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

/**
 * Run classify command programmatically
 */
export function runClassify(text: string, options: ClassifyOptions = {}): ClassifyResult {
  const profile = classifyBusiness(text);
  const accepted = shouldAcceptProfile(profile);

  if (options.json) {
    console.log(JSON.stringify({ profile, accepted }, null, 2));
    return { profile, accepted };
  }

  const confidence = `${Math.round(profile.confidence * 100)}%`;
  p.log.info(chalk.bold(`Category: ${profile.category} (${profile.subcategory})`));
  p.log.info(
    `Confidence: ${accepted ? chalk.green(confidence) : chalk.yellow(confidence)}` +
      (accepted ? "" : chalk.dim(" - below the acceptance threshold")),
  );
  p.log.info(
    `Model: ${profile.businessModel} | Market: ${profile.targetMarket} | Size: ${profile.sizeIndicator}`,
  );

  if (profile.keywordsMatched.length > 0) {
    p.log.info(`Keywords: ${profile.keywordsMatched.join(", ")}`);
  }
  if (profile.toolsMentioned.length > 0) {
    p.log.info(`Tools: ${profile.toolsMentioned.join(", ")}`);
  }
  for (const question of profile.suggestedQuestions) {
    p.log.step(question);
  }

  return { profile, accepted };
}
