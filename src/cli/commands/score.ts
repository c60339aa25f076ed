/**
 * Score command - Score a fact map without a session
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { z } from "zod";
import { phaseForProgress, PHASE_DEFINITIONS, type Phase } from "../../phases/machine.js";
import { FactUpdateSchema } from "../../scoring/facts.js";
import {
  calculateProgress,
  findInformationGaps,
  type InformationGap,
  type ProgressResult,
} from "../../scoring/scorer.js";
import { errorMessage } from "../../utils/errors.js";
import { readJsonFile } from "../../utils/files.js";
import { validate } from "../../utils/validation.js";

const GAPS_SHOWN = 5;

const PreviousProgressSchema = z.coerce.number().int().min(0).max(100);

export interface ScoreOptions {
  /** Progress reported on the previous turn */
  previous?: string;
  json?: boolean;
}

export interface ScoreResult extends ProgressResult {
  phase: Phase;
  gaps: InformationGap[];
}

export function registerScoreCommand(program: Command): void {
  program
    .command("score <facts-file>")
    .description("Score a JSON fact map against the information schema")
    .option("--previous <n>", "Progress reported on the previous turn (0-100)")
    .option("--json", "Output as JSON")
    .action(async (factsFile: string, options: ScoreOptions) => {
      try {
        await runScore(factsFile, options);
      } catch (error) {
        p.log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

/**
 * Run score command programmatically
 */
export async function runScore(factsFile: string, options: ScoreOptions = {}): Promise<ScoreResult> {
  const previous =
    options.previous === undefined
      ? 0
      : validate(PreviousProgressSchema, options.previous, "--previous");
  const facts = await readJsonFile(factsFile, FactUpdateSchema);

  const progress = calculateProgress(facts, previous);
  const phase = phaseForProgress(progress.progress);
  const gaps = findInformationGaps(facts).slice(0, GAPS_SHOWN);
  const result: ScoreResult = { ...progress, phase, gaps };

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  p.log.info(chalk.bold(`Progress: ${formatBar(progress.progress)}`));
  p.log.info(`Phase: ${phase} ${chalk.dim(`(${PHASE_DEFINITIONS[phase].focus})`)}`);
  if (progress.smoothed) {
    p.log.info(chalk.dim(`Raw score ${progress.rawCalculated}, smoothed from ${previous}`));
  }
  if (progress.comprehensiveDetected) {
    p.log.info(`Comprehensive answer detected: ${progress.patternsFound.join(", ")}`);
  }

  for (const [name, category] of Object.entries(progress.categoryBreakdown)) {
    if (!category) continue;
    p.log.info(`  ${name}: ${category.score.toFixed(1)}/${category.max}`);
  }

  if (gaps.length > 0) {
    p.log.info(chalk.bold("Largest gaps:"));
    for (const gap of gaps) {
      p.log.step(`${gap.field} (${gap.category}, ${gap.missing.toFixed(1)} points)`);
    }
  }

  return result;
}

function formatBar(progress: number): string {
  const barLength = 20;
  const filled = Math.round((barLength * progress) / 100);
  const bar = chalk.green("█".repeat(filled)) + chalk.dim("░".repeat(barLength - filled));
  return `[${bar}] ${progress}%`;
}
