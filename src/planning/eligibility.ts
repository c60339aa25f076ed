/**
 * Planning entry condition
 */

import { PROBLEM_FIELDS } from "../phases/machine.js";
import { isEmptyFactValue, stringifyFactValue, type FactMap } from "../scoring/facts.js";
import { findFieldRule, getInformationSchema, type InformationSchema } from "../scoring/schema.js";

export const PROCESS_FIELDS = ["detailed_workflow", "current_process", "time_spent"] as const;

export const IMPACT_FIELDS = [
  "volume_metrics",
  "financial_impact",
  "time_investment",
  "problem_impact",
  "revenue_impact",
  "cost_impact",
  "growth_impact",
  "quantified_impact",
] as const;

function hasAny(facts: FactMap, fields: readonly string[]): boolean {
  return fields.some((field) => !isEmptyFactValue(facts[field]));
}

/**
 * A stated problem that avoids the schema's vague terms
 */
export function hasSpecificProblem(
  facts: FactMap,
  schema: InformationSchema = getInformationSchema(),
): boolean {
  const vagueTerms = findFieldRule(schema, "specific_problem")?.rule.antiVagueTerms ?? [];

  return PROBLEM_FIELDS.some((field) => {
    const value = facts[field];
    if (value === undefined || isEmptyFactValue(value)) return false;
    const text = stringifyFactValue(value).toLowerCase();
    return !vagueTerms.some((term) => text.includes(term));
  });
}

/**
 * Background planning starts only with a specific problem, a process
 * description and at least one impact signal
 */
export function isPlanningEligible(
  facts: FactMap,
  schema: InformationSchema = getInformationSchema(),
): boolean {
  return (
    hasSpecificProblem(facts, schema) &&
    hasAny(facts, PROCESS_FIELDS) &&
    hasAny(facts, IMPACT_FIELDS)
  );
}
