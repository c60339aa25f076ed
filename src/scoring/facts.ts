/**
 * Fact map
 *
 * The structured facts an extraction step produced for a conversation,
 * merged turn over turn.
 */

import { z } from "zod";

export type FactValue = string | number | boolean | FactValue[];

export type FactMap = Record<string, FactValue>;

/**
 * Incoming facts as an extractor returns them (may carry nulls)
 */
export type FactUpdate = Record<string, FactValue | null | undefined>;

export const FactValueSchema: z.ZodType<FactValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.array(FactValueSchema)]),
);

export const FactMapSchema = z.record(FactValueSchema);

/**
 * Incoming facts, dropping null entries
 */
export const FactUpdateSchema = z
  .record(FactValueSchema.nullable())
  .transform((update): FactMap => {
    const facts: FactMap = {};
    for (const [key, value] of Object.entries(update)) {
      if (value !== null) facts[key] = value;
    }
    return facts;
  });

/**
 * Whether a value counts as absent for scoring purposes
 */
export function isEmptyFactValue(value: FactValue | null | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (Array.isArray(value)) return value.length === 0;
  return value === "" || value === 0 || value === false;
}

/**
 * Render a fact value as text (lists join with ", ")
 */
export function stringifyFactValue(value: FactValue): string {
  if (Array.isArray(value)) {
    return value.map(stringifyFactValue).join(", ");
  }
  return String(value);
}

/**
 * Structural equality over fact values
 */
export function factValuesEqual(a: FactValue, b: FactValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => {
      const other = b[index];
      return other !== undefined && factValuesEqual(item, other);
    });
  }
  return a === b;
}

/**
 * Union of two lists, existing order first, structural duplicates dropped
 */
function unionLists(existing: readonly FactValue[], incoming: readonly FactValue[]): FactValue[] {
  const merged: FactValue[] = [];
  for (const item of [...existing, ...incoming]) {
    if (!merged.some((kept) => factValuesEqual(kept, item))) {
      merged.push(item);
    }
  }
  return merged;
}

/**
 * Merge one turn's extracted facts into the accumulated map
 *
 * - absent, null or empty incoming values never overwrite
 * - a string replaces a string only when more than 1.5x longer
 * - lists are unioned
 * - anything else is last-write-wins
 */
export function mergeFacts(existing: FactMap, incoming: FactUpdate): FactMap {
  const merged: FactMap = { ...existing };

  for (const [key, value] of Object.entries(incoming)) {
    if (value === null || value === undefined) continue;
    if (value === "" || (Array.isArray(value) && value.length === 0)) continue;

    const current = merged[key];
    if (current === undefined) {
      merged[key] = value;
      continue;
    }

    if (typeof value === "string" && typeof current === "string") {
      if (value.length > current.length * 1.5) {
        merged[key] = value;
      }
      continue;
    }

    if (Array.isArray(value) && Array.isArray(current)) {
      merged[key] = unionLists(current, value);
      continue;
    }

    if (!factValuesEqual(current, value)) {
      merged[key] = value;
    }
  }

  return merged;
}

/**
 * Concatenate every fact value into one lower-case string
 */
export function factText(facts: FactMap): string {
  return Object.values(facts)
    .map((value) => stringifyFactValue(value).toLowerCase())
    .join(" ");
}
