/**
 * Validation utilities for the intake engine
 */

import { z } from "zod";
import { ValidationError, type ValidationIssue } from "./errors.js";

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate data against a Zod schema
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context?: string,
): T {
  const result = schema.safeParse(data);

  if (result.success) {
    return result.data;
  }

  throw new ValidationError(context ? `Validation failed for ${context}` : "Validation failed", {
    issues: toIssues(result.error),
  });
}

/**
 * Safe validate (returns result instead of throwing)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): { success: true; data: T } | { success: false; issues: ValidationIssue[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, issues: toIssues(result.error) };
}

/**
 * Parse a JSON document and validate it in one step
 */
export function parseJsonSafe<T>(
  str: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): { success: true; data: T } | { success: false; error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(str);
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : "Invalid JSON",
    };
  }

  const validated = schema.safeParse(parsed);
  if (validated.success) {
    return { success: true, data: validated.data };
  }
  return {
    success: false,
    error: validated.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join(", "),
  };
}
