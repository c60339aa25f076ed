/**
 * Loader for the static rule tables shipped in data/
 */

import fs from "node:fs";
import type { z } from "zod";
import { FileSystemError, ValidationError } from "./errors.js";
import { parseJsonSafe } from "./validation.js";

/**
 * Freeze an object graph in place
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Resolve a file under data/ (works from both src/ and dist/)
 */
export function dataFileUrl(fileName: string): URL {
  return new URL(`../../data/${fileName}`, import.meta.url);
}

/**
 * Read, validate and freeze a JSON table
 */
export function loadDataFile<T>(
  location: URL | string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  const displayPath = location instanceof URL ? location.pathname : location;

  let content: string;
  try {
    content = fs.readFileSync(location, "utf-8");
  } catch (error) {
    throw new FileSystemError(`Failed to read data file: ${displayPath}`, {
      path: displayPath,
      operation: "read",
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = parseJsonSafe(content, schema);
  if (!parsed.success) {
    throw new ValidationError(`Invalid data file ${displayPath}: ${parsed.error}`, {
      field: displayPath,
    });
  }

  return deepFreeze(parsed.data);
}
