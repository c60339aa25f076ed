/**
 * File utilities for the intake engine
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { FileSystemError, ValidationError } from "./errors.js";
import { parseJsonSafe } from "./validation.js";

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to create directory: ${dirPath}`, {
      path: dirPath,
      operation: "write",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Read a JSON file and validate it against a schema
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileSystemError(`Failed to read JSON file: ${filePath}`, {
      path: filePath,
      operation: "read",
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = parseJsonSafe(content, schema);
  if (!parsed.success) {
    throw new ValidationError(`Invalid JSON file ${filePath}: ${parsed.error}`, {
      field: filePath,
    });
  }
  return parsed.data;
}

/**
 * Write a JSON file with pretty formatting
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown,
  options: { indent?: number; ensureDir?: boolean } = {},
): Promise<void> {
  const { indent = 2, ensureDir: shouldEnsureDir = true } = options;

  try {
    if (shouldEnsureDir) {
      await ensureDir(path.dirname(filePath));
    }

    const content = JSON.stringify(data, null, indent);
    await fs.writeFile(filePath, content + "\n", "utf-8");
  } catch (error) {
    if (error instanceof FileSystemError) throw error;
    throw new FileSystemError(`Failed to write JSON file: ${filePath}`, {
      path: filePath,
      operation: "write",
      cause: error instanceof Error ? error : undefined,
    });
  }
}
