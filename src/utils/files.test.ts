/**
 * Tests for file utilities
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";

const mockFs = vi.hoisted(() => ({
  mkdir: vi.fn(),
  readFile: vi.fn(),
  writeFile: vi.fn(),
}));

vi.mock("node:fs/promises", () => ({
  default: mockFs,
}));

const FactsSchema = z.object({ business_type: z.string() });

describe("ensureDir", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockFs.mkdir.mockResolvedValue(undefined);
  });

  it("should create directory with recursive flag", async () => {
    const { ensureDir } = await import("./files.js");

    await ensureDir("/test/nested/dir");

    expect(mockFs.mkdir).toHaveBeenCalledWith("/test/nested/dir", { recursive: true });
  });

  it("should throw FileSystemError on failure", async () => {
    mockFs.mkdir.mockRejectedValueOnce(new Error("Permission denied"));
    const { ensureDir } = await import("./files.js");
    const { FileSystemError } = await import("./errors.js");

    await expect(ensureDir("/test")).rejects.toBeInstanceOf(FileSystemError);
  });
});

describe("readJsonFile", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should read, parse and validate a JSON file", async () => {
    mockFs.readFile.mockResolvedValueOnce('{"business_type": "bakery"}');
    const { readJsonFile } = await import("./files.js");

    const result = await readJsonFile("/test/facts.json", FactsSchema);

    expect(result).toEqual({ business_type: "bakery" });
  });

  it("should throw FileSystemError when the file cannot be read", async () => {
    mockFs.readFile.mockRejectedValueOnce(new Error("Not found"));
    const { readJsonFile } = await import("./files.js");

    await expect(readJsonFile("/test/facts.json", FactsSchema)).rejects.toThrow(
      "Failed to read JSON file: /test/facts.json",
    );
  });

  it("should throw ValidationError naming the bad field", async () => {
    mockFs.readFile.mockResolvedValueOnce('{"business_type": 3}');
    const { readJsonFile } = await import("./files.js");
    const { ValidationError } = await import("./errors.js");

    const promise = readJsonFile("/test/facts.json", FactsSchema);

    await expect(promise).rejects.toBeInstanceOf(ValidationError);
    await expect(promise).rejects.toThrow(
      "Invalid JSON file /test/facts.json: business_type: Expected string, received number",
    );
  });
});

describe("writeJsonFile", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockFs.mkdir.mockResolvedValue(undefined);
    mockFs.writeFile.mockResolvedValue(undefined);
  });

  it("should write JSON file with pretty formatting and a trailing newline", async () => {
    const { writeJsonFile } = await import("./files.js");

    await writeJsonFile("/test/state.json", { progress: 40 });

    expect(mockFs.mkdir).toHaveBeenCalledWith("/test", { recursive: true });
    expect(mockFs.writeFile).toHaveBeenCalledWith(
      "/test/state.json",
      '{\n  "progress": 40\n}\n',
      "utf-8",
    );
  });

  it("should skip ensuring directory when option is false", async () => {
    const { writeJsonFile } = await import("./files.js");

    await writeJsonFile("/test/state.json", {}, { ensureDir: false });

    expect(mockFs.mkdir).not.toHaveBeenCalled();
  });

  it("should wrap write failures in FileSystemError", async () => {
    mockFs.writeFile.mockRejectedValueOnce(new Error("Disk full"));
    const { writeJsonFile } = await import("./files.js");

    await expect(writeJsonFile("/test/state.json", {})).rejects.toThrow(
      "Failed to write JSON file: /test/state.json",
    );
  });
});
