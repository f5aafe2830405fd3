import * as fs from "node:fs/promises";
import { ArtifactReadError, FileNotFoundError } from "../errors";

/**
 * Result type for tryReadFile.
 * - status: "ok" with content for successful reads
 * - status: "not_found" when file doesn't exist (ENOENT)
 * - status: "error" with ArtifactReadError for permission/I/O errors
 */
export type FileReadResult =
  | { status: "ok"; content: string }
  | { status: "not_found" }
  | { status: "error"; error: ArtifactReadError };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
}

/**
 * Attempt to read a file with proper error categorization.
 * Unlike fs.readFile, this distinguishes between "file not found" (expected)
 * and permission/I/O errors (unexpected, should be reported).
 */
export async function tryReadFile(filePath: string): Promise<FileReadResult> {
  try {
    const content = await fs.readFile(filePath, "utf-8");
    return { status: "ok", content };
  } catch (err) {
    if (isMissing(err)) {
      return { status: "not_found" };
    }
    return {
      status: "error",
      error: new ArtifactReadError(filePath, toError(err)),
    };
  }
}

/**
 * Read a whole artifact as UTF-8 text, throwing FileNotFoundError or
 * ArtifactReadError instead of raw errno errors.
 */
export async function readArtifact(filePath: string): Promise<string> {
  const result = await tryReadFile(filePath);
  switch (result.status) {
    case "ok":
      return result.content;
    case "not_found":
      throw new FileNotFoundError(`File not found: ${filePath}`);
    case "error":
      throw result.error;
  }
}
