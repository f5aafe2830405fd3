import { isPerfstatError } from "../errors";
import { readArtifact } from "../fs/util";
import { logger } from "../logging";
import type { FileFailure } from "../render/types";

export interface PipelineOptions {
  /** Abort on the first bad file instead of skipping it. */
  strict?: boolean;
}

/**
 * Where per-file failures go. With `isolate` set, a file that cannot be read
 * or parsed is logged, recorded and skipped; otherwise the error propagates.
 */
export interface FileContext {
  isolate: boolean;
  failures: FileFailure[];
}

export function createFileContext(isolate: boolean): FileContext {
  return { isolate, failures: [] };
}

/**
 * Read `file` and run `parse` over it. Returns null when the file was
 * skipped. Errors that are not PerfstatErrors always propagate.
 */
export async function readAndParse<T>(
  file: string,
  parse: (content: string, source: string) => T,
  ctx: FileContext,
): Promise<T | null> {
  try {
    const content = await readArtifact(file);
    return parse(content, file);
  } catch (error) {
    if (!ctx.isolate || !isPerfstatError(error)) {
      throw error;
    }
    ctx.failures.push({ file, code: error.code, message: error.message });
    logger.warn(`skipping ${file}: ${error.message}`);
    return null;
  }
}
