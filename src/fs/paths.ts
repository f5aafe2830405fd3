import * as path from "node:path";

export const CONFIG_FILE_NAME = "perfstat.config.json";

export function resolveCwd(cwdOption?: string): string {
  if (cwdOption) {
    return path.resolve(cwdOption);
  }
  return process.cwd();
}

export function getConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_FILE_NAME);
}

/**
 * Results directories are resolved against the working directory unless
 * given as absolute paths.
 */
export function resolveResultsRoot(cwd: string, resultsDir: string): string {
  return path.resolve(cwd, resultsDir);
}
