/**
 * Config for logbook
 *
 * There is no config file. The output path comes from the command line,
 * then LOGBOOK_OUTFILE, then a fixed name in the OS temp directory.
 */

import { homedir, tmpdir } from "os";
import { join, resolve } from "path";

export const OUTFILE_ENV = "LOGBOOK_OUTFILE";
const DEFAULT_OUTFILE_NAME = "outfile_logbook.txt";

/**
 * Default output path used when neither the argument nor the env var is set
 */
export function getDefaultOutfile(): string {
  return join(tmpdir(), DEFAULT_OUTFILE_NAME);
}

/**
 * Expands ~ to home directory
 */
export function expandPath(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Resolves the output file path to an absolute path.
 * An explicit empty argument is returned as-is so opening it fails.
 *
 * @param arg - Path given on the command line, if any
 * @param env - Environment to read LOGBOOK_OUTFILE from
 */
export function resolveOutfile(
  arg: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  const fromEnv = env[OUTFILE_ENV];
  if (arg !== undefined) {
    return arg === "" ? arg : resolve(expandPath(arg));
  }
  const chosen = fromEnv && fromEnv.trim() !== "" ? fromEnv : getDefaultOutfile();
  return resolve(expandPath(chosen));
}
