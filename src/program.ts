/**
 * logbook command definition. cli.ts is the process entry point.
 */

import { Command, CommanderError } from "commander";
import { resolveOutfile } from "./config.js";
import { DEFAULT_MESSAGES, runDriver, verifyDriver } from "./driver.js";
import { formatError } from "./errors.js";
import { FileLogger } from "./file-logger.js";
import { ConsoleLogger, QuietLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { MemoryLogger } from "./memory-logger.js";
import type { MessageLogger } from "./message-logger.js";
import { VERSION } from "./version.js";

interface CliOptions {
  message: string[];
  empty?: boolean;
  append?: boolean;
  quiet?: boolean;
}

export interface RunCliOptions {
  /** Diagnostic output (default: ConsoleLogger) */
  logger?: Logger;
  /** Environment used to resolve the output path (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Runs logbook with the given user arguments (no node/script prefix).
 *
 * @returns the process exit code
 */
export function runCli(argv: readonly string[], options: RunCliOptions = {}): number {
  const logger = options.logger ?? new ConsoleLogger();
  const env = options.env ?? process.env;
  let exitCode = 0;

  const program = new Command();

  program
    .name("logbook")
    .description("Record messages through an in-memory and a file-backed logger and verify both")
    .version(VERSION)
    .argument("[outfile]", "file backing the file logger")
    .option("-m, --message <text>", "message to record (repeatable, replaces the defaults)", collect, [])
    .option("--empty", "record no messages at all")
    .option("--append", "keep existing lines in outfile instead of truncating it")
    .option("-q, --quiet", "only print errors")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => logger.log(str.trimEnd()),
      writeErr: (str) => logger.error(str.trimEnd()),
    })
    .action((outfile: string | undefined, opts: CliOptions) => {
      exitCode = check(outfile, opts, opts.quiet ? new QuietLogger(logger) : logger, env);
    });

  try {
    program.parse([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  return exitCode;
}

function check(
  outfile: string | undefined,
  opts: CliOptions,
  logger: Logger,
  env: NodeJS.ProcessEnv
): number {
  if (opts.empty && opts.message.length > 0) {
    logger.error("Error: --empty cannot be combined with --message");
    return 1;
  }

  const messages = opts.empty ? [] : opts.message.length > 0 ? opts.message : DEFAULT_MESSAGES;
  const path = resolveOutfile(outfile, env);
  const loggers: MessageLogger[] = [new MemoryLogger()];

  try {
    loggers.push(new FileLogger(path, { mode: opts.append ? "append" : "truncate" }));

    logger.log(`Recording ${messages.length} message(s) through ${loggers.length} loggers`);
    const report = runDriver(loggers, messages, { logger });
    verifyDriver(report);

    logger.log("All loggers reproduced the input.");
    return 0;
  } catch (err) {
    logger.error(`Error: ${formatError(err)}`);
    return 1;
  } finally {
    for (const target of loggers) {
      target.close();
    }
  }
}
