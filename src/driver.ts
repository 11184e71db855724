/**
 * Driver — feeds one message sequence through every logger and checks
 * that each reproduces it exactly.
 */

import { HistoryMismatchError, formatSequence } from "./errors.js";
import type { Logger } from "./logger.js";
import type { MessageLogger } from "./message-logger.js";

export const DEFAULT_MESSAGES: readonly string[] = ["Hello, World!", "abracadabra", "Sayonara!"];

// === Types ===

export interface LoggerCheck {
  name: string;
  expected: readonly string[];
  observed: string[];
  ok: boolean;
}

export interface DriverReport {
  messages: readonly string[];
  results: LoggerCheck[];
  /** True when every logger reproduced the input */
  ok: boolean;
}

export interface DriverOptions {
  /** Progress output; nothing is reported when omitted */
  logger?: Logger;
}

// === Public API ===

/**
 * Records each message on every logger (messages outer, loggers inner),
 * then compares each logger's history against the input.
 */
export function runDriver(
  loggers: readonly MessageLogger[],
  messages: readonly string[],
  options: DriverOptions = {}
): DriverReport {
  const { logger } = options;

  for (const message of messages) {
    for (const target of loggers) {
      target.record(message);
    }
    logger?.log(`  recorded ${JSON.stringify(message)} on ${loggers.length} logger(s)`);
  }

  const results = loggers.map((target): LoggerCheck => {
    const observed = target.history();
    const ok = sequencesEqual(observed, messages);
    logger?.log(`  ${ok ? "✓" : "✗"} ${target.name}: ${formatSequence(observed)}`);
    return { name: target.name, expected: messages, observed, ok };
  });

  return { messages, results, ok: results.every((r) => r.ok) };
}

/**
 * Throws HistoryMismatchError for the first logger whose history diverged.
 */
export function verifyDriver(report: DriverReport): void {
  const failed = report.results.find((r) => !r.ok);
  if (failed) {
    throw new HistoryMismatchError(failed.name, failed.expected, failed.observed);
  }
}

/**
 * Element-wise, order-sensitive comparison.
 */
export function sequencesEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
