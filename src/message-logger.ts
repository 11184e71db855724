/**
 * MessageLogger — the two-operation capability every logger variant satisfies.
 *
 * - MemoryLogger keeps messages in a process-local array
 * - FileLogger appends lines to a file and reads them back on demand
 */

import { MessageFormatError } from "./errors.js";

export interface MessageLogger {
  /** Label used in diagnostics, e.g. "memory" or "file:/tmp/out.txt" */
  readonly name: string;

  /** Append one single-line, well-formed message to the backing store */
  record(message: string): void;

  /** All messages recorded so far, in order, as a fresh array */
  history(): string[];

  /** Release held resources. Safe to call more than once. */
  close(): void;
}

const LINE_TERMINATOR = /[\r\n]/;
const LONE_SURROGATE = /\p{Surrogate}/u;

/**
 * Throws if the message cannot be stored as one line of UTF-8.
 *
 * The file backend delimits records by newlines, and UTF-8 encoding
 * replaces an unpaired surrogate with U+FFFD, so neither would read back
 * as the message that was recorded.
 */
export function assertValidMessage(logger: string, message: string): void {
  if (LINE_TERMINATOR.test(message)) {
    throw new MessageFormatError(logger, message, "must be a single line");
  }
  if (LONE_SURROGATE.test(message)) {
    throw new MessageFormatError(logger, message, "must not contain unpaired surrogates");
  }
}
