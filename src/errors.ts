/**
 * Error types raised by the message loggers and the driver
 */

export class MessageFormatError extends Error {
  constructor(readonly logger: string, readonly offending: string, problem: string) {
    super(`${logger}: message ${problem}, got ${JSON.stringify(offending)}`);
    this.name = "MessageFormatError";
  }
}

export class LoggerOpenError extends Error {
  constructor(readonly path: string, cause: unknown) {
    super(`cannot open ${path === "" ? '""' : path}: ${formatError(cause)}`, { cause });
    this.name = "LoggerOpenError";
  }
}

export class LoggerWriteError extends Error {
  constructor(readonly path: string, cause: unknown) {
    super(`cannot write ${path}: ${formatError(cause)}`, { cause });
    this.name = "LoggerWriteError";
  }
}

export class LoggerReadError extends Error {
  constructor(readonly path: string, cause: unknown) {
    super(`cannot read ${path}: ${formatError(cause)}`, { cause });
    this.name = "LoggerReadError";
  }
}

export class LoggerClosedError extends Error {
  constructor(readonly path: string) {
    super(`${path} is already closed`);
    this.name = "LoggerClosedError";
  }
}

export class HistoryMismatchError extends Error {
  constructor(
    readonly logger: string,
    readonly expected: readonly string[],
    readonly observed: readonly string[]
  ) {
    super(`${logger}: expected: ${formatSequence(expected)}; but observed: ${formatSequence(observed)}`);
    this.name = "HistoryMismatchError";
  }
}

// === Helpers ===

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Renders a message sequence as `["a", "b", "c"]`
 */
export function formatSequence(messages: readonly string[]): string {
  return `[${messages.map((message) => JSON.stringify(message)).join(", ")}]`;
}
