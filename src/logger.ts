/**
 * Logger interface — abstracts diagnostic output so tests can capture it.
 *
 * The driver and the CLI accept a Logger:
 * - ConsoleLogger (default) writes directly to stdout/stderr
 * - QuietLogger forwards only errors to another Logger, for --quiet
 *
 * This is the program's own progress output, not the MessageLogger
 * capability the program exercises.
 */

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }
  warn(message: string): void {
    console.warn(message);
  }
  error(message: string): void {
    console.error(message);
  }
}

export class QuietLogger implements Logger {
  constructor(private readonly inner: Logger = new ConsoleLogger()) {}

  log(_message: string): void {}
  warn(_message: string): void {}
  error(message: string): void {
    this.inner.error(message);
  }
}
