/**
 * File Logger — one message per line in a plain text file.
 *
 * Every record is written and fsync'd before returning, and history()
 * re-reads the file from its path rather than keeping a copy in memory.
 * The file is the only source of truth, so whatever is on disk when
 * history() runs is what it returns.
 */

import { closeSync, fsyncSync, openSync, readFileSync, writeSync } from "fs";
import { resolve } from "path";
import {
  LoggerClosedError,
  LoggerOpenError,
  LoggerReadError,
  LoggerWriteError,
} from "./errors.js";
import { assertValidMessage } from "./message-logger.js";
import type { MessageLogger } from "./message-logger.js";

export type FileLoggerMode = "truncate" | "append";

export interface FileLoggerOptions {
  /** "truncate" starts from an empty file; "append" keeps existing lines */
  mode?: FileLoggerMode;
}

const FILE_PERMISSIONS = 0o644;

export class FileLogger implements MessageLogger {
  readonly name: string;
  readonly path: string;
  readonly mode: FileLoggerMode;
  private fd: number | null;

  /**
   * Opens (creating if needed) the file for writing.
   *
   * @throws LoggerOpenError if the file cannot be opened
   */
  constructor(path: string, options: FileLoggerOptions = {}) {
    this.path = path === "" ? path : resolve(path);
    this.mode = options.mode ?? "truncate";
    this.name = `file:${this.path}`;

    this.fd = openLogFile(this.path, this.mode);
  }

  get closed(): boolean {
    return this.fd === null;
  }

  record(message: string): void {
    assertValidMessage(this.name, message);
    if (this.fd === null) {
      throw new LoggerClosedError(this.path);
    }

    try {
      writeSync(this.fd, message + "\n");
      fsyncSync(this.fd);
    } catch (err) {
      throw new LoggerWriteError(this.path, err);
    }
  }

  history(): string[] {
    let content: string;
    try {
      content = readFileSync(this.path, "utf-8");
    } catch (err) {
      throw new LoggerReadError(this.path, err);
    }
    return parseLines(content);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}

function openLogFile(path: string, mode: FileLoggerMode): number {
  if (path === "") {
    throw new LoggerOpenError(path, new Error("path is empty"));
  }
  try {
    return openSync(path, mode === "append" ? "a" : "w", FILE_PERMISSIONS);
  } catch (err) {
    throw new LoggerOpenError(path, err);
  }
}

/**
 * Splits file content into lines, dropping the terminators.
 *
 * A trailing "\n" ends the last line rather than starting an empty one,
 * and "\r\n" endings are accepted.
 */
export function parseLines(content: string): string[] {
  if (content === "") return [];

  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}
