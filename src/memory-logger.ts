/**
 * Memory Logger — keeps recorded messages in a process-local list.
 */

import { assertValidMessage } from "./message-logger.js";
import type { MessageLogger } from "./message-logger.js";

export class MemoryLogger implements MessageLogger {
  readonly name: string;
  private messages: string[] = [];

  constructor(name: string = "memory") {
    this.name = name;
  }

  record(message: string): void {
    assertValidMessage(this.name, message);
    this.messages.push(message);
  }

  history(): string[] {
    return [...this.messages];
  }

  close(): void {}
}
