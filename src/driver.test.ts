import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  DEFAULT_MESSAGES,
  runDriver,
  sequencesEqual,
  verifyDriver,
} from "./driver.js";
import { HistoryMismatchError, MessageFormatError } from "./errors.js";
import { FileLogger } from "./file-logger.js";
import type { Logger } from "./logger.js";
import { MemoryLogger } from "./memory-logger.js";
import type { MessageLogger } from "./message-logger.js";

/**
 * Logger that silently loses every message after the first `keep`
 */
class LossyLogger implements MessageLogger {
  readonly name = "lossy";
  private messages: string[] = [];

  constructor(private readonly keep: number) {}

  record(message: string): void {
    if (this.messages.length < this.keep) {
      this.messages.push(message);
    }
  }

  history(): string[] {
    return [...this.messages];
  }

  close(): void {}
}

describe("driver", () => {
  let TEST_DIR: string;

  beforeEach(() => {
    TEST_DIR = mkdtempSync(join(tmpdir(), "driver-test-"));
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
  });

  it("has the three default messages", () => {
    expect(DEFAULT_MESSAGES).toEqual(["Hello, World!", "abracadabra", "Sayonara!"]);
  });

  describe("runDriver", () => {
    it("reproduces the default messages through memory and file loggers", () => {
      const file = new FileLogger(join(TEST_DIR, "out.txt"));
      const loggers: MessageLogger[] = [new MemoryLogger(), file];

      const report = runDriver(loggers, DEFAULT_MESSAGES);
      file.close();

      expect(report.ok).toBe(true);
      expect(report.results.map((r) => r.name)).toEqual(["memory", file.name]);
      for (const result of report.results) {
        expect(result.observed).toEqual(["Hello, World!", "abracadabra", "Sayonara!"]);
        expect(result.ok).toBe(true);
      }
      expect(() => verifyDriver(report)).not.toThrow();
    });

    it("yields identical histories for both variants", () => {
      const memory = new MemoryLogger();
      const file = new FileLogger(join(TEST_DIR, "out.txt"));

      runDriver([memory, file], ["x", "", "y", "x"]);
      file.close();

      expect(file.history()).toEqual(memory.history());
    });

    it("passes with no messages", () => {
      const file = new FileLogger(join(TEST_DIR, "out.txt"));

      const report = runDriver([new MemoryLogger(), file], []);
      file.close();

      expect(report.ok).toBe(true);
      expect(report.results.map((r) => r.observed)).toEqual([[], []]);
    });

    it("records each message on every logger before moving to the next", () => {
      const calls: string[] = [];
      const spy = (name: string): MessageLogger => ({
        name,
        record: (message) => calls.push(`${name}:${message}`),
        history: () => [],
        close: () => {},
      });

      runDriver([spy("a"), spy("b")], ["1", "2"]);

      expect(calls).toEqual(["a:1", "b:1", "a:2", "b:2"]);
    });

    it("flags a logger whose history diverges", () => {
      const report = runDriver([new MemoryLogger(), new LossyLogger(1)], ["a", "b"]);

      expect(report.ok).toBe(false);
      expect(report.results[0].ok).toBe(true);
      expect(report.results[1]).toEqual({
        name: "lossy",
        expected: ["a", "b"],
        observed: ["a"],
        ok: false,
      });
    });

    it("reports progress through the given logger", () => {
      const log = vi.fn();
      const logger: Logger = { log, warn: vi.fn(), error: vi.fn() };

      runDriver([new MemoryLogger(), new LossyLogger(0)], ["a", "b"], { logger });

      expect(log.mock.calls.map((c) => c[0])).toEqual([
        '  recorded "a" on 2 logger(s)',
        '  recorded "b" on 2 logger(s)',
        '  ✓ memory: ["a", "b"]',
        "  ✗ lossy: []",
      ]);
    });
  });

  describe("verifyDriver", () => {
    it("throws HistoryMismatchError listing expected and observed", () => {
      const report = runDriver([new LossyLogger(2)], DEFAULT_MESSAGES);

      expect(() => verifyDriver(report)).toThrow(HistoryMismatchError);
      expect(() => verifyDriver(report)).toThrow(
        'lossy: expected: ["Hello, World!", "abracadabra", "Sayonara!"]; but observed: ["Hello, World!", "abracadabra"]'
      );
    });

    it("reports the first failing logger", () => {
      const report = runDriver([new MemoryLogger(), new LossyLogger(0), new LossyLogger(1)], ["a", "b"]);

      expect(() => verifyDriver(report)).toThrow(/^lossy: expected: \["a", "b"\]; but observed: \[\]$/);
    });

    it("keeps messages containing separators distinguishable", () => {
      const report = runDriver([new LossyLogger(0)], ["a, b"]);

      expect(() => verifyDriver(report)).toThrow('lossy: expected: ["a, b"]; but observed: []');
    });

    it("agrees across variants for messages outside the BMP", () => {
      const file = new FileLogger(join(TEST_DIR, "out.txt"));

      const report = runDriver([new MemoryLogger(), file], ["\uD83D\uDE00", "plain"]);
      file.close();

      expect(report.ok).toBe(true);
    });

    it("stops at a message with an unpaired surrogate before any logger stores it", () => {
      const memory = new MemoryLogger();
      const file = new FileLogger(join(TEST_DIR, "out.txt"));

      expect(() => runDriver([memory, file], ["a\uD800b"])).toThrow(MessageFormatError);
      file.close();

      expect(memory.history()).toEqual([]);
      expect(file.history()).toEqual([]);
    });
  });

  describe("sequencesEqual", () => {
    it("compares element-wise", () => {
      expect(sequencesEqual([], [])).toBe(true);
      expect(sequencesEqual(["a", "b"], ["a", "b"])).toBe(true);
    });

    it("is order sensitive", () => {
      expect(sequencesEqual(["a", "b"], ["b", "a"])).toBe(false);
    });

    it("detects length differences", () => {
      expect(sequencesEqual(["a"], ["a", "a"])).toBe(false);
      expect(sequencesEqual(["a", "a"], ["a"])).toBe(false);
    });
  });
});
