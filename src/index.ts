/**
 * logbook
 * Interchangeable message loggers behind one capability
 */

export * from "./message-logger.js";
export { MemoryLogger } from "./memory-logger.js";
export { FileLogger, parseLines } from "./file-logger.js";
export type { FileLoggerMode, FileLoggerOptions } from "./file-logger.js";
export * from "./driver.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./logger.js";
export { runCli } from "./program.js";
export type { RunCliOptions } from "./program.js";
export { VERSION } from "./version.js";
