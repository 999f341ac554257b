/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logEmitter.ts: Event emitter for real-time log streaming via SSE.
 */
import { EventEmitter } from "node:events";

/**
 * A structured log entry as broadcast to live subscribers.
 */
export interface LogEntry {

  categoryTag?: string;
  level: LogLevel;
  message: string;
  timestamp: string;
}

/**
 * Log levels understood by the logger and its subscribers.
 */
export type LogLevel = "debug" | "error" | "info" | "warn";

/* Every entry written through LOG is also emitted here. The /logs/stream endpoint subscribes once per connected client, and tests subscribe to assert on what a
 * component logged.
 */

const logEmitter = new EventEmitter();

logEmitter.setMaxListeners(100);

/**
 * Broadcasts a log entry to all subscribers.
 * @param entry - The log entry.
 */
export function emitLogEntry(entry: LogEntry): void {

  logEmitter.emit("log", entry);
}

/**
 * Subscribes to log entries.
 * @param callback - Invoked for every entry.
 * @returns A function that removes the subscription.
 */
export function subscribeToLogs(callback: (entry: LogEntry) => void): () => void {

  logEmitter.on("log", callback);

  return (): void => {

    logEmitter.off("log", callback);
  };
}
