/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logs.ts: Log viewing endpoints for NalVault.
 */
import type { Express, Request, Response } from "express";
import type { LogEntry, LogLevel } from "../utils/index.js";
import { isConsoleLogging, isNotFoundError, subscribeToLogs } from "../utils/index.js";
import type { Nullable } from "../types/index.js";
import type { RouteContext } from "./index.js";
import fs from "node:fs";
import { getLogFilePath } from "../config/paths.js";

const { promises: fsPromises } = fs;

/* Log entries are parsed from the log file format: [YYYY/MM/DD HH:MM:ss.l] [LEVEL] message
 * The level prefix is present for debug, warn, and error entries; info entries have no prefix.
 */

interface LogsResponse {

  entries: LogEntry[];
  filtered: number;
  mode: "console" | "file";
  total: number;
}

// Pattern to match ANSI escape sequences (SGR - Select Graphic Rendition).
// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

// Pattern to match log entries: [timestamp] optional [LEVEL] or [DEBUG:category] message.
const LOG_LINE_PATTERN = /^\[(\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2}\.\d{3})\] (?:\[(WARN|ERROR|DEBUG(?::[^\]]+)?)\] )?(.*)$/;

const FILTER_LEVELS: readonly string[] = [ "error", "info", "warn" ];

/**
 * Parses a single log line into a structured entry. ANSI color codes are stripped first.
 * @param line - The raw log line from the file.
 * @returns The parsed log entry, or null if the line does not match the expected format.
 */
export function parseLogLine(line: string): Nullable<LogEntry> {

  const match = LOG_LINE_PATTERN.exec(line.replace(ANSI_PATTERN, ""));

  if(!match) {

    return null;
  }

  const [ , timestamp, levelStr, message ] = match;
  let level: LogLevel = "info";
  let categoryTag: string | undefined;

  if(levelStr?.startsWith("DEBUG")) {

    level = "debug";

    // "DEBUG:recorder:writer" carries the category after the first colon.
    const colonIndex = levelStr.indexOf(":");

    if(colonIndex !== -1) {

      categoryTag = levelStr.substring(colonIndex + 1);
    }
  } else if(levelStr === "WARN") {

    level = "warn";
  } else if(levelStr === "ERROR") {

    level = "error";
  }

  const entry: LogEntry = { level, message, timestamp };

  if(categoryTag) {

    entry.categoryTag = categoryTag;
  }

  return entry;
}

/**
 * Reads and parses the log file, returning the most recent entries.
 * @param logFilePath - The log file.
 * @param lines - Maximum number of entries to return.
 * @param levelFilter - Optional level filter (error, warn, info, or undefined for all).
 * @returns The parsed log entries and metadata.
 */
async function readLogEntries(logFilePath: string, lines: number, levelFilter?: string): Promise<LogsResponse> {

  if(isConsoleLogging()) {

    return { entries: [], filtered: 0, mode: "console", total: 0 };
  }

  let content: string;

  try {

    content = await fsPromises.readFile(logFilePath, "utf-8");
  } catch(error) {

    if(isNotFoundError(error)) {

      return { entries: [], filtered: 0, mode: "file", total: 0 };
    }

    throw error;
  }

  const allEntries = content.split("\n").map(parseLogLine).filter((entry): entry is LogEntry => entry !== null);
  const filteredEntries = (levelFilter && FILTER_LEVELS.includes(levelFilter)) ? allEntries.filter((entry) => entry.level === levelFilter) : allEntries;

  return { entries: filteredEntries.slice(-lines), filtered: filteredEntries.length, mode: "file", total: allEntries.length };
}

/**
 * Creates the log endpoints: recent entries from the log file, and a live stream of new entries.
 * @param app - The Express application.
 * @param context - The running service.
 */
export function setupLogsEndpoint(app: Express, context: RouteContext): void {

  app.get("/logs", async (req: Request, res: Response): Promise<void> => {

    const linesParam = (typeof req.query.lines === "string") ? parseInt(req.query.lines, 10) : NaN;
    const lines = (!isNaN(linesParam) && (linesParam > 0) && (linesParam <= 1000)) ? linesParam : 100;
    const level = (typeof req.query.level === "string") ? req.query.level : undefined;

    try {

      res.json(await readLogEntries(getLogFilePath(context.config), lines, level));
    } catch {

      res.status(500).json({ entries: [], error: "Failed to read log file.", filtered: 0, mode: "file", total: 0 });
    }
  });

  /* The /logs/stream endpoint delivers log entries as Server-Sent Events as they are written. The connection stays open until the client disconnects.
   */
  app.get("/logs/stream", (req: Request, res: Response): void => {

    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("Content-Type", "text/event-stream");
    res.flushHeaders();

    const levelFilter = (typeof req.query.level === "string") && FILTER_LEVELS.includes(req.query.level) ? req.query.level : null;

    const unsubscribe = subscribeToLogs((entry) => {

      if(levelFilter && (entry.level !== levelFilter)) {

        return;
      }

      res.write("data: " + JSON.stringify(entry) + "\n\n");
    });

    // A named heartbeat every 30 seconds keeps proxies from closing an idle stream.
    const heartbeatInterval = setInterval(() => {

      res.write("event: heartbeat\ndata: \n\n");
    }, 30000);

    req.on("close", () => {

      clearInterval(heartbeatInterval);
      unsubscribe();
    });
  });
}
