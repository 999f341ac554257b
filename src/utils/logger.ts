/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for NalVault.
 */
import type { LogEntry, LogLevel } from "./logEmitter.js";
import { isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import df from "dateformat";
import { emitLogEntry } from "./logEmitter.js";
import { format } from "node:util";
import { getSourceName } from "./sourceContext.js";
import { writeLogEntry } from "./fileLogger.js";

/* Terminal color codes. Warnings are yellow, errors red, debug output cyan. The same codes are written into the log file so that `tail -f` or `less -R` show the
 * same colors as console mode.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

/* Output goes either to the console (the --console flag, used under Docker or when debugging) or to the file logger. File mode is the default.
 */

let useConsoleLogging = false;

/**
 * Selects console or file output.
 * @param enabled - True for console output, false for the file logger.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * @returns True if log output goes to the console.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Core logging path shared by every level. Prefixes the source name, broadcasts the entry to subscribers, and routes the line to the console or the file logger.
 * @param level - The log level.
 * @param color - ANSI color for the line, or an empty string.
 * @param message - The printf-style format string.
 * @param args - Format arguments.
 * @param explicitSource - Source name to use instead of the ambient source context.
 * @param categoryTag - Debug category, for debug entries.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], explicitSource?: string, categoryTag?: string): void {

  const sourceName = explicitSource ?? getSourceName();
  const formatted = (args.length > 0) ? format(message, ...args) : message;
  const logMessage = sourceName ? [ "[", sourceName, "] ", formatted ].join("") : formatted;
  const entry: LogEntry = { level, message: logMessage, timestamp: df(new Date(), "yyyy/mm/dd HH:MM:ss.l") };

  if(categoryTag) {

    entry.categoryTag = categoryTag;
  }

  emitLogEntry(entry);

  if(!useConsoleLogging) {

    writeLogEntry(level, logMessage, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  const consoleMethod = (level === "error") ? console.error : ((level === "warn") ? console.warn : console.log);
  /* eslint-enable no-console */

  if(color) {

    consoleMethod("%s%s%s", color, logMessage, ANSI_COLORS.reset);
  } else {

    consoleMethod(logMessage);
  }
}

/**
 * Logger bound to a fixed source name. Returned by LOG.withSource().
 */
export interface BoundLogger {

  debug: (category: string, message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
}

/* The LOG object is the single logging entry point. Every method takes a printf-style format string (%s, %d, %j, %o) followed by its arguments. When called inside a
 * source context (runWithSourceContext()), lines are prefixed with the source name automatically.
 */
export const LOG = {

  /**
   * Logs a debug message for a category. Produces output only when the category is enabled through NALVAULT_DEBUG or --debug.
   * @param category - The debug category (e.g., "recorder:writer").
   * @param message - The format string.
   * @param args - Format arguments.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, undefined, category);
  },

  /**
   * Logs an error in red. Used for failures that abort an operation: a failed consolidation cycle, a segment that could not be finalized, a failed startup step.
   * @param message - The format string.
   * @param args - Format arguments.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message.
   * @param message - The format string.
   * @param args - Format arguments.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning in yellow. Used for conditions that degrade but do not stop recording, such as dropped frames or skipped segments.
   * @param message - The format string.
   * @param args - Format arguments.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  },

  /**
   * Creates a logger bound to a source name, for logging about a source from outside its context (a slot event handler, a shutdown loop).
   * @param sourceName - The source name to prefix.
   * @returns A logger with the usual methods.
   */
  withSource: function(sourceName: string): BoundLogger {

    return {

      debug: (category: string, message: string, ...args: unknown[]): void => {

        if(isAnyDebugEnabled() && isCategoryEnabled(category)) {

          logWithLevel("debug", ANSI_COLORS.cyan, message, args, sourceName, category);
        }
      },
      error: (message: string, ...args: unknown[]): void => { logWithLevel("error", ANSI_COLORS.red, message, args, sourceName); },
      info: (message: string, ...args: unknown[]): void => { logWithLevel("info", "", message, args, sourceName); },
      warn: (message: string, ...args: unknown[]): void => { logWithLevel("warn", ANSI_COLORS.yellow, message, args, sourceName); }
    };
  }
};
