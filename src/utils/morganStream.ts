/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for NalVault.
 */
import type { HttpLogLevel } from "../types/index.js";
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/* Morgan writes one line per request to a stream. This adapter sends those lines down the same path as application logs: stdout with a timestamp in console mode, or
 * the file logger (which stamps its own lines) in file mode.
 */

/**
 * Creates the Morgan stream options object.
 * @returns StreamOptions for morgan().
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      const trimmedMessage = message.trim();

      if(isConsoleLogging()) {

        // eslint-disable-next-line no-console
        console.log([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", trimmedMessage ].join(""));
      } else {

        writeLogEntry("info", trimmedMessage);
      }
    }
  };
}

/**
 * Decides whether morgan skips a response at the given HTTP log level.
 * @param level - The configured HTTP log level.
 * @param statusCode - The response status code.
 * @returns True if the request should not be logged.
 */
export function shouldSkipRequestLog(level: HttpLogLevel, statusCode: number): boolean {

  switch(level) {

    case "all": {

      return false;
    }

    case "errors": {

      return statusCode < 400;
    }

    default: {

      return true;
    }
  }
}
