#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for NalVault.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue, initializeDataDir } from "./config/index.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter } from "./utils/index.js";
import type { ReplaySource, ServerOptions } from "./app.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import path from "node:path";
import { startServer } from "./app.js";

/* These handlers catch unhandled promise rejections and uncaught exceptions so the process keeps running. A single failing source should not end every other
 * source's recording. The handlers log the error and allow the process to continue.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: nalvault [options]");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: " + String(DEFAULTS.server.port) + ")");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.nalvault)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/nalvault.log)");
  console.log("  --record                        Start a recording session at startup");
  console.log("  --recordings-dir <path>         Set the recordings root directory");
  console.log("  --replay <slot>=<file>          Replay an Annex-B H.264 file into a slot, looping (repeatable)");
  console.log("");
  console.log("Common Environment Variables:");
  console.log("  FRAME_DROP_RATIO                Record one of every N frames; keyframes are always kept");
  console.log("  HOST                            HTTP server bind address");
  console.log("  NALVAULT_DATA_DIR               Data directory path (default: ~/.nalvault)");
  console.log("  NALVAULT_DEBUG                  Debug category filter (e.g., 'recorder', 'ingest:slot', '*,-preview')");
  console.log("  PORT                            HTTP server port");
  console.log("  RECORDINGS_DIR                  Recordings root directory");
  console.log("  SLOT_COUNT                      Number of device slots");
  console.log("");
  console.log("  Run 'nalvault --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints every environment variable by category. Generated from CONFIG_METADATA.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */

  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" },
    { displayName: "Preview", key: "preview" },
    { displayName: "Recording", key: "recording" },
    { displayName: "Slots", key: "slots" }
  ];

  // Defaults that resolve at runtime.
  const dynamicDefaults: Record<string, string> = {

    "paths.logFile": "<data-dir>/nalvault.log",
    "preview.ffmpegPath": "autodetect"
  };

  console.log("NalVault Environment Variables");
  console.log("");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    const settings = CONFIG_METADATA[category.key] ?? [];
    let first = true;

    for(const setting of settings) {

      const envVar = setting.envVar;

      if(!envVar) {

        continue;
      }

      if(first) {

        console.log("");
        console.log(category.displayName + ":");
      } else {

        console.log("");
      }

      first = false;

      console.log("  " + envVar);

      // First sentence only.
      const desc = setting.description;
      const periodSpace = desc.indexOf(". ");

      console.log("    " + ((periodSpace !== -1) ? desc.slice(0, periodSpace + 1) : desc));

      const dynamicDefault = dynamicDefaults[setting.path];
      let defaultStr: string;

      if(dynamicDefault) {

        defaultStr = dynamicDefault;
      } else {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        defaultStr = String(defaultValue);

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // NALVAULT_DATA_DIR is resolved before config.json is loaded, and NALVAULT_DEBUG is read by the entry point, so neither is part of CONFIG_METADATA.
  console.log("");
  console.log("Special:");
  console.log("  NALVAULT_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.nalvault");
  console.log("");
  console.log("  NALVAULT_DEBUG");
  console.log("    Debug category filter (e.g., 'recorder', 'ingest:slot', '*,-preview').");
  console.log("    Default: (disabled)");
  console.log("    Categories:");

  for(const { category, description } of DEBUG_CATEGORIES) {

    console.log("      " + category.padEnd(20) + description);
  }

  /* eslint-enable no-console */
}

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs extends ServerOptions {

  dataDir?: string;
  debugLogging: boolean;
}

/**
 * Prints an error and exits.
 * @param message - The error.
 */
function fail(message: string): never {

  // eslint-disable-next-line no-console
  console.error("Error: " + message);

  process.exit(1);
}

/**
 * Validates that a path argument is present and absolute. Prints an error and exits otherwise.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate.
 * @returns The path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    fail(flag + " requires a path argument.");
  }

  if(!path.isAbsolute(value)) {

    fail(flag + " requires an absolute path, got: " + value);
  }

  return value;
}

/**
 * Parses a --replay value of the form <slot>=<file>.
 * @param value - The flag's argument.
 * @returns The replay source.
 */
function parseReplay(value: string | undefined): ReplaySource {

  const match = /^([1-9]\d*)=(.+)$/.exec(value ?? "");

  if(!match?.[1] || !match[2]) {

    fail("--replay requires <slot>=<file>, got: " + (value ?? "nothing"));
  }

  return { file: path.resolve(match[2]), slot: parseInt(match[1], 10) };
}

/**
 * Parses command-line arguments. Values are returned rather than applied so the configuration merge can place them at the right priority.
 * @param args - The arguments after the script name.
 * @returns Parsed argument flags and values.
 */
function parseArgs(args: string[]): ParsedArgs {

  const parsed: ParsedArgs = { consoleLogging: false, debugLogging: false, record: false, replays: [] };

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console": {

        parsed.consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        parsed.debugLogging = true;

        break;
      }

      case "-h":
      case "--help": {

        printUsage();

        process.exit(0);
      }

      case "-p":
      case "--port": {

        const port = parseInt(args[++i] ?? "", 10);

        if(isNaN(port)) {

          fail(arg + " requires a port number.");
        }

        parsed.port = port;

        break;
      }

      case "-v":
      case "--version": {

        // eslint-disable-next-line no-console
        console.log("NalVault v" + getPackageVersion());

        process.exit(0);
      }

      case "--data-dir": {

        parsed.dataDir = requireAbsolutePath(arg, args[++i]);

        break;
      }

      case "--log-file": {

        parsed.logFile = requireAbsolutePath(arg, args[++i]);

        break;
      }

      case "--record": {

        parsed.record = true;

        break;
      }

      case "--recordings-dir": {

        parsed.recordingsDirectory = requireAbsolutePath(arg, args[++i]);

        break;
      }

      case "--replay": {

        parsed.replays.push(parseReplay(args[++i]));

        break;
      }

      default: {

        fail("unknown option " + String(arg) + ". Run 'nalvault --help' for usage.");
      }
    }
  }

  return parsed;
}

const rawArgs = process.argv.slice(2);

if(rawArgs.includes("--list-env")) {

  printEnvironmentVariables();

  process.exit(0);
}

/* The main entry point parses command-line arguments, starts the server, and handles any fatal errors that occur during initialization. If startup fails, we exit
 * with a non-zero code to signal the failure to process managers.
 */

const parsedArgs = parseArgs(rawArgs);

try {

  initializeDataDir(parsedArgs.dataDir);
} catch(error) {

  fail(formatError(error));
}

// NALVAULT_DEBUG takes precedence over --debug and allows fine-grained category selection.
const debugEnv = process.env.NALVAULT_DEBUG;

if(debugEnv) {

  initDebugFilter(debugEnv);
} else if(parsedArgs.debugLogging) {

  initDebugFilter("*");
}

// The 'exit' event runs synchronously. Buffered log entries from a fatal startup error must reach disk before the process terminates.
process.on("exit", (): void => {

  flushLogBufferSync();
});

startServer(parsedArgs).catch((error: unknown): void => {

  LOG.error("Fatal startup error occurred: %s.", formatError(error));

  process.exit(1);
});
