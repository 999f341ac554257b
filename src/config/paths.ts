/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for NalVault.
 */
import type { Config } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for the service's own files: the data directory, config.json inside it, and the log file. The data directory is resolved
 * once at startup via initializeDataDir(), before config.json is loaded, because it determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (NALVAULT_DATA_DIR)
 *   3. Default (~/.nalvault)
 *
 * Recordings do not live here. Their root is a regular setting (recording.rootDirectory).
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. May be called a second time with a CLI flag to override the initial resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 * @param env - Environment to read NALVAULT_DATA_DIR from.
 * @throws If NALVAULT_DATA_DIR is set to a relative path.
 */
export function initializeDataDir(cliDataDir?: string, env: NodeJS.ProcessEnv = process.env): void {

  const envDataDir = env.NALVAULT_DATA_DIR;

  if(cliDataDir) {

    // CLI flag is already validated by requireAbsolutePath() in index.ts.
    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new Error("NALVAULT_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".nalvault");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the log file path. When config.paths.logFile is set, that absolute path is used directly.
 * @param config - The application configuration.
 * @returns The absolute path to the log file.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "nalvault.log");
}

/**
 * @returns The default recordings root, ~/NalVault Recordings.
 */
export function defaultRecordingsDirectory(): string {

  return path.join(os.homedir(), "NalVault Recordings");
}
