/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for NalVault.
 */
import { CONFIG_METADATA, DEFAULTS, cloneDefaults, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import type { Config, Nullable } from "../types/index.js";
import { LOG } from "../utils/index.js";
import type { SettingMetadata } from "./userConfig.js";
import { getLogFilePath } from "./paths.js";
import path from "node:path";

/*
 * CONFIGURATION
 *
 * Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. CLI flags (--port, --log-file, --recordings-dir)
 * 2. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding for the HTTP control API (host, port)
 * - slots: How many device slots exist and how they are named
 * - recording: Recordings root, frame governor, writer retries, rotation and consolidation timing
 * - preview: ffmpeg preview decoding
 * - admission: Devices refused at connection time
 * - logging: Log file size and HTTP request logging
 * - paths: Log file location
 *
 * initializeConfiguration() returns the merged Config. It is validated once at startup and then handed to each component's constructor; nothing reads it from module
 * state.
 */

/**
 * Result of configuration initialization.
 */
export interface ConfigurationResult {

  config: Config;

  // True if config.json exists but could not be parsed.
  parseError: boolean;

  parseErrorMessage?: string;
}

/**
 * Overrides taken from command-line flags.
 */
export interface CliOverrides {

  logFile?: string;
  port?: number;
  recordingsDirectory?: string;
}

/**
 * Loads the user config file and merges it with defaults, environment variables and CLI flags.
 * @param overrides - Values from command-line flags.
 * @param env - Environment to read overrides from.
 * @returns The merged configuration and the config file's parse status.
 */
export async function initializeConfiguration(overrides: CliOverrides = {}, env: NodeJS.ProcessEnv = process.env): Promise<ConfigurationResult> {

  const result = await loadUserConfig();
  const config = applyCliOverrides(mergeConfiguration(result.config, env), overrides);

  LOG.info("Configuration initialized from defaults, user config, and environment variables.");

  return { config, parseError: result.parseError, parseErrorMessage: result.parseErrorMessage };
}

/**
 * Applies command-line overrides on top of a merged configuration.
 * @param config - The merged configuration. It is modified in place.
 * @param overrides - Values from command-line flags.
 * @returns The same configuration.
 */
export function applyCliOverrides(config: Config, overrides: CliOverrides): Config {

  if(overrides.port !== undefined) {

    config.server.port = overrides.port;
  }

  if(overrides.logFile !== undefined) {

    config.paths.logFile = overrides.logFile;
  }

  if(overrides.recordingsDirectory !== undefined) {

    config.recording.rootDirectory = overrides.recordingsDirectory;
  }

  return config;
}

/**
 * Returns a deep copy of the default configuration.
 * @returns A copy of the default configuration.
 */
export function getDefaults(): Config {

  return cloneDefaults();
}

/*
 * CONFIGURATION VALIDATION
 *
 * Validation runs at startup after configuration initialization. Every value is checked against its metadata, all errors are collected, and a single error listing
 * them is thrown so that the operator can fix everything in one pass.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  // Check for NaN (from parseInt of invalid input) and non-positive values.
  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates that a configuration value is a positive number (including floats) within an optional range.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveNumber(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(Number.isNaN(value) || (value <= 0)) {

    return [ name, " must be a positive number, got: ", String(value) ].join("");
  }

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Checks one setting against its metadata.
 * @param setting - The setting's metadata.
 * @param value - The merged value.
 * @returns Error message if invalid, null if valid.
 */
function validateSetting(setting: SettingMetadata, value: unknown): Nullable<string> {

  const name = setting.envVar ?? setting.path;

  switch(setting.type) {

    case "boolean": {

      return (typeof value === "boolean") ? null : [ name, " must be true or false, got: ", String(value) ].join("");
    }

    case "float": {

      return (typeof value === "number") ? validatePositiveNumber(name, value, setting.min, setting.max) :
        [ name, " must be a number, got: ", String(value) ].join("");
    }

    case "integer":
    case "port": {

      return (typeof value === "number") ? validatePositiveInt(name, value, setting.min, setting.max) :
        [ name, " must be an integer, got: ", String(value) ].join("");
    }

    case "path": {

      // Paths whose default is null may stay unset. The others must be given.
      if((value === null) && (getNestedValue(DEFAULTS, setting.path) === null)) {

        return null;
      }

      if((typeof value !== "string") || (value.length === 0)) {

        return [ name, " must be a path, got: ", String(value) ].join("");
      }

      return path.isAbsolute(value) ? null : [ name, " must be an absolute path, got: ", value ].join("");
    }

    default: {

      if(typeof value !== "string") {

        return [ name, " must be a string, got: ", String(value) ].join("");
      }

      if(setting.validValues && !setting.validValues.includes(value)) {

        return [ name, " must be one of ", setting.validValues.join(", "), ", got: ", value ].join("");
      }

      if((setting.type === "host") && (value.length === 0)) {

        return name + " must not be empty.";
      }

      return null;
    }
  }
}

/**
 * Validates all configuration values and throws an error if any are invalid. All errors are collected before throwing.
 * @param config - The merged configuration.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(config: Config): void {

  const errors: string[] = [];

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const error = validateSetting(setting, getNestedValue(config, setting.path));

      if(error) {

        errors.push(error);
      }
    }
  }

  // Slot names become directory names and advertised service names, so the prefix must be usable as both.
  if(/[/\\:]/.test(config.slots.namePrefix) || (config.slots.namePrefix.trim().length === 0)) {

    errors.push("SLOT_NAME_PREFIX must be a non-empty name without path separators or colons, got: " + config.slots.namePrefix);
  }

  if(!Array.isArray(config.admission.blocklist)) {

    errors.push("admission.blocklist must be a list of device ids or names.");
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Displays the active configuration at startup. Only the most commonly adjusted values are logged.
 * @param config - The validated configuration.
 */
export function displayConfiguration(config: Config): void {

  LOG.info("Starting NalVault with configuration:");
  LOG.info("  Server: %s:%s", config.server.host, config.server.port);
  LOG.info("  Slots: %s (%s-01 to %s-%s)", config.slots.count, config.slots.namePrefix, config.slots.namePrefix, String(config.slots.count).padStart(2, "0"));
  LOG.info("  Recordings: %s", config.recording.rootDirectory);
  LOG.info("  Frame drop ratio: %s, target frame rate: %s fps", config.recording.frameDropRatio, config.recording.targetFrameRate);
  LOG.info("  Consolidation interval: %ss", config.recording.consolidationInterval);
  LOG.info("  Live preview: %s", config.preview.enabled ? "enabled" + (config.preview.hardwareAcceleration ? " (hardware decoding)" : "") : "disabled");
  LOG.info("  Log file: %s", getLogFilePath(config));

  if(config.admission.blocklist.length > 0) {

    LOG.info("  Blocked devices: %s", config.admission.blocklist.join(", "));
  }
}

export { CONFIG_METADATA, DEFAULTS, getEnvOverrides, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
export type { SettingMetadata, UserConfig } from "./userConfig.js";
export { defaultRecordingsDirectory, getConfigFilePath, getDataDir, getLogFilePath, initializeDataDir } from "./paths.js";
