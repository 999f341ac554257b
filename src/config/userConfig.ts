/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for NalVault.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG, formatError, isNotFoundError } from "../utils/index.js";
import { defaultRecordingsDirectory, getConfigFilePath } from "./paths.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * NalVault stores user configuration in <data-dir>/config.json. The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables
 * 4. CLI flags (applied by the entry point, highest priority)
 *
 * Only keys listed in CONFIG_METADATA are read from the file and the environment. The admission blocklist is the one exception: it is an array and can only be set in
 * the file.
 */

/*
 * SETTING METADATA
 *
 * Each configurable setting has metadata describing its type, valid range, environment variable name, and human-readable description. The metadata drives the
 * environment override pass, validation, and the --list-env listing.
 */

/**
 * Metadata describing a single configuration setting. Default values are not stored here; use getNestedValue(DEFAULTS, setting.path).
 */
export interface SettingMetadata {

  // Human-readable description. The first sentence is shown by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: Nullable<string>;

  // Short human-readable label.
  label: string;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Dot-separated path to the setting (e.g., "recording.frameDropRatio").
  path: string;

  // Data type for parsing and validation.
  type: "boolean" | "float" | "host" | "integer" | "path" | "port" | "string";

  // Valid values for string type settings.
  validValues?: string[];

  // Unit of measurement (e.g., "ms", "seconds").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  logging: [
    {

      description: "HTTP request logging level. \"none\" disables request logging, \"errors\" logs only 4xx/5xx responses, \"all\" logs everything.",
      envVar: "HTTP_LOG_LEVEL",
      label: "HTTP Log Level",
      path: "logging.httpLogLevel",
      type: "string",
      validValues: [ "none", "errors", "all" ]
    },
    {

      description: "Maximum log file size in bytes. When exceeded, the file is trimmed to half this size keeping the most recent lines.",
      envVar: "LOG_MAX_SIZE",
      label: "Max Log Size",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Log file path. Leave empty to use nalvault.log in the data directory.",
      envVar: "NALVAULT_LOG_FILE",
      label: "Log File",
      path: "paths.logFile",
      type: "path"
    }
  ],

  preview: [
    {

      description: "Decode each source with ffmpeg for the live preview. Recording does not depend on this.",
      envVar: "PREVIEW_ENABLED",
      label: "Live Preview",
      path: "preview.enabled",
      type: "boolean"
    },
    {

      description: "Path to the ffmpeg executable. Leave empty to search the system PATH.",
      envVar: "FFMPEG_PATH",
      label: "FFmpeg Path",
      path: "preview.ffmpegPath",
      type: "path"
    },
    {

      description: "Ask ffmpeg for hardware decoding. Disable if the preview decoder fails to start on this machine.",
      envVar: "PREVIEW_HWACCEL",
      label: "Hardware Decoding",
      path: "preview.hardwareAcceleration",
      type: "boolean"
    }
  ],

  recording: [
    {

      description: "Root directory for recordings. Sessions are stored as <root>/<date>/<session>/<source>/.",
      envVar: "RECORDINGS_DIR",
      label: "Recordings Directory",
      path: "recording.rootDirectory",
      type: "path"
    },
    {

      description: "Default session name. Leave empty to number sessions Session01, Session02, and so on within each day.",
      envVar: "SESSION_NAME",
      label: "Session Name",
      path: "recording.sessionName",
      type: "string"
    },
    {

      description: "Ratio between the source frame rate and the recorded frame rate. 1 records every frame. Keyframes are always recorded.",
      envVar: "FRAME_DROP_RATIO",
      label: "Frame Drop Ratio",
      max: 30,
      min: 1,
      path: "recording.frameDropRatio",
      type: "integer"
    },
    {

      description: "Frame rate used for the duration of the first frame in each segment.",
      envVar: "TARGET_FRAME_RATE",
      label: "Target Frame Rate",
      max: 240,
      min: 1,
      path: "recording.targetFrameRate",
      type: "integer",
      unit: "fps"
    },
    {

      description: "Time between periodic segment rotations and consolidation passes while recording.",
      envVar: "CONSOLIDATION_INTERVAL",
      label: "Consolidation Interval",
      max: 86400,
      min: 10,
      path: "recording.consolidationInterval",
      type: "integer",
      unit: "seconds"
    },
    {

      description: "Attempts made to append a frame while the segment writer is busy before the frame is dropped.",
      envVar: "WRITER_RETRY_ATTEMPTS",
      label: "Writer Retry Attempts",
      max: 1000,
      min: 1,
      path: "recording.writerRetryAttempts",
      type: "integer"
    },
    {

      description: "Delay between writer readiness retries.",
      envVar: "WRITER_RETRY_DELAY",
      label: "Writer Retry Delay",
      max: 1000,
      min: 1,
      path: "recording.writerRetryDelay",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Longest a segment rotation waits for a keyframe before the segment is closed anyway.",
      envVar: "ROTATION_KEYFRAME_TIMEOUT",
      label: "Rotation Keyframe Timeout",
      max: 60000,
      min: 1,
      path: "recording.rotationKeyframeTimeout",
      type: "integer",
      unit: "ms"
    }
  ],

  server: [
    {

      description: "Address the HTTP server binds to. Use 127.0.0.1 to accept local connections only.",
      envVar: "HOST",
      label: "Bind Address",
      path: "server.host",
      type: "host"
    },
    {

      description: "TCP port for the HTTP control API.",
      envVar: "PORT",
      label: "Server Port",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    }
  ],

  slots: [
    {

      description: "Number of device slots advertised at startup.",
      envVar: "SLOT_COUNT",
      label: "Slot Count",
      max: 16,
      min: 1,
      path: "slots.count",
      type: "integer"
    },
    {

      description: "Prefix for slot service names. Slot 1 is advertised as <prefix>-01.",
      envVar: "SLOT_NAME_PREFIX",
      label: "Slot Name Prefix",
      path: "slots.namePrefix",
      type: "string"
    }
  ]
};

/**
 * User configuration as read from config.json. Nothing in it is trusted: mergeConfiguration() copies known keys by path and validateConfiguration() checks the
 * result.
 */
export type UserConfig = Record<string, unknown>;

/**
 * Result of loading user config.
 */
export interface UserConfigLoadResult {

  // The loaded configuration (empty object if the file is missing or invalid).
  config: UserConfig;

  // True if the config file exists but does not contain a JSON object.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file exists but is not a JSON object.
 * @param filePath - The config file. Defaults to config.json in the data directory.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(filePath = getConfigFilePath()): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    // File doesn't exist - this is normal, use defaults.
    if(isNotFoundError(error)) {

      return { config: {}, parseError: false };
    }

    LOG.warn("Failed to read configuration file %s: %s. Using defaults.", filePath, formatError(error));

    return { config: {}, parseError: false };
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(error) {

    const message = formatError(error);

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", filePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }

  if(!isRecord(parsed)) {

    LOG.warn("Configuration file %s does not contain a JSON object. Using defaults.", filePath);

    return { config: {}, parseError: true, parseErrorMessage: "Expected a JSON object." };
  }

  return { config: parsed, parseError: false };
}

/**
 * Hard-coded default configuration values. These are the baseline values used when neither user config nor environment variables provide a value.
 */
export const DEFAULTS: Config = {

  admission: {

    blocklist: []
  },

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    logFile: null
  },

  preview: {

    enabled: true,
    ffmpegPath: null,
    hardwareAcceleration: true
  },

  recording: {

    consolidationInterval: 300,
    frameDropRatio: 2,
    rootDirectory: defaultRecordingsDirectory(),
    rotationKeyframeTimeout: 5000,
    sessionName: "",
    targetFrameRate: 15,
    writerRetryAttempts: 10,
    writerRetryDelay: 5
  },

  server: {

    host: "0.0.0.0",
    port: 5590
  },

  slots: {

    count: 4,
    namePrefix: "NalVault"
  }
};

/**
 * @returns A deep copy of the default configuration.
 */
export function cloneDefaults(): Config {

  return structuredClone(DEFAULTS);
}

function isRecord(value: unknown): value is Record<string, unknown> {

  return (value !== null) && (typeof value === "object") && !Array.isArray(value);
}

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, type: SettingMetadata["type"]): Nullable<boolean | number | string> | undefined {

  switch(type) {

    case "boolean": {

      // Accept common truthy values for environment variables.
      const lower = value.toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "float": {

      const num = parseFloat(value);

      return Number.isNaN(num) ? undefined : num;
    }

    case "integer":
    case "port": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    case "path": {

      // An empty path means "use the default location".
      return (value.length > 0) ? value : null;
    }

    default: {

      return value;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "recording.frameDropRatio").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if(!isRecord(current)) {

      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path.
 * @param value - The value to set.
 */
export function setNestedValue(obj: Record<string, unknown>, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  let current = obj;

  for(const part of parts.slice(0, -1)) {

    const next = current[part];

    if(isRecord(next)) {

      current = next;
    } else {

      const created: Record<string, unknown> = {};

      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Merges user configuration with defaults and environment overrides to produce the final configuration. Priority: env vars > user config > defaults. Values are
 * copied as given; validateConfiguration() checks their types and ranges afterwards.
 * @param userConfig - User configuration from the config file.
 * @param env - Environment to read overrides from.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, env: NodeJS.ProcessEnv = process.env): Config {

  const config = cloneDefaults();

  // A shallow record view of the config. Its sections are the config's own section objects, so writes by path land in config.
  const target: Record<string, unknown> = { ...config };

  // Apply user config values.
  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const userValue = getNestedValue(userConfig, setting.path);

      if(userValue !== undefined) {

        setNestedValue(target, setting.path, userValue);
      }
    }
  }

  // The blocklist is the only array setting. It is taken from the file as a list of strings; anything else in the list is ignored.
  const blocklist = getNestedValue(userConfig, "admission.blocklist");

  if(Array.isArray(blocklist)) {

    config.admission.blocklist = blocklist.filter((entry): entry is string => typeof entry === "string");
  }

  // Apply environment variable overrides (highest priority).
  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const envValue = setting.envVar ? env[setting.envVar] : undefined;

      if(envValue === undefined) {

        continue;
      }

      const parsedValue = parseEnvValue(envValue, setting.type);

      if(parsedValue !== undefined) {

        setNestedValue(target, setting.path, parsedValue);
      }
    }
  }

  return config;
}

/**
 * Returns the settings overridden by environment variables.
 * @param env - Environment to inspect.
 * @returns Map of setting path to the raw environment value.
 */
export function getEnvOverrides(env: NodeJS.ProcessEnv = process.env): Map<string, string> {

  const overrides = new Map<string, string>();

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const envValue = setting.envVar ? env[setting.envVar] : undefined;

      if(envValue !== undefined) {

        overrides.set(setting.path, envValue);
      }
    }
  }

  return overrides;
}
