/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * config.test.ts: Tests for configuration loading, merging and validation.
 */
import { DEFAULTS, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { applyCliOverrides, getDefaults, validateConfiguration } from "./index.js";
import { getConfigFilePath, getDataDir, getLogFilePath, initializeDataDir } from "./paths.js";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

describe("mergeConfiguration", () => {

  it("returns the defaults when nothing is configured", () => {

    expect(mergeConfiguration({}, {})).toEqual(DEFAULTS);
  });

  it("layers environment variables over the config file", () => {

    const config = mergeConfiguration({

      admission: { blocklist: [ "AA:01", 5, "Garage" ] },
      recording: { frameDropRatio: 3, sessionName: "Bench" },
      server: { port: 6000 }
    }, { NALVAULT_LOG_FILE: "", PORT: "7000", PREVIEW_ENABLED: "no", SLOT_COUNT: "many" });

    expect(config.server.port).toBe(7000);
    expect(config.recording.frameDropRatio).toBe(3);
    expect(config.recording.sessionName).toBe("Bench");
    expect(config.preview.enabled).toBe(false);
    expect(config.paths.logFile).toBeNull();
    expect(config.slots.count).toBe(4);
    expect(config.admission.blocklist).toEqual([ "AA:01", "Garage" ]);
    expect(DEFAULTS.server.port).toBe(5590);
  });

  it("ignores keys it does not know", () => {

    const config = mergeConfiguration({ recording: { bogus: 1 }, unknown: { value: true } }, {});

    expect("bogus" in config.recording).toBe(false);
    expect("unknown" in config).toBe(false);
  });
});

describe("validateConfiguration", () => {

  it("accepts the defaults", () => {

    expect(() => validateConfiguration(getDefaults())).not.toThrow();
  });

  it("reports every invalid value at once", () => {

    const config = mergeConfiguration({

      logging: { httpLogLevel: "verbose" },
      recording: { frameDropRatio: "2", rootDirectory: "relative/dir" },
      server: { port: 0 }
    }, {});

    expect(() => validateConfiguration(config)).toThrow([
      "Configuration validation failed:",
      "  HTTP_LOG_LEVEL must be one of none, errors, all, got: verbose",
      "  RECORDINGS_DIR must be an absolute path, got: relative/dir",
      "  FRAME_DROP_RATIO must be an integer, got: 2",
      "  PORT must be a positive integer, got: 0"
    ].join("\n"));
  });

  it("enforces the slot count range and a usable name prefix", () => {

    const config = mergeConfiguration({ slots: { count: 17, namePrefix: "Cams/Left" } }, {});

    expect(() => validateConfiguration(config)).toThrow([
      "Configuration validation failed:",
      "  SLOT_COUNT must be at most 16, got: 17",
      "  SLOT_NAME_PREFIX must be a non-empty name without path separators or colons, got: Cams/Left"
    ].join("\n"));
  });
});

describe("applyCliOverrides", () => {

  it("gives command-line flags the last word", () => {

    const config = applyCliOverrides(mergeConfiguration({ server: { port: 6000 } }, { PORT: "7000" }), { port: 8000, recordingsDirectory: "/srv/recordings" });

    expect(config.server.port).toBe(8000);
    expect(config.recording.rootDirectory).toBe("/srv/recordings");
    expect(config.paths.logFile).toBeNull();
  });
});

describe("data directory", () => {

  it("prefers the flag, then the environment, then the home directory", () => {

    initializeDataDir("/opt/nalvault", { NALVAULT_DATA_DIR: "/var/lib/nalvault" });

    expect(getDataDir()).toBe("/opt/nalvault");

    initializeDataDir(undefined, { NALVAULT_DATA_DIR: "/var/lib/nalvault" });

    expect(getConfigFilePath()).toBe(path.join("/var/lib/nalvault", "config.json"));
    expect(getLogFilePath(getDefaults())).toBe(path.join("/var/lib/nalvault", "nalvault.log"));

    initializeDataDir(undefined, {});

    expect(getDataDir()).toBe(path.join(os.homedir(), ".nalvault"));
  });

  it("rejects a relative NALVAULT_DATA_DIR", () => {

    expect(() => initializeDataDir(undefined, { NALVAULT_DATA_DIR: "data" })).toThrow("NALVAULT_DATA_DIR must be an absolute path, got: data");
  });
});

describe("loadUserConfig", () => {

  let directory: string;

  beforeEach(async () => {

    directory = await fs.mkdtemp(path.join(os.tmpdir(), "nalvault-config-"));
  });

  afterEach(async () => {

    await fs.rm(directory, { force: true, recursive: true });
  });

  it("treats a missing file as an empty configuration", async () => {

    expect(await loadUserConfig(path.join(directory, "config.json"))).toEqual({ config: {}, parseError: false });
  });

  it("reads a JSON object", async () => {

    const file = path.join(directory, "config.json");

    await fs.writeFile(file, JSON.stringify({ slots: { count: 2 } }));

    expect(await loadUserConfig(file)).toEqual({ config: { slots: { count: 2 } }, parseError: false });
  });

  it("flags files that are not a JSON object", async () => {

    const file = path.join(directory, "config.json");

    await fs.writeFile(file, "[1, 2]");

    expect(await loadUserConfig(file)).toEqual({ config: {}, parseError: true, parseErrorMessage: "Expected a JSON object." });

    await fs.writeFile(file, "{ not json");

    const result = await loadUserConfig(file);

    expect(result.config).toEqual({});
    expect(result.parseError).toBe(true);
  });
});
