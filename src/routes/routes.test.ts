/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * routes.test.ts: Tests for HTTP request parsing and response building.
 */
import { describe, expect, it } from "vitest";
import { ConnectionLog } from "../ingest/connectionLog.js";
import { RecordingSession } from "../recording/session.js";
import type { RouteContext } from "./index.js";
import { SlotRegistry } from "../ingest/registry.js";
import { buildHealthStatus } from "./health.js";
import { getDefaults } from "../config/index.js";
import { parseLimit } from "./connections.js";
import { parseLogLine } from "./logs.js";
import { parseSessionName } from "./recording.js";
import { parseSlotIndex } from "./sources.js";

function createContext(previewEnabled: boolean, ffmpegAvailable: boolean): RouteContext {

  const config = getDefaults();
  const connectionLog = new ConnectionLog();

  config.preview.enabled = previewEnabled;
  config.slots.count = 2;

  const registry = new SlotRegistry({ config, connectionLog });

  return { config, connectionLog, ffmpegAvailable, registry, session: new RecordingSession({ config: config.recording, targets: registry.slots }) };
}

describe("parseLogLine", () => {

  it("reads the level and strips terminal colors", () => {

    expect(parseLogLine("[2026/03/01 10:00:00.123] \x1b[33m[WARN] Slot 1: refused connection.\x1b[0m")).toEqual({

      level: "warn",
      message: "Slot 1: refused connection.",
      timestamp: "2026/03/01 10:00:00.123"
    });
  });

  it("keeps the debug category and treats untagged lines as info", () => {

    expect(parseLogLine("[2026/03/01 10:00:00.123] [DEBUG:recorder:writer] Segment opened.")).toEqual({

      categoryTag: "recorder:writer",
      level: "debug",
      message: "Segment opened.",
      timestamp: "2026/03/01 10:00:00.123"
    });
    expect(parseLogLine("[2026/03/01 10:00:00.123] Started.")?.level).toBe("info");
    expect(parseLogLine("not a log line")).toBeNull();
  });
});

describe("request parsing", () => {

  it("reads an optional session name", () => {

    expect(parseSessionName(undefined)).toBeUndefined();
    expect(parseSessionName({})).toBeUndefined();
    expect(parseSessionName({ sessionName: "  Field Day " })).toBe("Field Day");
    expect(parseSessionName({ sessionName: "   " })).toBeUndefined();
    expect(parseSessionName({ sessionName: 7 })).toBeNull();
  });

  it("accepts only positive slot indexes", () => {

    expect(parseSlotIndex("3")).toBe(3);
    expect(parseSlotIndex("0")).toBeNull();
    expect(parseSlotIndex("01")).toBeNull();
    expect(parseSlotIndex("2.5")).toBeNull();
  });

  it("falls back to the default connection limit", () => {

    expect(parseLimit("10")).toBe(10);
    expect(parseLimit("-4")).toBe(50);
    expect(parseLimit(undefined)).toBe(50);
  });
});

describe("buildHealthStatus", () => {

  it("reports slots and recording state", () => {

    const context = createContext(true, true);

    context.registry.get(2)?.onConnect("AA:01", "Phone1", "Porch");

    const health = buildHealthStatus(context);

    expect(health.status).toBe("healthy");
    expect(health.slots).toEqual({ occupied: 1, total: 2 });
    expect(health.recording).toEqual({ active: false, draining: false, recordingSources: 0 });
  });

  it("is degraded when preview is on but ffmpeg is missing", () => {

    expect(buildHealthStatus(createContext(true, false)).status).toBe("degraded");
    expect(buildHealthStatus(createContext(false, false)).status).toBe("healthy");
  });
});
