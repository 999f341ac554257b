/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * registry.test.ts: Tests for the slot registry and its wiring to recording.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { annexB, buildPps, buildSlice, buildSps } from "../testing/h264.js";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import type { Config } from "../types/index.js";
import { ConnectionLog } from "./connectionLog.js";
import { EventEmitter } from "node:events";
import type { FFmpegSpawner } from "../utils/ffmpeg.js";
import { FileReplayReceiver } from "./replay.js";
import { PassThrough } from "node:stream";
import { RecordingSession } from "../recording/session.js";
import { SlotRegistry } from "./registry.js";
import { getDefaults } from "../config/index.js";
import { join } from "node:path";
import { readMp4 } from "../mp4/reader.js";
import { tmpdir } from "node:os";

const SPS = buildSps({ height: 240, width: 320 });
const PPS = buildPps();

// A spawner whose processes accept input and never produce output.
const idleSpawner: FFmpegSpawner = () => Object.assign(new EventEmitter(), {

  kill: (): boolean => true,
  killed: false,
  stderr: new PassThrough(),
  stdin: new PassThrough(),
  stdout: new PassThrough()
});

describe("SlotRegistry", () => {

  let root: string;

  const config = (preview: boolean): Config => {

    const base = getDefaults();

    base.preview.enabled = preview;
    base.recording.consolidationInterval = 3600;
    base.recording.rootDirectory = root;
    base.slots.count = 3;

    return base;
  };

  beforeEach(async () => {

    root = await mkdtemp(join(tmpdir(), "nalvault-registry-"));
  });

  afterEach(async () => {

    await rm(root, { force: true, recursive: true });
  });

  it("creates the configured slots with preview decoders when ffmpeg is available", () => {

    const registry = new SlotRegistry({ config: config(true), connectionLog: new ConnectionLog(), ffmpegPath: "ffmpeg", spawner: idleSpawner });

    expect(registry.slots.map((slot) => slot.serviceName)).toEqual([ "NalVault-01", "NalVault-02", "NalVault-03" ]);
    expect(registry.get(2)?.index).toBe(2);
    expect(registry.get(4)).toBeUndefined();
    expect(registry.decoderFor(1)).toBeDefined();
    expect(registry.summaries(null)[0]).toMatchObject({ preview: { frames: 0, hasFrame: false, running: false }, recorder: null, state: "vacant" });
  });

  it("creates no decoders without ffmpeg or with preview disabled", () => {

    expect(new SlotRegistry({ config: config(true), connectionLog: new ConnectionLog() }).decoderFor(1)).toBeUndefined();
    expect(new SlotRegistry({ config: config(false), connectionLog: new ConnectionLog(), ffmpegPath: "ffmpeg" }).decoderFor(1)).toBeUndefined();
  });

  it("stops the preview decoder when its source leaves", () => {

    const registry = new SlotRegistry({ config: config(true), connectionLog: new ConnectionLog(), ffmpegPath: "ffmpeg", spawner: idleSpawner });
    const slot = registry.get(1);
    const decoder = registry.decoderFor(1);

    slot?.onConnect("AA:01", "Phone1", "Porch");
    slot?.onVideoData(annexB([ SPS, PPS, buildSlice({ keyframe: true }) ]), false, 1n);

    expect(decoder?.isRunning).toBe(true);
    expect(registry.occupiedCount).toBe(1);

    slot?.onDisconnect("AA:01");

    expect(decoder?.isRunning).toBe(false);
    expect(registry.occupiedCount).toBe(0);
  });

  it("records a replayed source from connect to consolidated file", async () => {

    const recordingConfig = config(false);
    const registry = new SlotRegistry({ config: recordingConfig, connectionLog: new ConnectionLog() });
    const session = new RecordingSession({ config: recordingConfig.recording, targets: registry.slots });
    const clip = join(root, "clip.h264");
    const slot = registry.get(1);

    if(!slot) {

      throw new Error("Slot 1 is missing.");
    }

    await writeFile(clip, annexB([ SPS, PPS, buildSlice({ keyframe: true }), buildSlice({ keyframe: false, seed: 2 }), buildSlice({ keyframe: false, seed: 3 }) ]));

    registry.bindSession(session);

    const info = await session.start("Bench");
    const replay = new FileReplayReceiver({ callbacks: slot, file: clip, loop: true, realtime: false });
    const running = replay.run();

    await vi.waitFor(() => {

      expect(session.recorderFor("NalVault-01")?.stats.framesWritten ?? 0).toBeGreaterThanOrEqual(4);
    });

    replay.stop();
    await running;
    await session.stop();

    const directory = join(info.directory, "NalVault-01");

    expect(await readdir(directory)).toEqual(["NalVault-01_CONSOLIDATED.mp4"]);

    const track = await readMp4(join(directory, "NalVault-01_CONSOLIDATED.mp4"));

    expect(track.width).toBe(320);
    expect(track.height).toBe(240);
    expect(track.samples.length).toBeGreaterThanOrEqual(4);
    expect(track.samples[0].sync).toBe(true);
  });

  it("closes the replaced device's recording and records the new device into the same consolidated file", async () => {

    const recordingConfig = config(false);
    const registry = new SlotRegistry({ config: recordingConfig, connectionLog: new ConnectionLog() });
    const session = new RecordingSession({ config: recordingConfig.recording, targets: registry.slots });
    const slot = registry.get(1);

    if(!slot) {

      throw new Error("Slot 1 is missing.");
    }

    registry.bindSession(session);

    const info = await session.start("Bench");
    const consolidated = join(info.directory, "NalVault-01", "NalVault-01_CONSOLIDATED.mp4");

    slot.onConnect("AA:01", "Phone1", "Porch");

    await vi.waitFor(() => {

      expect(session.recorderFor("NalVault-01")?.state).toBe("starting");
    });

    const first = session.recorderFor("NalVault-01");

    slot.onVideoData(annexB([ SPS, PPS, buildSlice({ keyframe: true }) ]), false, 0n);
    slot.onVideoData(annexB([buildSlice({ keyframe: false, seed: 2 })]), false, 66_666_667n);

    await vi.waitFor(() => {

      expect(first?.stats.framesWritten).toBe(2);
    });

    slot.onConnect("BB:02", "Phone2", "Garage");

    await vi.waitFor(() => {

      const recorder = session.recorderFor("NalVault-01");

      expect(recorder).toBeDefined();
      expect(recorder).not.toBe(first);
      expect(recorder?.state).toBe("starting");
    });

    const second = session.recorderFor("NalVault-01");

    // The first device's segment was finalized and consolidated before the new recorder started.
    expect(first?.isActive).toBe(false);
    expect(first?.stats.segmentsFinalized).toBe(1);
    expect((await readMp4(consolidated)).samples).toHaveLength(2);
    expect(slot.identity?.deviceId).toBe("BB:02");
    expect(slot.pendingEvictionDisconnects).toBe(1);

    slot.onVideoData(annexB([ SPS, PPS, buildSlice({ keyframe: true }) ]), false, 10_000_000_000n);
    slot.onVideoData(annexB([buildSlice({ keyframe: false, seed: 3 })]), false, 10_066_666_667n);

    await vi.waitFor(() => {

      expect(second?.stats.framesWritten).toBe(2);
    });

    // The replaced device's late disconnect leaves the new device recording.
    slot.onDisconnect();

    expect(slot.isOccupied).toBe(true);
    expect(session.recorderFor("NalVault-01")).toBe(second);

    await session.stop();

    expect(await readdir(join(info.directory, "NalVault-01"))).toEqual(["NalVault-01_CONSOLIDATED.mp4"]);
    expect((await readMp4(consolidated)).samples.map((sample) => sample.sync)).toEqual([ true, false, true, false ]);
  });
});
