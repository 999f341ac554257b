/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * session.test.ts: Tests for recording session orchestration.
 */
import type { MediaSink } from "../ingest/bridge.js";
import type { Nullable, RecordingConfig } from "../types/index.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { annexB, buildPps, buildSlice, buildSps } from "../testing/h264.js";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { RecordingSession } from "./session.js";
import type { RecordingTarget } from "./session.js";
import { dateDirectoryName } from "./naming.js";
import { demuxAnnexB } from "../codec/nal.js";
import { join } from "node:path";
import { readMp4 } from "../mp4/reader.js";
import { tmpdir } from "node:os";

const SPS = buildSps({ height: 480, width: 640 });
const PPS = buildPps();

class FakeTarget implements RecordingTarget {

  public isOccupied: boolean;
  public readonly serviceName: string;
  public sink: Nullable<MediaSink> = null;

  constructor(serviceName: string, isOccupied = true) {

    this.isOccupied = isOccupied;
    this.serviceName = serviceName;
  }

  public attachRecorder(sink: Nullable<MediaSink>): void {

    this.sink = sink;
  }

  public keyframe(timestamp: bigint): void {

    this.sink?.pushNals(demuxAnnexB(annexB([ SPS, PPS, buildSlice({ keyframe: true }) ])), timestamp);
  }

  public pframe(timestamp: bigint): void {

    this.sink?.pushNals(demuxAnnexB(annexB([buildSlice({ keyframe: false })])), timestamp);
  }
}

describe("RecordingSession", () => {

  let root: string;

  const config = (overrides: Partial<RecordingConfig> = {}): RecordingConfig => ({

    consolidationInterval: 3600,
    frameDropRatio: 1,
    rootDirectory: root,
    rotationKeyframeTimeout: 10,
    sessionName: "",
    targetFrameRate: 15,
    writerRetryAttempts: 2,
    writerRetryDelay: 1,
    ...overrides
  });

  beforeEach(async () => {

    root = await mkdtemp(join(tmpdir(), "nalvault-session-"));
  });

  afterEach(async () => {

    await rm(root, { force: true, recursive: true });
  });

  it("names sessions SessionNN within the date directory", async () => {

    const session = new RecordingSession({ config: config(), targets: [] });
    const first = await session.start();

    expect(first.name).toBe("Session01");
    expect(first.directory).toBe(join(root, dateDirectoryName(first.startedAt), "Session01"));

    await session.stop();

    expect((await session.start()).name).toBe("Session02");

    await session.stop();
  });

  it("prefers an explicit name, then the configured name", async () => {

    const session = new RecordingSession({ config: config({ sessionName: "Bench" }), targets: [] });

    expect((await session.start()).name).toBe("Bench");
    await session.stop();

    expect((await session.start("Field: Day 2")).name).toBe("Field_ Day 2");
    await session.stop();
  });

  it("returns the active session when started twice", async () => {

    const session = new RecordingSession({ config: config(), targets: [] });
    const first = await session.start();

    expect(await session.start("Other")).toBe(first);

    await session.stop();
  });

  it("records connected sources and consolidates them when stopped", async () => {

    const target = new FakeTarget("Cam-01");
    const idle = new FakeTarget("Cam-02", false);
    const session = new RecordingSession({ config: config(), targets: [ target, idle ] });
    const info = await session.start();

    expect(target.sink).toBe(session.recorderFor("Cam-01"));
    expect(idle.sink).toBeNull();
    expect(session.status).toMatchObject({ active: true, draining: false, name: "Session01", recordingSources: 1 });

    target.keyframe(0n);
    target.pframe(66_666_667n);

    const stopping = session.stop();

    expect(session.isRecording).toBe(false);
    expect(session.isDraining).toBe(true);

    await stopping;

    expect(session.isDraining).toBe(false);
    expect(session.info).toBeNull();
    expect(target.sink).toBeNull();

    const sourceDirectory = join(info.directory, "Cam-01");

    expect(await readdir(sourceDirectory)).toEqual(["Cam-01_CONSOLIDATED.mp4"]);

    const track = await readMp4(join(sourceDirectory, "Cam-01_CONSOLIDATED.mp4"));

    expect(track.samples.map((sample) => sample.duration)).toEqual([ 6000, 6000 ]);
  });

  it("stops a session whose start was still in progress", async () => {

    const target = new FakeTarget("Cam-01");
    const session = new RecordingSession({ config: config(), targets: [target] });
    const starting = session.start();

    await session.stop();

    const info = await starting;

    expect(info.name).toBe("Session01");
    expect(session.isRecording).toBe(false);
    expect(session.isDraining).toBe(false);
    expect(session.info).toBeNull();
    expect(session.status.recordingSources).toBe(0);
    expect(target.sink).toBeNull();
  });

  it("starts a recorder once for a source that connects during the session", async () => {

    const target = new FakeTarget("Cam-01", false);
    const session = new RecordingSession({ config: config(), targets: [target] });

    await session.sourceConnected(target);

    expect(target.sink).toBeNull();

    await session.start();

    target.isOccupied = true;
    await session.sourceConnected(target);

    const recorder = target.sink;

    expect(recorder).not.toBeNull();

    await session.sourceConnected(target);

    expect(target.sink).toBe(recorder);
    expect(session.status.recordingSources).toBe(1);

    await session.stop();
  });

  it("stops and consolidates a source that disconnects, leaving the session running", async () => {

    const target = new FakeTarget("Cam-01");
    const session = new RecordingSession({ config: config(), targets: [target] });
    const info = await session.start();

    target.keyframe(0n);
    target.pframe(66_666_667n);

    await session.sourceDisconnected(target);

    expect(target.sink).toBeNull();
    expect(session.isRecording).toBe(true);
    expect(session.status.recordingSources).toBe(0);
    expect((await readMp4(join(info.directory, "Cam-01", "Cam-01_CONSOLIDATED.mp4"))).samples).toHaveLength(2);

    await session.stop();
  });

  it("waits for a draining stop before starting the next session", async () => {

    const target = new FakeTarget("Cam-01");
    const session = new RecordingSession({ config: config(), targets: [target] });
    const first = await session.start();

    target.keyframe(0n);

    void session.stop();

    const second = await session.start();

    expect(second.name).toBe("Session02");
    expect((await readMp4(join(first.directory, "Cam-01", "Cam-01_CONSOLIDATED.mp4"))).samples).toHaveLength(1);

    await session.stop();
  });

  it("rotates and consolidates on the periodic timer", async () => {

    const target = new FakeTarget("Cam-01");
    const session = new RecordingSession({ config: config({ consolidationInterval: 0.05 }), targets: [target] });
    const info = await session.start();
    const consolidated = join(info.directory, "Cam-01", "Cam-01_CONSOLIDATED.mp4");

    target.keyframe(0n);
    target.pframe(66_666_667n);

    await vi.waitFor(async () => {

      expect((await readMp4(consolidated)).samples).toHaveLength(2);
    }, { interval: 20, timeout: 5000 });

    await session.stop();
  });

  it("rotates and consolidates every source on request", async () => {

    const target = new FakeTarget("Cam-01");
    const session = new RecordingSession({ config: config(), targets: [target] });

    await session.start();

    target.keyframe(0n);
    target.pframe(66_666_667n);

    expect(await session.consolidateNow()).toEqual([ { result: { duration: 12000, merged: 1, skipped: [] }, source: "Cam-01" } ]);

    await session.stop();
  });
});
