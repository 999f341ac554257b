/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * bridge.test.ts: Tests for the slot media bridge.
 */
import type { NalUnit } from "../codec/nal.js";
import { annexB, buildPps, buildSlice, buildSps } from "../testing/h264.js";
import { describe, expect, it } from "vitest";
import type { MediaSink } from "./bridge.js";
import { ReceiverBridge } from "./bridge.js";
import type { VideoCodec } from "../types/index.js";

class RecordingSink implements MediaSink {

  public readonly codecs: VideoCodec[] = [];
  public readonly pushes: { nals: readonly NalUnit[]; timestamp: bigint }[] = [];

  public pushNals(nals: readonly NalUnit[], timestamp: bigint): void {

    this.pushes.push({ nals, timestamp });
  }

  public setCodec(codec: VideoCodec): void {

    this.codecs.push(codec);
  }
}

describe("ReceiverBridge", () => {

  it("demultiplexes each packet once and hands the same units to both sinks", () => {

    const decoder = new RecordingSink();
    const recorder = new RecordingSink();
    const bridge = new ReceiverBridge(decoder);

    bridge.attachRecorder(recorder);
    bridge.push(annexB([ buildSps({ height: 240, width: 320 }), buildPps(), buildSlice({ keyframe: true }) ]), 42n);

    expect(decoder.pushes).toHaveLength(1);
    expect(decoder.pushes[0].nals.map((nal) => nal.type)).toEqual([ 7, 8, 5 ]);
    expect(decoder.pushes[0].timestamp).toBe(42n);
    expect(recorder.pushes[0].nals).toBe(decoder.pushes[0].nals);
  });

  it("copies the packet before handing it on", () => {

    const recorder = new RecordingSink();
    const bridge = new ReceiverBridge();
    const slice = buildSlice({ keyframe: false, seed: 3 });
    const packet = new Uint8Array(annexB([slice]));

    bridge.attachRecorder(recorder);
    bridge.push(packet, 1n);
    packet.fill(0);

    expect(recorder.pushes[0].nals[0].data.equals(slice)).toBe(true);
  });

  it("counts packets even with no sink attached", () => {

    const bridge = new ReceiverBridge();
    const packet = annexB([buildSlice({ keyframe: false })]);

    bridge.push(packet, 1n);
    bridge.push(packet, 2n);

    expect(bridge.stats).toEqual({ bytesReceived: packet.length * 2, packetsReceived: 2 });
    expect(bridge.hasRecorder).toBe(false);
  });

  it("tells a newly attached recorder about a non-default codec", () => {

    const decoder = new RecordingSink();
    const recorder = new RecordingSink();
    const bridge = new ReceiverBridge(decoder);

    bridge.setCodec("h265");
    bridge.attachRecorder(recorder);

    expect(decoder.codecs).toEqual(["h265"]);
    expect(recorder.codecs).toEqual(["h265"]);
    expect(bridge.currentCodec).toBe("h265");

    bridge.attachRecorder(null);

    expect(bridge.hasRecorder).toBe(false);
  });
});
