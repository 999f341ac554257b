/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * decoder.test.ts: Tests for the preview decoder.
 */
import type { FFmpegChildProcess, FFmpegSpawner } from "../utils/ffmpeg.js";
import { JpegFrameSplitter, PreviewDecoder } from "./decoder.js";
import { annexB, buildPps, buildSlice, buildSps } from "../testing/h264.js";
import { describe, expect, it, vi } from "vitest";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { PreviewFrame } from "./decoder.js";
import { demuxAnnexB } from "../codec/nal.js";

const SPS = buildSps({ height: 480, width: 640 });
const PPS = buildPps();
const IDR = buildSlice({ keyframe: true });
const P = buildSlice({ keyframe: false });

class FakeChild extends EventEmitter implements FFmpegChildProcess {

  public killed = false;
  public readonly stderr = new PassThrough();
  public readonly stdin = new PassThrough();
  public readonly stdout = new PassThrough();
  public readonly written: Buffer[] = [];

  constructor() {

    super();

    this.stdin.on("data", (chunk: Buffer) => {

      this.written.push(chunk);
    });
  }

  public kill(): boolean {

    this.killed = true;

    return true;
  }
}

function createDecoder(): { children: FakeChild[]; commands: string[][]; decoder: PreviewDecoder } {

  const children: FakeChild[] = [];
  const commands: string[][] = [];
  const spawner: FFmpegSpawner = (command, args) => {

    const child = new FakeChild();

    children.push(child);
    commands.push([ command, ...args ]);

    return child;
  };

  const decoder = new PreviewDecoder({ config: { enabled: true, ffmpegPath: null, hardwareAcceleration: false }, ffmpegPath: "ffmpeg", sourceName: "Cam-01",
    spawner });

  return { children, commands, decoder };
}

function inputFormat(command: string[]): string | undefined {

  return command[command.indexOf("-i") - 1];
}

describe("JpegFrameSplitter", () => {

  it("reassembles images split across chunks", () => {

    const splitter = new JpegFrameSplitter();

    expect(splitter.push(Buffer.from([ 0x00, 0x11, 0xFF, 0xD8, 0x01, 0x02 ]))).toEqual([]);
    expect(splitter.push(Buffer.from([ 0xFF, 0xD9, 0xFF, 0xD8, 0x03, 0xFF ]))).toEqual([Buffer.from([ 0xFF, 0xD8, 0x01, 0x02, 0xFF, 0xD9 ])]);
    expect(splitter.push(Buffer.from([0xD9]))).toEqual([Buffer.from([ 0xFF, 0xD8, 0x03, 0xFF, 0xD9 ])]);
  });

  it("keeps a start marker split after its first byte", () => {

    const splitter = new JpegFrameSplitter();

    expect(splitter.push(Buffer.from([ 0x01, 0xFF ]))).toEqual([]);
    expect(splitter.push(Buffer.from([ 0xD8, 0x05, 0xFF, 0xD9 ]))).toEqual([Buffer.from([ 0xFF, 0xD8, 0x05, 0xFF, 0xD9 ])]);
  });
});

describe("PreviewDecoder", () => {

  it("starts ffmpeg at the first keyframe and feeds it Annex-B access units", async () => {

    const { children, commands, decoder } = createDecoder();

    decoder.pushNals(demuxAnnexB(annexB([P])), 500n);

    expect(children).toHaveLength(0);

    decoder.pushNals(demuxAnnexB(annexB([ SPS, PPS, IDR ])), 1000n);

    expect(children).toHaveLength(1);
    expect(commands[0][0]).toBe("ffmpeg");
    expect(inputFormat(commands[0])).toBe("h264");
    expect(commands[0]).not.toContain("-hwaccel");

    await vi.waitFor(() => {

      expect(Buffer.concat(children[0].written).equals(annexB([ SPS, PPS, IDR ]))).toBe(true);
    });
  });

  it("pairs decoded pictures with the timestamps of the access units, in order", async () => {

    const { children, decoder } = createDecoder();
    const frames: PreviewFrame[] = [];

    decoder.on("frame", (frame: PreviewFrame) => frames.push(frame));
    decoder.pushNals(demuxAnnexB(annexB([ SPS, PPS, IDR ])), 1000n);
    decoder.pushNals(demuxAnnexB(annexB([P])), 2000n);

    children[0].stdout.write(Buffer.from([ 0xFF, 0xD8, 0x0A, 0xFF, 0xD9, 0xFF, 0xD8, 0x0B, 0xFF, 0xD9 ]));

    await vi.waitFor(() => {

      expect(frames.map((frame) => frame.pts)).toEqual([ 1000n, 2000n ]);
    });

    expect([...frames[1].jpeg]).toEqual([ 0xFF, 0xD8, 0x0B, 0xFF, 0xD9 ]);
    expect(decoder.latestFrame?.pts).toBe(2000n);
    expect(decoder.frameCount).toBe(2);

    decoder.reset();

    expect(decoder.latestFrame).toBeNull();
  });

  it("restarts ffmpeg when the parameter sets change", () => {

    const { children, decoder } = createDecoder();

    decoder.pushNals(demuxAnnexB(annexB([ SPS, PPS, IDR ])), 1000n);
    decoder.pushNals(demuxAnnexB(annexB([ SPS, PPS, IDR ])), 2000n);

    expect(children).toHaveLength(1);

    decoder.pushNals(demuxAnnexB(annexB([ SPS, buildPps(3), IDR ])), 3000n);

    expect(children).toHaveLength(2);
    expect(children[0].killed).toBe(true);
    expect(children[1].killed).toBe(false);
  });

  it("tears ffmpeg down on a codec change and restarts it for H.265", () => {

    const { children, commands, decoder } = createDecoder();

    decoder.pushNals(demuxAnnexB(annexB([ SPS, PPS, IDR ])), 1000n);
    decoder.setCodec("h265");

    expect(children[0].killed).toBe(true);
    expect(decoder.isRunning).toBe(false);

    // IDR_W_RADL (type 19).
    decoder.pushNals(demuxAnnexB(annexB([Buffer.from([ 0x26, 0x01, 0xAF, 0x10 ])]), "h265"), 2000n);

    expect(children).toHaveLength(2);
    expect(inputFormat(commands[1])).toBe("hevc");
  });

  it("waits for a keyframe after ffmpeg exits unexpectedly", () => {

    const { children, decoder } = createDecoder();

    decoder.pushNals(demuxAnnexB(annexB([ SPS, PPS, IDR ])), 1000n);
    children[0].emit("exit", 1, null);

    expect(decoder.isRunning).toBe(false);

    decoder.pushNals(demuxAnnexB(annexB([P])), 2000n);

    expect(children).toHaveLength(1);

    decoder.pushNals(demuxAnnexB(annexB([IDR])), 3000n);

    expect(children).toHaveLength(2);
  });
});
