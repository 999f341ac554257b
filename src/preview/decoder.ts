/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * decoder.ts: Live preview decoding through ffmpeg.
 */
import type { FFmpegProcess, FFmpegSpawner } from "../utils/ffmpeg.js";
import { H264_NAL_TYPES, isKeyframeType, toAnnexB } from "../codec/nal.js";
import type { Nullable, PreviewConfig, VideoCodec } from "../types/index.js";
import { buildPreviewArgs, defaultSpawner, spawnFFmpeg } from "../utils/ffmpeg.js";
import { AccessUnitAssembler } from "../codec/accessUnit.js";
import type { BoundLogger } from "../utils/logger.js";
import { EventEmitter } from "node:events";
import { LOG } from "../utils/logger.js";
import type { MediaSink } from "../ingest/bridge.js";
import type { NalUnit } from "../codec/nal.js";
import { ParameterSetCache } from "../codec/parameterSets.js";
import { formatError } from "../utils/errors.js";

/* The preview decoder turns a source's elementary stream into JPEG frames for the web UI. It never touches the recording path: a slow, crashed or missing ffmpeg
 * costs preview frames and nothing else.
 *
 * One ffmpeg process runs per source. It is started at the first keyframe that has parameter sets, and restarted whenever the parameter sets change (a resolution or
 * profile change needs a fresh decoder). A codec change tears the process down; the next keyframe in the new codec starts another one.
 *
 * ffmpeg emits one JPEG per decoded picture, in decode order. Each access unit written to ffmpeg pushes its capture timestamp onto a FIFO, and each JPEG that comes
 * back takes the oldest one. When ffmpeg falls behind (stdin needs draining), access units are dropped until the next keyframe so the decoder never sees a broken
 * reference chain.
 *
 * Events:
 *   "frame" ({ jpeg, pts })    a decoded picture
 */

// Types.

/**
 * A decoded preview picture.
 */
export interface PreviewFrame {

  jpeg: Buffer;

  // Capture timestamp of the access unit the picture came from, in nanoseconds.
  pts: bigint;
}

/**
 * Options for creating a preview decoder.
 */
export interface PreviewDecoderOptions {

  config: PreviewConfig;

  // Resolved ffmpeg executable.
  ffmpegPath: string;

  sourceName: string;

  // Process spawner. Defaults to child_process.spawn.
  spawner?: FFmpegSpawner;
}

// Constants.

const JPEG_SOI = Buffer.from([ 0xFF, 0xD8 ]);
const JPEG_EOI = Buffer.from([ 0xFF, 0xD9 ]);

// A partial frame larger than this means the output is not a JPEG stream; it is discarded.
const MAX_PENDING_JPEG_BYTES = 16 * 1024 * 1024;

// Timestamps kept for pictures ffmpeg has not returned yet.
const MAX_PENDING_TIMESTAMPS = 120;

/**
 * Splits a byte stream of concatenated JPEG images on their start and end markers.
 */
export class JpegFrameSplitter {

  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Adds a chunk of output.
   * @param chunk - Bytes read from ffmpeg.
   * @returns The images completed by this chunk, in order.
   */
  public push(chunk: Buffer): Buffer[] {

    this.buffer = (this.buffer.length > 0) ? Buffer.concat([ this.buffer, chunk ]) : chunk;

    const frames: Buffer[] = [];

    for(;;) {

      const start = this.buffer.indexOf(JPEG_SOI);

      if(start === -1) {

        // Keep a trailing 0xFF: it may be the first half of the next start marker.
        this.buffer = (this.buffer.length > 0) && (this.buffer[this.buffer.length - 1] === 0xFF) ? this.buffer.subarray(this.buffer.length - 1) : Buffer.alloc(0);

        break;
      }

      const end = this.buffer.indexOf(JPEG_EOI, start + JPEG_SOI.length);

      if(end === -1) {

        this.buffer = this.buffer.subarray(start);

        break;
      }

      frames.push(Buffer.from(this.buffer.subarray(start, end + JPEG_EOI.length)));
      this.buffer = this.buffer.subarray(end + JPEG_EOI.length);
    }

    if(this.buffer.length > MAX_PENDING_JPEG_BYTES) {

      this.buffer = Buffer.alloc(0);
    }

    return frames;
  }

  public reset(): void {

    this.buffer = Buffer.alloc(0);
  }
}

export class PreviewDecoder extends EventEmitter implements MediaSink {

  private readonly assembler = new AccessUnitAssembler();
  private codec: VideoCodec = "h264";
  private readonly config: PreviewConfig;
  private readonly ffmpegPath: string;
  private framesDecoded = 0;
  private lastFrame: Nullable<PreviewFrame> = null;
  private readonly log: BoundLogger;
  private readonly parameterSets = new ParameterSetCache();
  private pendingTimestamps: bigint[] = [];
  private process: Nullable<FFmpegProcess> = null;
  private readonly sourceName: string;
  private readonly spawner: FFmpegSpawner;
  private readonly splitter = new JpegFrameSplitter();
  private waitingForKeyframe = true;

  constructor(options: PreviewDecoderOptions) {

    super();

    this.config = options.config;
    this.ffmpegPath = options.ffmpegPath;
    this.sourceName = options.sourceName;
    this.spawner = options.spawner ?? defaultSpawner;
    this.log = LOG.withSource(options.sourceName);
  }

  /**
   * @returns The most recent decoded picture, if any.
   */
  public get latestFrame(): Nullable<PreviewFrame> {

    return this.lastFrame;
  }

  public get frameCount(): number {

    return this.framesDecoded;
  }

  /**
   * @returns True while an ffmpeg process is running.
   */
  public get isRunning(): boolean {

    return this.process !== null;
  }

  public pushNals(nals: readonly NalUnit[], timestamp: bigint): void {

    if(this.codec === "h265") {

      // The assembler and parameter set cache are H.264 only. H.265 senders deliver one picture per packet.
      this.decode(nals, nals.some((nal) => isKeyframeType(nal.type, "h265")), timestamp, false);

      return;
    }

    for(const unit of this.assembler.push(nals, timestamp)) {

      for(const nal of unit.nals) {

        if(nal.type === H264_NAL_TYPES.SPS) {

          this.parameterSets.updateSps(nal.data);
        } else if(nal.type === H264_NAL_TYPES.PPS) {

          this.parameterSets.updatePps(nal.data);
        }
      }

      if(!unit.hasPicture) {

        continue;
      }

      const rebuild = this.parameterSets.shouldRebuild();

      if(rebuild) {

        this.parameterSets.markBuilt();
      }

      this.decode(unit.nals, unit.keyframe && (this.parameterSets.current !== null), unit.timestamp, rebuild);
    }
  }

  /**
   * Switches codecs. The running ffmpeg process is torn down.
   * @param codec - The new codec.
   */
  public setCodec(codec: VideoCodec): void {

    if(codec === this.codec) {

      return;
    }

    this.codec = codec;
    this.teardown();
    this.assembler.reset();
    this.parameterSets.clear();
  }

  /**
   * Stops ffmpeg and forgets the last frame. Used when the source disconnects.
   */
  public reset(): void {

    this.teardown();
    this.assembler.reset();
    this.parameterSets.clear();
    this.lastFrame = null;
  }

  /**
   * Stops ffmpeg.
   */
  public stop(): void {

    this.teardown();
  }

  /**
   * Writes one access unit to ffmpeg, starting or restarting the process first when needed.
   * @param nals - The access unit's NAL units.
   * @param keyframe - True if decoding can start here.
   * @param timestamp - Capture timestamp.
   * @param rebuild - True if the parameter sets changed.
   */
  private decode(nals: readonly NalUnit[], keyframe: boolean, timestamp: bigint, rebuild: boolean): void {

    if(rebuild && this.process) {

      this.log.debug("preview", "Parameter sets changed; restarting the preview decoder.");
      this.teardown();
    }

    if(!this.process) {

      if(!keyframe) {

        return;
      }

      this.spawn();
    }

    const running = this.process;

    if(!running) {

      return;
    }

    if(this.waitingForKeyframe) {

      if(!keyframe) {

        return;
      }

      this.waitingForKeyframe = false;
    }

    if(running.stdin.writableNeedDrain) {

      this.waitingForKeyframe = true;
      this.log.debug("preview", "Decoder is behind; skipping to the next keyframe.");

      return;
    }

    this.pendingTimestamps.push(timestamp);

    if(this.pendingTimestamps.length > MAX_PENDING_TIMESTAMPS) {

      this.pendingTimestamps.shift();
    }

    running.stdin.write(toAnnexB(nals));
  }

  private spawn(): void {

    const ffmpeg = spawnFFmpeg(this.ffmpegPath, buildPreviewArgs(this.codec, this.config.hardwareAcceleration), (error) => {

      if(this.process?.process !== ffmpeg.process) {

        return;
      }

      this.log.warn("Preview decoder stopped: %s. It restarts at the next keyframe.", formatError(error));
      this.teardown();
    }, this.sourceName, this.spawner);

    ffmpeg.stdout.on("data", (chunk: Buffer) => {

      if(this.process?.process === ffmpeg.process) {

        this.handleOutput(chunk);
      }
    });

    this.process = ffmpeg;
    this.waitingForKeyframe = true;
    this.log.debug("preview", "Started preview decoder (%s).", this.codec);
  }

  private handleOutput(chunk: Buffer): void {

    for(const jpeg of this.splitter.push(chunk)) {

      const frame: PreviewFrame = { jpeg, pts: this.pendingTimestamps.shift() ?? 0n };

      this.lastFrame = frame;
      this.framesDecoded++;

      try {

        this.emit("frame", frame);
      } catch(error) {

        this.log.warn("Preview frame listener failed: %s.", formatError(error));
      }
    }
  }

  private teardown(): void {

    const running = this.process;

    this.process = null;
    this.pendingTimestamps = [];
    this.splitter.reset();
    this.waitingForKeyframe = true;

    running?.kill();
  }
}
