/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * recorder.ts: Passthrough MP4 recorder for one source.
 */
import { H264_NAL_TYPES, toLengthPrefixed } from "../codec/nal.js";
import type { Mp4Sample, SegmentWriter } from "../mp4/writer.js";
import type { Nullable, RecordingConfig, VideoCodec } from "../types/index.js";
import { WORK_DIRECTORY, allocateSegmentName } from "./naming.js";
import { formatError, formatMediaDuration, getErrorCode, isNotFoundError } from "../utils/index.js";
import { mkdir, rename, rmdir } from "node:fs/promises";
import type { AccessUnit } from "../codec/accessUnit.js";
import { AccessUnitAssembler } from "../codec/accessUnit.js";
import type { BoundLogger } from "../utils/logger.js";
import { FrameRateGovernor } from "./governor.js";
import { LOG } from "../utils/logger.js";
import { Mp4Writer } from "../mp4/writer.js";
import type { NalUnit } from "../codec/nal.js";
import { ParameterSetCache } from "../codec/parameterSets.js";
import { SerialQueue } from "../utils/serialQueue.js";
import { buildAvc1SampleEntry } from "../mp4/boxes.js";
import { delay } from "../utils/delay.js";
import { join } from "node:path";
import { parseSps } from "../codec/sps.js";

/* The recorder writes one source's access units, unchanged, into a sequence of MP4 segment files. Its lifecycle is:
 *
 *   Idle -> Starting -> Recording -> Stopping -> Idle
 *
 * - Starting: waiting for an SPS, a PPS and a keyframe. Access units before that are counted and dropped, since a segment must begin with a decodable picture.
 * - Recording: every access unit passes through the frame-rate governor, is converted to length-prefixed form, and is appended with a presentation time derived from
 *   its capture timestamp.
 * - Stopping: the open segment is finalized and moved out of the work directory.
 *
 * All work for a source runs through one SerialQueue, so access units are handled strictly in arrival order and never concurrently. Callers hand in NAL views of
 * buffers they own (the receiver bridge copies each packet before demuxing it).
 *
 * Timing: the first accepted capture timestamp is time zero. Later timestamps are converted from nanoseconds to 90 kHz ticks relative to it, rounding to the nearest
 * tick, and clamped so they never run backwards. Each segment's sample times start at zero. The first sample's declared duration is one frame at the target frame
 * rate; after that it is the distance from the previous written sample.
 */

// Types.

/**
 * Recorder lifecycle states.
 */
export type RecorderState = "idle" | "recording" | "starting" | "stopping";

/**
 * Per-recorder counters.
 */
export interface RecorderStats {

  // Access units with a picture that reached the recorder while it was active.
  framesReceived: number;

  // Access units dropped while waiting for the first keyframe or parameter sets.
  framesDroppedBeforeStart: number;

  // Non-keyframes dropped by the frame-rate governor.
  framesDroppedByGovernor: number;

  // Access units dropped because the writer stayed busy through every retry.
  framesDroppedNotReady: number;

  // Samples appended to segments.
  framesWritten: number;

  // Segments finalized and moved into the source directory.
  segmentsFinalized: number;
}

/**
 * Options for creating a recorder.
 */
export interface PassthroughRecorderOptions {

  // Recording settings.
  config: RecordingConfig;

  // The source directory: <root>/<date>/<session>/<source>.
  directory: string;

  // Source name used for file names and log prefixes.
  sourceName: string;

  // Writer factory. Defaults to Mp4Writer.create.
  createWriter?: (path: string, width: number, height: number) => Promise<SegmentWriter>;
}

// Constants.

const TIMESCALE = 90000;
const NANOSECONDS_PER_SECOND = 1_000_000_000n;

/**
 * Converts a nanosecond interval to 90 kHz ticks, rounding to the nearest tick.
 * @param nanoseconds - The interval.
 * @returns Ticks.
 */
export function nanosecondsToTicks(nanoseconds: bigint): number {

  return Number(((nanoseconds * BigInt(TIMESCALE)) + (NANOSECONDS_PER_SECOND / 2n)) / NANOSECONDS_PER_SECOND);
}

export class PassthroughRecorder {

  private readonly assembler = new AccessUnitAssembler();
  private codec: VideoCodec = "h264";
  private readonly config: RecordingConfig;
  private readonly createWriter: (path: string, width: number, height: number) => Promise<SegmentWriter>;
  private currentState: RecorderState = "idle";
  private entryIndex = 0;
  private firstCapture: Nullable<bigint> = null;
  private readonly governor: FrameRateGovernor;
  private lastTicks = 0;
  private readonly log: BoundLogger;
  private readonly parameterSets = new ParameterSetCache();
  private readonly queue = new SerialQueue();
  private rotation: Nullable<{ promise: Promise<void>; resolve: () => void; timer: ReturnType<typeof setTimeout> }> = null;
  private segmentBase: Nullable<number> = null;
  private segmentName = "";
  private readonly statsData: RecorderStats = {

    framesDroppedBeforeStart: 0,
    framesDroppedByGovernor: 0,
    framesDroppedNotReady: 0,
    framesReceived: 0,
    framesWritten: 0,
    segmentsFinalized: 0
  };

  private stopPromise: Nullable<Promise<void>> = null;
  private writer: Nullable<SegmentWriter> = null;

  public readonly directory: string;
  public readonly sourceName: string;

  constructor(options: PassthroughRecorderOptions) {

    this.config = options.config;
    this.directory = options.directory;
    this.sourceName = options.sourceName;
    this.governor = new FrameRateGovernor(options.config.frameDropRatio);
    this.log = LOG.withSource(options.sourceName);
    this.createWriter = options.createWriter ?? ((path, width, height): Promise<SegmentWriter> => Mp4Writer.create(path, { height, timescale: TIMESCALE, width }));
  }

  /**
   * @returns The current lifecycle state.
   */
  public get state(): RecorderState {

    return this.currentState;
  }

  /**
   * @returns A snapshot of the recorder's counters.
   */
  public get stats(): RecorderStats {

    return { ...this.statsData };
  }

  /**
   * @returns True from start() until a stop() has completed.
   */
  public get isActive(): boolean {

    return this.currentState !== "idle";
  }

  /**
   * Creates the source and work directories and begins waiting for a keyframe. Does nothing unless the recorder is idle.
   * @throws If the directories cannot be created.
   */
  public async start(): Promise<void> {

    await this.queue.enqueue(async () => {

      if(this.currentState !== "idle") {

        return;
      }

      await mkdir(join(this.directory, WORK_DIRECTORY), { recursive: true });

      this.currentState = "starting";
      this.log.info("Recording to %s.", this.directory);
    });
  }

  /**
   * Queues one packet's NAL units. Failures are logged; they never reach the caller.
   * @param nals - NAL views into a buffer the caller does not reuse.
   * @param timestamp - Capture timestamp in nanoseconds.
   */
  public pushNals(nals: readonly NalUnit[], timestamp: bigint): void {

    this.queue.enqueue(() => this.processPacket(nals, timestamp)).catch((error: unknown) => {

      this.log.error("Unable to record access unit: %s.", formatError(error));
    });
  }

  /**
   * Records a codec change. H.265 packets are ignored until the codec changes back.
   * @param codec - The announced codec.
   */
  public setCodec(codec: VideoCodec): void {

    this.queue.enqueue(() => {

      if(codec === this.codec) {

        return;
      }

      this.codec = codec;
      this.assembler.reset();

      if(codec === "h265") {

        this.log.warn("H.265 streams are not recorded. Packets are ignored until the source switches back to H.264.");
      } else {

        this.parameterSets.invalidate();
        this.log.info("Source switched to H.264; recording resumes at the next keyframe.");
      }
    }).catch((error: unknown) => {

      this.log.error("Unable to change codec: %s.", formatError(error));
    });
  }

  /**
   * Closes the current segment at the next keyframe and starts the next segment with that keyframe. If no keyframe arrives within the rotation timeout, the segment is
   * closed anyway and the recorder waits for a keyframe.
   * @returns A promise that resolves once the old segment is in the source directory, or right away when no segment is open.
   */
  public async rotate(): Promise<void> {

    const pending = await this.queue.enqueue(() => this.requestRotation());

    await pending.promise;
  }

  /**
   * Resolves once every queued packet and command has been processed.
   */
  public async drain(): Promise<void> {

    await this.queue.drain();
  }

  /**
   * Finalizes the open segment and returns to idle. Concurrent calls share one completion promise.
   * @returns A promise that resolves when the recorder is idle.
   */
  public stop(): Promise<void> {

    this.stopPromise ??= this.queue.enqueue(async () => {

      if(this.currentState === "idle") {

        return;
      }

      this.currentState = "stopping";

      await this.finalizeSegment();
      this.settleRotation();
      await this.removeWorkDirectory();

      this.assembler.reset();
      this.parameterSets.clear();
      this.governor.reset();
      this.firstCapture = null;
      this.lastTicks = 0;
      this.currentState = "idle";

      this.log.info("Recording stopped: %d frames written, %d segments.", this.statsData.framesWritten, this.statsData.segmentsFinalized);
    }).finally(() => {

      this.stopPromise = null;
    });

    return this.stopPromise;
  }

  /**
   * Removes the work directory once no segment is left in it. A directory that still holds a file is kept.
   */
  private async removeWorkDirectory(): Promise<void> {

    try {

      await rmdir(join(this.directory, WORK_DIRECTORY));
    } catch(error) {

      if(!isNotFoundError(error) && (getErrorCode(error) !== "ENOTEMPTY")) {

        this.log.warn("Unable to remove the work directory: %s.", formatError(error));
      }
    }
  }

  private async processPacket(nals: readonly NalUnit[], timestamp: bigint): Promise<void> {

    if((this.currentState !== "starting") && (this.currentState !== "recording")) {

      return;
    }

    if(this.codec !== "h264") {

      return;
    }

    for(const unit of this.assembler.push(nals, timestamp)) {

      // Each access unit depends on the outcome of the previous one (segment open, rotation).
      await this.processAccessUnit(unit);
    }
  }

  private async processAccessUnit(unit: AccessUnit): Promise<void> {

    for(const nal of unit.nals) {

      if(nal.type === H264_NAL_TYPES.SPS) {

        this.parameterSets.updateSps(nal.data);
      } else if(nal.type === H264_NAL_TYPES.PPS) {

        this.parameterSets.updatePps(nal.data);
      }
    }

    if(!unit.hasPicture) {

      return;
    }

    this.statsData.framesReceived++;

    if(this.rotation && unit.keyframe && (this.currentState === "recording")) {

      await this.finalizeSegment();
      this.settleRotation();
      this.currentState = "starting";
    }

    if(this.currentState === "starting") {

      if(!unit.keyframe || !this.parameterSets.current) {

        this.statsData.framesDroppedBeforeStart++;

        return;
      }

      if(!(await this.openSegment())) {

        this.statsData.framesDroppedBeforeStart++;

        return;
      }
    }

    const writer = this.writer;

    if(!writer) {

      return;
    }

    if(this.parameterSets.shouldRebuild()) {

      try {

        this.entryIndex = writer.addSampleEntry(buildAvc1SampleEntry(this.parameterSets.markBuilt()));
        this.log.debug("codec:params", "Parameter sets changed; using sample entry %d.", this.entryIndex);
      } catch(error) {

        // Keep writing with the previous description; the next parameter set update retries.
        this.parameterSets.invalidate();
        this.log.warn("Unable to describe new parameter sets: %s.", formatError(error));
      }
    }

    if(!this.governor.admit(unit.keyframe)) {

      this.statsData.framesDroppedByGovernor++;
      this.log.debug("recorder:governor", "Dropped frame %d.", this.governor.count);

      return;
    }

    const data = toLengthPrefixed(unit.nals.filter((nal) => (nal.type !== H264_NAL_TYPES.SPS) && (nal.type !== H264_NAL_TYPES.PPS)));

    await this.appendSample(writer, data, unit);
  }

  /**
   * Appends a sample, retrying while the writer is busy. A writer error aborts the segment.
   * @param writer - The open writer.
   * @param data - Length-prefixed sample data.
   * @param unit - The access unit.
   */
  private async appendSample(writer: SegmentWriter, data: Buffer, unit: AccessUnit): Promise<void> {

    const ticks = this.captureTicks(unit.timestamp);

    this.segmentBase ??= ticks;

    const sample: Mp4Sample = {

      data,
      duration: (writer.sampleCount === 0) ? Math.round(TIMESCALE / this.config.targetFrameRate) : Math.max(1, ticks - this.lastTicks),
      entryIndex: this.entryIndex,
      keyframe: unit.keyframe,
      pts: ticks - this.segmentBase
    };

    try {

      for(let attempt = 0; ; attempt++) {

        if(writer.append(sample)) {

          this.lastTicks = ticks;
          this.statsData.framesWritten++;

          return;
        }

        if(attempt >= this.config.writerRetryAttempts) {

          break;
        }

        await delay(this.config.writerRetryDelay);
      }
    } catch(error) {

      this.log.error("Segment %s failed: %s. Discarding it and waiting for the next keyframe.", this.segmentName, formatError(error));
      await this.abortSegment();

      return;
    }

    this.statsData.framesDroppedNotReady++;
    this.log.warn("Writer not ready after %d retries; dropped a frame.", this.config.writerRetryAttempts);
  }

  /**
   * Converts a capture timestamp to ticks since the first capture, never earlier than the last written sample.
   * @param timestamp - Capture timestamp in nanoseconds.
   * @returns Ticks since the first capture.
   */
  private captureTicks(timestamp: bigint): number {

    this.firstCapture ??= timestamp;

    const elapsed = timestamp - this.firstCapture;

    return Math.max(this.lastTicks, (elapsed > 0n) ? nanosecondsToTicks(elapsed) : 0);
  }

  /**
   * Opens a segment for the current parameter sets.
   * @returns True if a segment is open.
   */
  private async openSegment(): Promise<boolean> {

    const pair = this.parameterSets.current;

    if(!pair) {

      return false;
    }

    try {

      const sps = parseSps(pair.sps);
      const entry = buildAvc1SampleEntry(pair);

      this.segmentName = await allocateSegmentName(this.directory, this.sourceName, new Date());
      this.writer = await this.createWriter(join(this.directory, WORK_DIRECTORY, this.segmentName), sps.width, sps.height);
      this.entryIndex = this.writer.addSampleEntry(entry);
      this.parameterSets.markBuilt();
      this.segmentBase = null;
      this.currentState = "recording";

      this.log.debug("recorder", "Opened segment %s (%dx%d).", this.segmentName, sps.width, sps.height);

      return true;
    } catch(error) {

      this.writer = null;
      this.log.error("Unable to open a segment: %s. Retrying at the next keyframe.", formatError(error));

      return false;
    }
  }

  /**
   * Finalizes the open segment, if any, and moves it into the source directory. Empty segments are discarded.
   */
  private async finalizeSegment(): Promise<void> {

    const writer = this.writer;

    if(!writer) {

      return;
    }

    this.writer = null;

    if(writer.sampleCount === 0) {

      await writer.abort();

      return;
    }

    try {

      const result = await writer.finalize();

      await rename(writer.path, join(this.directory, this.segmentName));

      this.statsData.segmentsFinalized++;
      this.log.info("Segment %s: %d frames, %s.", this.segmentName, result.sampleCount, formatMediaDuration(result.duration, TIMESCALE));
    } catch(error) {

      this.log.error("Unable to finalize segment %s: %s.", this.segmentName, formatError(error));
      await writer.abort();
    }
  }

  /**
   * Discards the open segment after a writer failure and returns to waiting for a keyframe.
   */
  private async abortSegment(): Promise<void> {

    const writer = this.writer;

    this.writer = null;
    this.currentState = "starting";
    this.parameterSets.invalidate();

    if(writer) {

      try {

        await writer.abort();
      } catch(error) {

        this.log.warn("Unable to remove partial segment %s: %s.", writer.path, formatError(error));
      }
    }

    this.settleRotation();
  }

  private requestRotation(): { promise: Promise<void> } {

    if((this.currentState !== "recording") || !this.writer) {

      return { promise: Promise.resolve() };
    }

    if(this.rotation) {

      return { promise: this.rotation.promise };
    }

    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((resolvePromise) => {

      resolve = resolvePromise;
    });

    const timer = setTimeout(() => {

      this.queue.enqueue(async () => {

        if(!this.rotation || (this.rotation.promise !== promise)) {

          return;
        }

        this.log.warn("No keyframe within %dms; closing the segment without one.", this.config.rotationKeyframeTimeout);

        await this.finalizeSegment();
        this.settleRotation();

        if(this.currentState === "recording") {

          this.currentState = "starting";
        }
      }).catch((error: unknown) => {

        this.log.error("Unable to rotate segment: %s.", formatError(error));
      });
    }, this.config.rotationKeyframeTimeout);

    this.rotation = { promise, resolve, timer };

    return { promise };
  }

  private settleRotation(): void {

    if(!this.rotation) {

      return;
    }

    clearTimeout(this.rotation.timer);
    this.rotation.resolve();
    this.rotation = null;
  }
}
