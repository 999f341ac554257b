/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * writer.ts: Progressive single-track MP4 writer.
 */
import { BOX_HEADER_SIZE, EXTENDED_BOX_HEADER_SIZE, box, fullBox, u16, u32, u64, unityMatrix } from "./boxes.js";
import { open, rm } from "node:fs/promises";
import { LOG } from "../utils/logger.js";
import type { Nullable } from "../types/index.js";
import type { WriteStream } from "node:fs";
import { createWriteStream } from "node:fs";
import { finished } from "node:stream/promises";
import { once } from "node:events";

/* The writer produces a progressive (non-fragmented) MP4 with one H.264 video track:
 *
 *   ftyp | mdat (64-bit size, patched at finalize) | moov
 *
 * Sample data streams straight to disk as it arrives, and the sample tables stay in memory until finalize() writes the moov box behind the media data. Each sample is
 * its own chunk, so every sample gets a chunk offset entry. The mdat header always uses the 64-bit size form, which lets finalize() patch the size in place no matter
 * how large the file grows.
 *
 * A sample's stored duration is the distance to the next sample's presentation time, never less than one tick. The last sample keeps the duration declared when it
 * was appended. Version 1 of mvhd, tkhd and mdhd is used only when the track duration does not fit in 32 bits.
 */

// Types.

/**
 * Options for creating a writer.
 */
export interface Mp4WriterOptions {

  // Picture height for the track header.
  height: number;

  // Media and movie timescale in ticks per second. Default: 90000.
  timescale?: number;

  // Picture width for the track header.
  width: number;
}

/**
 * One sample handed to the writer.
 */
export interface Mp4Sample {

  // Length-prefixed NAL data.
  data: Buffer;

  // Declared duration in ticks. Only the last sample's declared duration is stored; earlier durations come from presentation time deltas.
  duration: number;

  // 1-based index of the sample entry describing this sample, as returned by addSampleEntry().
  entryIndex: number;

  // True for sync samples.
  keyframe: boolean;

  // Presentation time in ticks, relative to the start of the file.
  pts: number;
}

/**
 * Result of finalizing a file.
 */
export interface Mp4FinalizeResult {

  // Track duration in ticks.
  duration: number;

  // Bytes written, moov included.
  fileSize: number;

  // Number of samples in the file.
  sampleCount: number;
}

/**
 * The writer operations the recorder relies on.
 */
export interface SegmentWriter {

  readonly path: string;
  readonly sampleCount: number;

  abort(): Promise<void>;
  addSampleEntry(entry: Buffer): number;
  append(sample: Mp4Sample): boolean;
  finalize(): Promise<Mp4FinalizeResult>;
}

// Constants.

// Seconds between the MP4 epoch (1904-01-01) and the Unix epoch.
const MP4_EPOCH_OFFSET = 2082844800;

const FTYP = box("ftyp", Buffer.from("isom", "latin1"), u32(0x200), Buffer.from("isomiso2avc1mp41", "latin1"));

const UINT32_MAX = 0xFFFFFFFF;

// Bytes the write stream may buffer before the writer reports itself not ready.
const WRITE_HIGH_WATER_MARK = 8 * 1024 * 1024;

// "und" packed as three 5-bit letters.
const LANGUAGE_UNDETERMINED = 0x55C4;

/**
 * Packs a list of unsigned integers into one buffer.
 * @param values - The values.
 * @param width - 4 for 32-bit fields, 8 for 64-bit fields.
 * @returns The packed table.
 */
function packTable(values: readonly number[], width: 4 | 8): Buffer {

  const table = Buffer.alloc(values.length * width);

  values.forEach((value, index) => {

    if(width === 8) {

      table.writeBigUInt64BE(BigInt(value), index * 8);
    } else {

      table.writeUInt32BE(value, index * 4);
    }
  });

  return table;
}

export class Mp4Writer implements SegmentWriter {

  private readonly chunkOffsets: number[] = [];
  private readonly entries: Buffer[] = [];
  private readonly entryIndices: number[] = [];
  private failure: Nullable<Error> = null;
  private finalized = false;
  private lastDuration = 0;
  private readonly mdatOffset: number;
  private position: number;
  private readonly presentationTimes: number[] = [];
  private readonly sizes: number[] = [];
  private readonly stream: WriteStream;
  private readonly syncSamples: number[] = [];

  public readonly height: number;
  public readonly path: string;
  public readonly timescale: number;
  public readonly width: number;

  private constructor(path: string, stream: WriteStream, options: Mp4WriterOptions) {

    this.height = options.height;
    this.path = path;
    this.stream = stream;
    this.timescale = options.timescale ?? 90000;
    this.width = options.width;

    this.stream.on("error", (error) => {

      this.failure ??= error;
      LOG.debug("recorder:writer", "Write error on %s: %s.", this.path, error.message);
    });

    // ftyp, then the mdat header in 64-bit form with a zero size for now.
    const mdatHeader = Buffer.alloc(EXTENDED_BOX_HEADER_SIZE);

    mdatHeader.writeUInt32BE(1, 0);
    mdatHeader.write("mdat", 4, 4, "latin1");

    this.stream.write(FTYP);
    this.stream.write(mdatHeader);

    this.mdatOffset = FTYP.length;
    this.position = FTYP.length + EXTENDED_BOX_HEADER_SIZE;
  }

  /**
   * Creates a file and writes its header.
   * @param path - The file to create. An existing file is truncated.
   * @param options - Writer options.
   * @returns The writer, once the file is open.
   * @throws If the file cannot be opened.
   */
  public static async create(path: string, options: Mp4WriterOptions): Promise<Mp4Writer> {

    const stream = createWriteStream(path, { highWaterMark: WRITE_HIGH_WATER_MARK });

    await once(stream, "open");

    return new Mp4Writer(path, stream, options);
  }

  /**
   * Registers a sample entry (an avc1 box). Identical entries share an index.
   * @param entry - The complete sample entry box.
   * @returns The 1-based entry index.
   */
  public addSampleEntry(entry: Buffer): number {

    const existing = this.entries.findIndex((candidate) => candidate.equals(entry));

    if(existing !== -1) {

      return existing + 1;
    }

    this.entries.push(Buffer.from(entry));

    return this.entries.length;
  }

  /**
   * @returns True when the writer can take another sample without growing its write buffer past the stream's high-water mark.
   */
  public get isReady(): boolean {

    return !this.failure && !this.finalized && !this.stream.writableNeedDrain;
  }

  /**
   * @returns The number of samples appended so far.
   */
  public get sampleCount(): number {

    return this.sizes.length;
  }

  /**
   * @returns The first write error, if any.
   */
  public get error(): Nullable<Error> {

    return this.failure;
  }

  /**
   * Appends a sample if the writer is ready.
   * @param sample - The sample.
   * @returns True if the sample was written, false if the writer was not ready.
   * @throws If a previous write failed, the writer is finalized, or the entry index is unknown.
   */
  public append(sample: Mp4Sample): boolean {

    this.assertWritable();

    if(this.stream.writableNeedDrain) {

      return false;
    }

    if((sample.entryIndex < 1) || (sample.entryIndex > this.entries.length)) {

      throw new RangeError("Unknown sample entry index " + String(sample.entryIndex) + ".");
    }

    this.stream.write(sample.data);

    this.chunkOffsets.push(this.position);
    this.entryIndices.push(sample.entryIndex);
    this.presentationTimes.push(sample.pts);
    this.sizes.push(sample.data.length);

    if(sample.keyframe) {

      this.syncSamples.push(this.sizes.length);
    }

    this.lastDuration = sample.duration;
    this.position += sample.data.length;

    return true;
  }

  /**
   * Appends a sample, waiting for the write buffer to drain first if needed.
   * @param sample - The sample.
   */
  public async appendWhenReady(sample: Mp4Sample): Promise<void> {

    while(!this.append(sample)) {

      // once() rejects if the stream emits an error while we wait.
      await once(this.stream, "drain");
    }
  }

  /**
   * Writes the moov box, closes the file and patches the mdat size.
   * @returns The finalized file's summary.
   * @throws If any write failed.
   */
  public async finalize(): Promise<Mp4FinalizeResult> {

    this.assertWritable();

    const durations = this.sampleDurations();
    const duration = durations.reduce((sum, value) => sum + value, 0);
    const moov = this.buildMoov(durations, duration);
    const mdatSize = this.position - this.mdatOffset;

    this.finalized = true;
    this.stream.end(moov);

    await finished(this.stream);

    if(this.failure) {

      throw this.failure;
    }

    const handle = await open(this.path, "r+");

    try {

      const sizeField = Buffer.alloc(8);

      sizeField.writeBigUInt64BE(BigInt(mdatSize), 0);

      await handle.write(sizeField, 0, 8, this.mdatOffset + BOX_HEADER_SIZE);
    } finally {

      await handle.close();
    }

    return { duration, fileSize: this.position + moov.length, sampleCount: this.sizes.length };
  }

  /**
   * Abandons the file and deletes it.
   */
  public async abort(): Promise<void> {

    this.finalized = true;

    if(!this.stream.destroyed) {

      this.stream.destroy();
      await once(this.stream, "close");
    }

    await rm(this.path, { force: true });
  }

  private assertWritable(): void {

    if(this.failure) {

      throw this.failure;
    }

    if(this.finalized) {

      throw new Error("The writer for " + this.path + " is already closed.");
    }
  }

  /**
   * Computes stored durations: the delta to the next presentation time, at least one tick, and the declared duration for the last sample.
   * @returns One duration per sample.
   */
  private sampleDurations(): number[] {

    const count = this.presentationTimes.length;
    const durations: number[] = [];

    for(let i = 0; i < count; i++) {

      const next = (i + 1 < count) ? (this.presentationTimes[i + 1] - this.presentationTimes[i]) : this.lastDuration;

      durations.push(Math.max(1, next));
    }

    return durations;
  }

  private buildMoov(durations: number[], duration: number): Buffer {

    const now = Math.floor(Date.now() / 1000) + MP4_EPOCH_OFFSET;
    const wide = duration > UINT32_MAX;
    const version = wide ? 1 : 0;
    const time = (value: number): Buffer => wide ? u64(value) : u32(value);

    const mvhd = fullBox("mvhd", version, 0,
      time(now), time(now), u32(this.timescale), time(duration),
      u32(0x00010000), u16(0x0100), Buffer.alloc(10),
      unityMatrix(), Buffer.alloc(24), u32(2));

    const tkhd = fullBox("tkhd", version, 0x000003,
      time(now), time(now), u32(1), u32(0), time(duration),
      Buffer.alloc(8), u16(0), u16(0), u16(0), u16(0),
      unityMatrix(), u32(this.width * 0x10000), u32(this.height * 0x10000));

    const mdhd = fullBox("mdhd", version, 0,
      time(now), time(now), u32(this.timescale), time(duration), u16(LANGUAGE_UNDETERMINED), u16(0));

    const hdlr = fullBox("hdlr", 0, 0, u32(0), Buffer.from("vide", "latin1"), Buffer.alloc(12), Buffer.from("VideoHandler\0", "latin1"));
    const vmhd = fullBox("vmhd", 0, 1, Buffer.alloc(8));
    const dinf = box("dinf", fullBox("dref", 0, 0, u32(1), fullBox("url ", 0, 1)));

    return box("moov", mvhd, box("trak", tkhd, box("mdia", mdhd, hdlr, box("minf", vmhd, dinf, this.buildStbl(durations)))));
  }

  private buildStbl(durations: number[]): Buffer {

    const count = this.sizes.length;

    // stts: run-length encoded durations.
    const timeToSample: number[] = [];

    for(let i = 0; i < count;) {

      let run = 1;

      while(((i + run) < count) && (durations[i + run] === durations[i])) {

        run++;
      }

      timeToSample.push(run, durations[i]);
      i += run;
    }

    // stsc: one sample per chunk, with a new entry whenever the sample description changes.
    const sampleToChunk: number[] = [];

    for(let i = 0; i < count; i++) {

      if((i === 0) || (this.entryIndices[i] !== this.entryIndices[i - 1])) {

        sampleToChunk.push(i + 1, 1, this.entryIndices[i]);
      }
    }

    const lastOffset = (count > 0) ? this.chunkOffsets[count - 1] : 0;
    const chunkOffsets = (lastOffset > UINT32_MAX) ? fullBox("co64", 0, 0, u32(count), packTable(this.chunkOffsets, 8)) :
      fullBox("stco", 0, 0, u32(count), packTable(this.chunkOffsets, 4));

    return box("stbl",
      fullBox("stsd", 0, 0, u32(this.entries.length), ...this.entries),
      fullBox("stts", 0, 0, u32(timeToSample.length / 2), packTable(timeToSample, 4)),
      fullBox("stss", 0, 0, u32(this.syncSamples.length), packTable(this.syncSamples, 4)),
      fullBox("stsz", 0, 0, u32(0), u32(count), packTable(this.sizes, 4)),
      fullBox("stsc", 0, 0, u32(sampleToChunk.length / 3), packTable(sampleToChunk, 4)),
      chunkOffsets);
  }
}
