/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * reader.ts: MP4 sample table reader for consolidation.
 */
import { BOX_HEADER_SIZE, EXTENDED_BOX_HEADER_SIZE, childBoxes, findChildBox } from "./boxes.js";
import type { BoxLocation } from "./boxes.js";
import type { FileHandle } from "node:fs/promises";
import { Mp4FormatError } from "../utils/errors.js";
import type { Nullable } from "../types/index.js";
import { open } from "node:fs/promises";

/* Consolidation needs to know, for every sample of a file, where its bytes are, how long it lasts, whether it is a sync sample, and which sample description applies
 * to it. readMp4() answers that for the first video track of a progressive MP4 by walking the top-level boxes on disk, loading moov into memory, and expanding the
 * compact sample tables (stts, stss, stsz, stsc, stco/co64) into one record per sample. Sample data is not read.
 *
 * Any inconsistency between the tables (mismatched sample counts, chunk offsets outside the file, a sample description index with no entry) raises Mp4FormatError.
 */

// Types.

/**
 * Location and timing of one sample.
 */
export interface Mp4SampleInfo {

  // Duration in media timescale ticks.
  duration: number;

  // 1-based index into the track's sample entries.
  entryIndex: number;

  // File offset of the sample's first byte.
  offset: number;

  // Sample size in bytes.
  size: number;

  // True for sync samples.
  sync: boolean;
}

/**
 * The reader's view of a file's video track.
 */
export interface Mp4TrackInfo {

  // Sum of the sample durations, in ticks.
  duration: number;

  // File size in bytes.
  fileSize: number;

  // Picture height from the track header.
  height: number;

  // Duration recorded in mdhd, in ticks.
  mediaDuration: number;

  // Raw sample entry boxes (avc1 with avcC), in stsd order.
  sampleEntries: Buffer[];

  samples: Mp4SampleInfo[];

  // Media timescale in ticks per second.
  timescale: number;

  // Picture width from the track header.
  width: number;
}

/**
 * Bounds-checked cursor over one box's payload.
 */
class TableCursor {

  private readonly data: Buffer;
  private readonly file: string;
  private readonly location: BoxLocation;
  private position: number;

  constructor(data: Buffer, location: BoxLocation, file: string) {

    this.data = data;
    this.file = file;
    this.location = location;
    this.position = location.payloadOffset;
  }

  public skip(count: number): void {

    this.require(count);
    this.position += count;
  }

  public u8(): number {

    this.require(1);

    return this.data.readUInt8(this.position++);
  }

  public u32(): number {

    this.require(4);

    const value = this.data.readUInt32BE(this.position);

    this.position += 4;

    return value;
  }

  public u64(): number {

    this.require(8);

    const value = this.data.readBigUInt64BE(this.position);

    this.position += 8;

    if(value > BigInt(Number.MAX_SAFE_INTEGER)) {

      throw new Mp4FormatError(this.file, "64-bit value in " + this.location.type + " exceeds the safe integer range.");
    }

    return Number(value);
  }

  /**
   * Reads the FullBox version and skips the flags.
   * @returns The version.
   */
  public version(): number {

    const version = this.u8();

    this.skip(3);

    return version;
  }

  /**
   * Reads an entry count and checks that the box can hold that many entries of the given size.
   * @param entrySize - Bytes per entry.
   * @returns The entry count.
   */
  public entryCount(entrySize: number): number {

    const count = this.u32();

    this.require(count * entrySize);

    return count;
  }

  private require(count: number): void {

    if((this.position + count) > (this.location.offset + this.location.size)) {

      throw new Mp4FormatError(this.file, "Truncated " + this.location.type + " box.");
    }
  }
}

/**
 * Reads a box header directly from a file.
 * @param handle - The open file.
 * @param position - File offset of the header.
 * @param fileSize - The file size.
 * @returns The box location, or null if no complete, well-formed header starts at the position.
 */
async function readBoxHeader(handle: FileHandle, position: number, fileSize: number): Promise<Nullable<BoxLocation>> {

  if((position + BOX_HEADER_SIZE) > fileSize) {

    return null;
  }

  const header = Buffer.alloc(EXTENDED_BOX_HEADER_SIZE);
  const { bytesRead } = await handle.read(header, 0, Math.min(EXTENDED_BOX_HEADER_SIZE, fileSize - position), position);

  if(bytesRead < BOX_HEADER_SIZE) {

    return null;
  }

  const sizeField = header.readUInt32BE(0);
  const type = header.toString("latin1", 4, 8);

  let size = sizeField;
  let headerSize = BOX_HEADER_SIZE;

  if(sizeField === 1) {

    if(bytesRead < EXTENDED_BOX_HEADER_SIZE) {

      return null;
    }

    const extended = header.readBigUInt64BE(8);

    if(extended > BigInt(Number.MAX_SAFE_INTEGER)) {

      return null;
    }

    size = Number(extended);
    headerSize = EXTENDED_BOX_HEADER_SIZE;
  } else if(sizeField === 0) {

    size = fileSize - position;
  }

  if((size < headerSize) || ((position + size) > fileSize)) {

    return null;
  }

  return { offset: position, payloadOffset: position + headerSize, size, type };
}

/**
 * Finds the moov box among a file's top-level boxes and loads it.
 * @param handle - The open file.
 * @param fileSize - The file size.
 * @param file - The path, for errors.
 * @returns The moov box bytes, starting with its header, and the box's location within those bytes.
 */
async function loadMoov(handle: FileHandle, fileSize: number, file: string): Promise<{ data: Buffer; root: BoxLocation }> {

  let position = 0;

  for(;;) {

    // Each header read depends on the size in the previous one.
    const location = await readBoxHeader(handle, position, fileSize);

    if(!location) {

      throw new Mp4FormatError(file, "No moov box found.");
    }

    if(location.type === "moov") {

      const moov = Buffer.alloc(location.size);

      const { bytesRead } = await handle.read(moov, 0, location.size, location.offset);

      if(bytesRead !== location.size) {

        throw new Mp4FormatError(file, "Truncated moov box.");
      }

      return { data: moov, root: { offset: 0, payloadOffset: location.payloadOffset - location.offset, size: location.size, type: "moov" } };
    }

    position += location.size;
  }
}

/**
 * Finds a required child box.
 * @param data - The buffer holding the parent.
 * @param parent - The parent's location.
 * @param type - The child type.
 * @param file - The path, for errors.
 * @returns The child's location.
 */
function requireChild(data: Buffer, parent: BoxLocation, type: string, file: string): BoxLocation {

  const child = findChildBox(data, parent, type);

  if(!child) {

    throw new Mp4FormatError(file, "Missing " + type + " box inside " + parent.type + ".");
  }

  return child;
}

/**
 * Finds the first trak whose handler is 'vide'.
 * @param moov - The moov bytes.
 * @param root - The moov box's location within those bytes.
 * @param file - The path, for errors.
 * @returns The trak's location.
 */
function findVideoTrack(moov: Buffer, root: BoxLocation, file: string): BoxLocation {

  for(const trak of childBoxes(moov, root).filter((child) => child.type === "trak")) {

    const mdia = findChildBox(moov, trak, "mdia");
    const hdlr = mdia ? findChildBox(moov, mdia, "hdlr") : null;

    // hdlr: version and flags (4), pre_defined (4), handler_type (4).
    if(hdlr && ((hdlr.payloadOffset + 12) <= (hdlr.offset + hdlr.size)) && (moov.toString("latin1", hdlr.payloadOffset + 8, hdlr.payloadOffset + 12) === "vide")) {

      return trak;
    }
  }

  throw new Mp4FormatError(file, "No video track found.");
}

/**
 * Reads the sample tables of a file's first video track.
 * @param path - The MP4 file.
 * @returns The track information.
 * @throws Mp4FormatError if the file is not a readable MP4 with a video track. Filesystem errors propagate unchanged.
 */
export async function readMp4(path: string): Promise<Mp4TrackInfo> {

  const handle = await open(path, "r");

  try {

    const { size: fileSize } = await handle.stat();
    const { data, root } = await loadMoov(handle, fileSize, path);

    return parseVideoTrack(data, root, fileSize, path);
  } finally {

    await handle.close();
  }
}

/**
 * Expands a video track's sample tables.
 * @param moov - The moov bytes.
 * @param root - The moov box's location within those bytes.
 * @param fileSize - The file size, for offset validation.
 * @param file - The path, for errors.
 * @returns The track information.
 */
function parseVideoTrack(moov: Buffer, root: BoxLocation, fileSize: number, file: string): Mp4TrackInfo {

  const trak = findVideoTrack(moov, root, file);
  const tkhd = requireChild(moov, trak, "tkhd", file);
  const mdia = requireChild(moov, trak, "mdia", file);
  const mdhd = requireChild(moov, mdia, "mdhd", file);
  const minf = requireChild(moov, mdia, "minf", file);
  const stbl = requireChild(moov, minf, "stbl", file);

  // tkhd ends with width and height as 16.16 fixed point.
  const tkhdEnd = tkhd.offset + tkhd.size;

  if((tkhdEnd - 8) < tkhd.payloadOffset) {

    throw new Mp4FormatError(file, "Truncated tkhd box.");
  }

  const width = Math.floor(moov.readUInt32BE(tkhdEnd - 8) / 0x10000);
  const height = Math.floor(moov.readUInt32BE(tkhdEnd - 4) / 0x10000);

  // mdhd: the timescale follows two 32-bit or two 64-bit timestamps.
  const mdhdCursor = new TableCursor(moov, mdhd, file);
  const mdhdVersion = mdhdCursor.version();

  mdhdCursor.skip((mdhdVersion === 1) ? 16 : 8);

  const timescale = mdhdCursor.u32();
  const mediaDuration = (mdhdVersion === 1) ? mdhdCursor.u64() : mdhdCursor.u32();

  if(timescale === 0) {

    throw new Mp4FormatError(file, "Zero media timescale.");
  }

  // stsd: keep each entry box verbatim.
  const stsd = requireChild(moov, stbl, "stsd", file);
  const sampleEntries = childBoxes(moov, stsd, 8).map((entry) => Buffer.from(moov.subarray(entry.offset, entry.offset + entry.size)));

  if(sampleEntries.length === 0) {

    throw new Mp4FormatError(file, "No sample entries.");
  }

  // stsz.
  const stszCursor = new TableCursor(moov, requireChild(moov, stbl, "stsz", file), file);

  stszCursor.version();

  const uniformSize = stszCursor.u32();
  const sampleCount = stszCursor.u32();
  const sizes: number[] = [];

  if((uniformSize !== 0) && (sampleCount > fileSize)) {

    throw new Mp4FormatError(file, "Implausible sample count in stsz.");
  }

  for(let i = 0; i < sampleCount; i++) {

    sizes.push((uniformSize === 0) ? stszCursor.u32() : uniformSize);
  }

  // stts.
  const sttsCursor = new TableCursor(moov, requireChild(moov, stbl, "stts", file), file);

  sttsCursor.version();

  const durations: number[] = [];
  const sttsEntries = sttsCursor.entryCount(8);

  for(let i = 0; i < sttsEntries; i++) {

    const count = sttsCursor.u32();
    const delta = sttsCursor.u32();

    if((durations.length + count) > sampleCount) {

      throw new Mp4FormatError(file, "stts describes more samples than stsz.");
    }

    for(let j = 0; j < count; j++) {

      durations.push(delta);
    }
  }

  if(durations.length !== sampleCount) {

    throw new Mp4FormatError(file, "stts describes " + String(durations.length) + " samples, stsz " + String(sampleCount) + ".");
  }

  // stss. Without one, every sample is a sync sample.
  const stss = findChildBox(moov, stbl, "stss");
  let syncSamples: Nullable<Set<number>> = null;

  if(stss) {

    const stssCursor = new TableCursor(moov, stss, file);

    stssCursor.version();

    const count = stssCursor.entryCount(4);

    syncSamples = new Set<number>();

    for(let i = 0; i < count; i++) {

      syncSamples.add(stssCursor.u32());
    }
  }

  // stco or co64.
  const stco = findChildBox(moov, stbl, "stco");
  const co64 = stco ? null : findChildBox(moov, stbl, "co64");
  const offsetBox = stco ?? co64;

  if(!offsetBox) {

    throw new Mp4FormatError(file, "Missing chunk offset box.");
  }

  const offsetCursor = new TableCursor(moov, offsetBox, file);

  offsetCursor.version();

  const wideOffsets = offsetBox.type === "co64";
  const chunkCount = offsetCursor.entryCount(wideOffsets ? 8 : 4);
  const chunkOffsets: number[] = [];

  for(let i = 0; i < chunkCount; i++) {

    chunkOffsets.push(wideOffsets ? offsetCursor.u64() : offsetCursor.u32());
  }

  // stsc.
  const stscCursor = new TableCursor(moov, requireChild(moov, stbl, "stsc", file), file);

  stscCursor.version();

  const stscCount = stscCursor.entryCount(12);
  const stscEntries: { descriptionIndex: number; firstChunk: number; samplesPerChunk: number }[] = [];

  for(let i = 0; i < stscCount; i++) {

    stscEntries.push({ firstChunk: stscCursor.u32(), samplesPerChunk: stscCursor.u32(), descriptionIndex: stscCursor.u32() });
  }

  // Expand chunks into samples.
  const samples: Mp4SampleInfo[] = [];

  for(let e = 0; e < stscEntries.length; e++) {

    const entry = stscEntries[e];
    const lastChunk = (e + 1 < stscEntries.length) ? (stscEntries[e + 1].firstChunk - 1) : chunkCount;

    if((entry.firstChunk < 1) || (lastChunk > chunkCount) || ((entry.descriptionIndex < 1) || (entry.descriptionIndex > sampleEntries.length))) {

      throw new Mp4FormatError(file, "Invalid stsc entry " + String(e + 1) + ".");
    }

    for(let chunk = entry.firstChunk; chunk <= lastChunk; chunk++) {

      let offset = chunkOffsets[chunk - 1];

      for(let s = 0; s < entry.samplesPerChunk; s++) {

        const index = samples.length;

        if(index >= sampleCount) {

          throw new Mp4FormatError(file, "stsc describes more samples than stsz.");
        }

        const size = sizes[index];

        if((offset + size) > fileSize) {

          throw new Mp4FormatError(file, "Sample " + String(index + 1) + " lies outside the file.");
        }

        samples.push({ duration: durations[index], entryIndex: entry.descriptionIndex, offset, size, sync: syncSamples ? syncSamples.has(index + 1) : true });
        offset += size;
      }
    }
  }

  if(samples.length !== sampleCount) {

    throw new Mp4FormatError(file, "stsc describes " + String(samples.length) + " samples, stsz " + String(sampleCount) + ".");
  }

  return {

    duration: durations.reduce((sum, value) => sum + value, 0),
    fileSize,
    height,
    mediaDuration,
    sampleEntries,
    samples,
    timescale,
    width
  };
}
