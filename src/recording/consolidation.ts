/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * consolidation.ts: Rolling consolidation of segment files into one MP4 per source.
 */
import { InvariantError, Mp4FormatError, formatError, formatMediaDuration, isNotFoundError } from "../utils/index.js";
import { WORK_DIRECTORY, compareSegmentNames, consolidatedFileName, parseSegmentFileName, tempConsolidatedFileName } from "./naming.js";
import { open, readdir, rename, rm, stat } from "node:fs/promises";
import { LOG } from "../utils/logger.js";
import { Mp4Writer } from "../mp4/writer.js";
import type { Mp4SampleInfo, Mp4TrackInfo } from "../mp4/reader.js";
import type { Nullable } from "../types/index.js";
import type { SegmentName } from "./naming.js";
import { join } from "node:path";
import { readMp4 } from "../mp4/reader.js";

/* A consolidation pass folds every finished segment of a source into <Source>_CONSOLIDATED.mp4:
 *
 * 1. List the segments, oldest first.
 * 2. Settle a temp file left behind by an interrupted pass. Beside a consolidated file it is stale and is deleted. Without one, a readable temp file is the only
 *    copy of the earlier recording: it becomes the consolidated file, and the leading segments it already ends with are deleted.
 * 3. With no segments left there is nothing to do, and nothing is written.
 * 4. Read the consolidated file (if any) and the segments in order, stopping at the first unreadable segment. That segment and every later one wait on disk for a
 *    later pass, so content is never merged ahead of anything recorded before it. An unreadable consolidated file fails the pass.
 * 5. Copy every member's samples, in order, into <Source>_TEMP_CONSOLIDATED.mp4. Member timelines are laid end to end and each sample keeps its duration.
 * 6. Rename the temp file over the old consolidated file, then delete the merged segments.
 *
 * The rename replaces the old consolidated file in one step. A failure before it removes the temp file and leaves every source file untouched, so the next pass starts
 * from the same state. The consolidated file is never modified in place.
 */

// Types.

/**
 * Outcome of one consolidation pass.
 */
export interface ConsolidationResult {

  // Duration of the new consolidated file in ticks, or 0 when nothing was merged.
  duration: number;

  // Number of segments merged and deleted.
  merged: number;

  // The segment the pass stopped at because it could not be read. It and every later segment stay on disk.
  skipped: string[];
}

interface MergeMember {

  fileName: string;
  track: Mp4TrackInfo;
}

interface SegmentPrefix {

  // Readable segments, oldest first, up to the first unreadable one.
  members: MergeMember[];

  unreadable: Nullable<{ error: Mp4FormatError; fileName: string }>;
}

// Constants.

const TIMESCALE = 90000;

// Upper bound on one coalesced read from a member file.
const READ_RUN_LIMIT = 4 * 1024 * 1024;

/**
 * Lists a source's finished segments in chronological order.
 * @param directory - The source directory.
 * @param source - The source name.
 * @returns The segment names, oldest first.
 * @throws InvariantError if the directory is missing or two segments share a sort key.
 */
export async function listSegments(directory: string, source: string): Promise<SegmentName[]> {

  let entries: string[];

  try {

    entries = await readdir(directory);
  } catch(error) {

    if(isNotFoundError(error)) {

      throw new InvariantError("Recording directory " + directory + " does not exist.");
    }

    throw error;
  }

  // The consolidated and temp names never match the segment pattern, and readdir does not descend into the work directory.
  const segments = entries.filter((entry) => entry !== WORK_DIRECTORY).map((entry) => parseSegmentFileName(source, entry))
    .filter((name): name is SegmentName => name !== null).sort(compareSegmentNames);

  for(let i = 1; i < segments.length; i++) {

    if(compareSegmentNames(segments[i - 1], segments[i]) === 0) {

      throw new InvariantError("Segments " + segments[i - 1].fileName + " and " + segments[i].fileName + " have the same sort key.");
    }
  }

  return segments;
}

/**
 * Converts a member's sample duration to output ticks.
 * @param duration - The duration in the member's ticks.
 * @param timescale - The member's timescale.
 * @returns The duration at the output timescale, never less than one tick.
 */
function outputTicks(duration: number, timescale: number): number {

  return (timescale === TIMESCALE) ? duration : Math.max(1, Math.round((duration * TIMESCALE) / timescale));
}

/**
 * Groups consecutive samples that sit back to back in the file into runs that can be read with one call.
 * @param samples - The member's samples.
 * @returns Runs of sample indices, [start, end).
 */
function readRuns(samples: readonly Mp4SampleInfo[]): [number, number][] {

  const runs: [number, number][] = [];
  let start = 0;

  for(let i = 1; i <= samples.length; i++) {

    const runBytes = (i < samples.length) ? (samples[i].offset + samples[i].size - samples[start].offset) : 0;
    const contiguous = (i < samples.length) && (samples[i].offset === (samples[i - 1].offset + samples[i - 1].size));

    if(!contiguous || (runBytes > READ_RUN_LIMIT)) {

      if(i > start) {

        runs.push([ start, i ]);
      }

      start = i;
    }
  }

  return runs;
}

/**
 * Copies one member's samples into the writer.
 * @param writer - The output writer.
 * @param directory - The source directory.
 * @param member - The member to copy.
 * @param base - Presentation time of the member's first sample in the output.
 * @returns The presentation time just past the member's last sample.
 */
async function copyMember(writer: Mp4Writer, directory: string, member: MergeMember, base: number): Promise<number> {

  const { samples, sampleEntries, timescale } = member.track;
  const entryMap = sampleEntries.map((entry) => writer.addSampleEntry(entry));
  const handle = await open(join(directory, member.fileName), "r");
  let pts = base;

  try {

    for(const [ start, end ] of readRuns(samples)) {

      const first = samples[start];
      const last = samples[end - 1];
      const length = last.offset + last.size - first.offset;
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, first.offset);

      if(bytesRead < length) {

        throw new Mp4FormatError(member.fileName, "Sample data runs past the end of the file.");
      }

      for(let i = start; i < end; i++) {

        const sample = samples[i];
        const duration = outputTicks(sample.duration, timescale);
        const entryIndex = entryMap[sample.entryIndex - 1];

        if(entryIndex === undefined) {

          throw new Mp4FormatError(member.fileName, "Sample references missing sample entry " + String(sample.entryIndex) + ".");
        }

        await writer.appendWhenReady({

          data: buffer.subarray(sample.offset - first.offset, sample.offset - first.offset + sample.size),
          duration,
          entryIndex,
          keyframe: sample.sync,
          pts
        });

        pts += duration;
      }
    }
  } finally {

    await handle.close();
  }

  return pts;
}

/**
 * Removes a file, treating a missing file as already removed.
 * @param path - The file.
 */
async function removeIfPresent(path: string): Promise<void> {

  await rm(path, { force: true });
}

/**
 * Checks whether a file exists.
 * @param path - The file.
 * @returns True when it does.
 */
async function isPresent(path: string): Promise<boolean> {

  try {

    await stat(path);

    return true;
  } catch(error) {

    if(isNotFoundError(error)) {

      return false;
    }

    throw error;
  }
}

/**
 * Reads one sample's bytes.
 * @param path - The file.
 * @param sample - The sample.
 * @returns The sample data.
 */
async function readSample(path: string, sample: Mp4SampleInfo): Promise<Buffer> {

  const handle = await open(path, "r");

  try {

    const buffer = Buffer.alloc(sample.size);

    await handle.read(buffer, 0, sample.size, sample.offset);

    return buffer;
  } finally {

    await handle.close();
  }
}

/**
 * Reads segments in order until the first one that is not a valid MP4.
 * @param directory - The source directory.
 * @param segments - The segments, oldest first.
 * @returns The readable prefix and the segment it stopped at.
 */
async function readSegmentPrefix(directory: string, segments: readonly SegmentName[]): Promise<SegmentPrefix> {

  const members: MergeMember[] = [];

  for(const segment of segments) {

    try {

      members.push({ fileName: segment.fileName, track: await readMp4(join(directory, segment.fileName)) });
    } catch(error) {

      if(!(error instanceof Mp4FormatError)) {

        throw error;
      }

      return { members, unreadable: { error, fileName: segment.fileName } };
    }
  }

  return { members, unreadable: null };
}

/**
 * Checks whether a file's last samples are exactly the samples of the given members, in order. Sizes, durations and sync flags must line up, and every keyframe's
 * bytes must match.
 * @param directory - The source directory.
 * @param file - The file whose tail is checked.
 * @param members - The members it may end with.
 * @returns True when the file ends with the members.
 */
async function endsWithMembers(directory: string, file: MergeMember, members: readonly MergeMember[]): Promise<boolean> {

  const tail = members.flatMap((member) => member.track.samples.map((sample) => ({ member, sample })));
  const start = file.track.samples.length - tail.length;

  if(start < 0) {

    return false;
  }

  const aligned = tail.every(({ member, sample }, i) => {

    const held = file.track.samples[start + i];

    return (held.size === sample.size) && (held.sync === sample.sync) && (held.duration === outputTicks(sample.duration, member.track.timescale));
  });

  if(!aligned) {

    return false;
  }

  for(const [ i, { member, sample } ] of tail.entries()) {

    if(!sample.sync) {

      continue;
    }

    const [ held, original ] = await Promise.all([ readSample(join(directory, file.fileName), file.track.samples[start + i]),
      readSample(join(directory, member.fileName), sample) ]);

    if(!held.equals(original)) {

      return false;
    }
  }

  return true;
}

/**
 * Deletes merged segments. A segment that cannot be deleted is logged and left for the next pass.
 * @param directory - The source directory.
 * @param fileNames - The segments.
 * @param source - The source name.
 */
async function removeSegments(directory: string, fileNames: readonly string[], source: string): Promise<void> {

  for(const fileName of fileNames) {

    try {

      await rm(join(directory, fileName));
    } catch(error) {

      LOG.withSource(source).error("Unable to delete merged segment %s: %s.", fileName, formatError(error));
    }
  }
}

/**
 * Settles a temp file left behind by an interrupted pass.
 * @param directory - The source directory.
 * @param source - The source name.
 * @param segments - The segments, oldest first.
 * @returns The segments still to merge.
 */
async function settleTempFile(directory: string, source: string, segments: SegmentName[]): Promise<SegmentName[]> {

  const log = LOG.withSource(source);
  const tempName = tempConsolidatedFileName(source);
  const tempPath = join(directory, tempName);

  if(await isPresent(join(directory, consolidatedFileName(source)))) {

    await removeIfPresent(tempPath);

    return segments;
  }

  let temp: MergeMember;

  try {

    temp = { fileName: tempName, track: await readMp4(tempPath) };
  } catch(error) {

    if(isNotFoundError(error)) {

      return segments;
    }

    if(!(error instanceof Mp4FormatError)) {

      throw error;
    }

    log.warn("Discarding unreadable %s: %s.", tempName, formatError(error));

    await removeIfPresent(tempPath);

    return segments;
  }

  // A pass deletes its segments only after the rename, so any segments the temp file holds are still the oldest on disk.
  const { members } = await readSegmentPrefix(directory, segments);
  let held = members.length;

  while((held > 0) && !(await endsWithMembers(directory, temp, members.slice(0, held)))) {

    held--;
  }

  await rename(tempPath, join(directory, consolidatedFileName(source)));

  log.warn("Recovered %s from an interrupted pass. It already held %d segment%s.", consolidatedFileName(source), held, (held === 1) ? "" : "s");

  await removeSegments(directory, segments.slice(0, held).map((segment) => segment.fileName), source);

  return segments.slice(held);
}

/**
 * Runs one consolidation pass for a source directory.
 * @param directory - The source directory.
 * @param source - The source name.
 * @returns What was merged and skipped.
 * @throws If the pass fails. Source files are untouched unless the failure happens after the rename.
 */
export async function consolidate(directory: string, source: string): Promise<ConsolidationResult> {

  const log = LOG.withSource(source);
  const consolidatedPath = join(directory, consolidatedFileName(source));
  const tempPath = join(directory, tempConsolidatedFileName(source));

  const segments = await settleTempFile(directory, source, await listSegments(directory, source));

  if(segments.length === 0) {

    return { duration: 0, merged: 0, skipped: [] };
  }

  const members: MergeMember[] = [];

  try {

    members.push({ fileName: consolidatedFileName(source), track: await readMp4(consolidatedPath) });
  } catch(error) {

    if(!isNotFoundError(error)) {

      throw error;
    }
  }

  const hasConsolidated = members.length > 0;

  const prefix = await readSegmentPrefix(directory, segments);
  const skipped: string[] = [];

  if(prefix.unreadable) {

    skipped.push(prefix.unreadable.fileName);
    log.warn("Stopping at unreadable segment %s: %s. It and %d later segment(s) stay on disk.", prefix.unreadable.fileName, formatError(prefix.unreadable.error),
      segments.length - prefix.members.length - 1);
  }

  members.push(...prefix.members);

  const merged = members.slice(hasConsolidated ? 1 : 0);

  if(merged.length === 0) {

    return { duration: 0, merged: 0, skipped };
  }

  const writer = await Mp4Writer.create(tempPath, { height: members[0].track.height, timescale: TIMESCALE, width: members[0].track.width });
  let duration: number;

  try {

    let pts = 0;

    for(const member of members) {

      pts = await copyMember(writer, directory, member, pts);
    }

    duration = (await writer.finalize()).duration;
  } catch(error) {

    await writer.abort();

    throw error;
  }

  // A failed rename leaves the old consolidated file in place, so only the temp file goes.
  try {

    await rename(tempPath, consolidatedPath);
  } catch(error) {

    await removeIfPresent(tempPath);

    throw error;
  }

  await removeSegments(directory, merged.map((member) => member.fileName), source);

  log.info("Consolidated %d segment%s; %s is now %s.", merged.length, (merged.length === 1) ? "" : "s", consolidatedFileName(source),
    formatMediaDuration(duration, TIMESCALE));

  return { duration, merged: merged.length, skipped };
}

/**
 * Serializes consolidation passes per directory. A timer-driven pass is skipped while another pass for the same directory is running. An explicit pass waits for the
 * running one and then runs.
 */
export class ConsolidationScheduler {

  private readonly inFlight = new Map<string, Promise<ConsolidationResult>>();

  /**
   * @param directory - The source directory.
   * @returns True while a pass for the directory is running or queued.
   */
  public isRunning(directory: string): boolean {

    return this.inFlight.has(directory);
  }

  /**
   * Starts a pass unless one is already running for the directory.
   * @param directory - The source directory.
   * @param source - The source name.
   * @returns The pass's result, or null when it was skipped.
   */
  public async runIfIdle(directory: string, source: string): Promise<Nullable<ConsolidationResult>> {

    if(this.inFlight.has(directory)) {

      LOG.withSource(source).debug("consolidation", "Pass already running for %s; skipping.", directory);

      return null;
    }

    return this.run(directory, source);
  }

  /**
   * Runs a pass after any pass already running for the directory.
   * @param directory - The source directory.
   * @param source - The source name.
   * @returns The pass's result.
   */
  public run(directory: string, source: string): Promise<ConsolidationResult> {

    const previous = this.inFlight.get(directory);
    const next = (previous ? previous.then(() => undefined, () => undefined) : Promise.resolve()).then(() => consolidate(directory, source));
    const tracked = next.finally(() => {

      if(this.inFlight.get(directory) === tracked) {

        this.inFlight.delete(directory);
      }
    });

    this.inFlight.set(directory, tracked);

    return tracked;
  }

  /**
   * Resolves once every pass started so far has settled.
   */
  public async drain(): Promise<void> {

    await Promise.allSettled([...this.inFlight.values()]);
  }
}
