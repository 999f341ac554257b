/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * naming.ts: Recording directory and file naming.
 */
import { access, readdir } from "node:fs/promises";
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import { isNotFoundError } from "../utils/errors.js";
import { join } from "node:path";

/* Recordings are laid out as:
 *
 *   <root>/<yyyy-mm-dd>/<SessionName>/<SourceName>/
 *     <SourceName>_segment_<yyyy-mm-dd_HH-MM-ss>.mp4       finished segments, waiting for consolidation
 *     <SourceName>_CONSOLIDATED.mp4                         the merged recording
 *     <SourceName>_TEMP_CONSOLIDATED.mp4                    only while a consolidation is writing
 *     .work/                                                segments still being written
 *
 * Segment timestamps have one-second resolution. When a name is already taken, a two-digit sequence suffix (_01, _02, ...) is added, so names still sort
 * chronologically by timestamp and then by sequence.
 */

// Constants.

// Hidden subdirectory that holds segments while they are being written.
export const WORK_DIRECTORY = ".work";

const SEGMENT_TIMESTAMP_MASK = "yyyy-mm-dd_HH-MM-ss";
const SESSION_PATTERN = /^Session(\d+)$/;

// Types.

/**
 * Sort key of a segment file.
 */
export interface SegmentName {

  // The file name.
  fileName: string;

  // Collision sequence; 0 when the name has no suffix.
  sequence: number;

  // The embedded timestamp, yyyy-mm-dd_HH-MM-ss.
  timestamp: string;
}

// Helpers.

function escapeRegExp(text: string): string {

  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Makes a display name safe to use as a directory name or file name prefix.
 * @param name - A source or session name.
 * @returns The name with path separators and reserved characters replaced by underscores.
 */
export function sanitizePathComponent(name: string): string {

  const cleaned = name.replace(/[\/\\:*?"<>|\x00-\x1F]/g, "_").trim();

  return ((cleaned === "") || (cleaned === ".") || (cleaned === "..")) ? "Source" : cleaned;
}

/**
 * @param date - The session start time.
 * @returns The date directory name, yyyy-mm-dd in local time.
 */
export function dateDirectoryName(date: Date): string {

  return df(date, "yyyy-mm-dd");
}

export function consolidatedFileName(source: string): string {

  return source + "_CONSOLIDATED.mp4";
}

export function tempConsolidatedFileName(source: string): string {

  return source + "_TEMP_CONSOLIDATED.mp4";
}

/**
 * Builds a segment file name.
 * @param source - The source name.
 * @param date - The segment's start time.
 * @param sequence - Collision sequence. 0 omits the suffix.
 * @returns The file name.
 */
export function segmentFileName(source: string, date: Date, sequence = 0): string {

  return [ source, "_segment_", df(date, SEGMENT_TIMESTAMP_MASK), (sequence > 0) ? "_" + String(sequence).padStart(2, "0") : "", ".mp4" ].join("");
}

/**
 * Parses a segment file name belonging to a source.
 * @param source - The source name.
 * @param fileName - The candidate file name.
 * @returns The sort key, or null if the name is not one of the source's segments.
 */
export function parseSegmentFileName(source: string, fileName: string): Nullable<SegmentName> {

  const match = new RegExp("^" + escapeRegExp(source) + "_segment_(\\d{4}-\\d{2}-\\d{2}_\\d{2}-\\d{2}-\\d{2})(?:_(\\d{2,}))?\\.mp4$").exec(fileName);

  if(!match) {

    return null;
  }

  return { fileName, sequence: match[2] ? Number(match[2]) : 0, timestamp: match[1] };
}

/**
 * Orders segment names chronologically: by timestamp, then by sequence.
 * @param a - First name.
 * @param b - Second name.
 * @returns A negative, zero, or positive number.
 */
export function compareSegmentNames(a: SegmentName, b: SegmentName): number {

  if(a.timestamp !== b.timestamp) {

    return (a.timestamp < b.timestamp) ? -1 : 1;
  }

  return a.sequence - b.sequence;
}

async function exists(path: string): Promise<boolean> {

  try {

    await access(path);

    return true;
  } catch(error) {

    if(isNotFoundError(error)) {

      return false;
    }

    throw error;
  }
}

/**
 * Picks a segment name that is free both in the source directory and in its work directory.
 * @param directory - The source directory.
 * @param source - The source name.
 * @param date - The segment's start time.
 * @returns The file name.
 */
export async function allocateSegmentName(directory: string, source: string, date: Date): Promise<string> {

  for(let sequence = 0; ; sequence++) {

    const name = segmentFileName(source, date, sequence);

    if(!(await exists(join(directory, name))) && !(await exists(join(directory, WORK_DIRECTORY, name)))) {

      return name;
    }
  }
}

/**
 * Finds the next free SessionNN name in a date directory: one past the highest existing number, starting at Session01.
 * @param dateDirectory - The <root>/<yyyy-mm-dd> directory. It need not exist.
 * @returns The session name.
 */
export async function nextSessionName(dateDirectory: string): Promise<string> {

  let highest = 0;

  try {

    for(const entry of await readdir(dateDirectory, { withFileTypes: true })) {

      const match = entry.isDirectory() ? SESSION_PATTERN.exec(entry.name) : null;

      if(match) {

        highest = Math.max(highest, Number(match[1]));
      }
    }
  } catch(error) {

    if(!isNotFoundError(error)) {

      throw error;
    }
  }

  return "Session" + String(highest + 1).padStart(2, "0");
}

/**
 * Resolves the session name: an explicit name, then the configured name, then the next SessionNN.
 * @param explicitName - Name passed to the start request, if any.
 * @param configuredName - recording.sessionName.
 * @param dateDirectory - The date directory to scan for SessionNN.
 * @returns The session name, made safe for use as a directory name.
 */
export async function resolveSessionName(explicitName: string | undefined, configuredName: string, dateDirectory: string): Promise<string> {

  const chosen = explicitName?.trim() || configuredName.trim();

  if(chosen) {

    return sanitizePathComponent(chosen);
  }

  return nextSessionName(dateDirectory);
}
