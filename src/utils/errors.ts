/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error types and formatting utilities for NalVault.
 */

/* Errors in NalVault fall into a small taxonomy. Transient I/O failures and malformed input are handled locally by whoever encounters them: the frame or the cycle is
 * dropped and the next trigger starts over. Two conditions get their own classes because callers need to tell them apart from ordinary I/O failures:
 *
 * - Mp4FormatError: a container on disk could not be parsed. Consolidation skips unreadable segments but aborts when the consolidated file itself is unreadable.
 * - InvariantError: the recording directory is in a state that should be impossible (duplicate segment sort keys, a directory vanishing mid-cycle). The cycle is
 *   aborted with every source file left untouched.
 */

/**
 * Raised when an MP4 container cannot be parsed.
 */
export class Mp4FormatError extends Error {

  public readonly file: string;

  constructor(file: string, message: string) {

    super(message);

    this.file = file;
    this.name = "Mp4FormatError";
  }
}

/**
 * Raised when a recording directory violates an ordering or uniqueness invariant.
 */
export class InvariantError extends Error {

  constructor(message: string) {

    super(message);

    this.name = "InvariantError";
  }
}

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error values. Trailing punctuation is stripped so
 * callers can add their own in log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if((typeof error === "object") && (error !== null) && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  return message.replace(/[.!?]+$/, "");
}

/**
 * Returns the errno-style code of a filesystem error, if it has one.
 * @param error - The error to inspect.
 * @returns The error code (e.g., "ENOENT"), or undefined.
 */
export function getErrorCode(error: unknown): string | undefined {

  if((typeof error === "object") && (error !== null) && ("code" in error) && (typeof error.code === "string")) {

    return error.code;
  }

  return undefined;
}

/**
 * Checks whether a filesystem error means the path does not exist.
 * @param error - The error to check.
 * @returns True for ENOENT errors.
 */
export function isNotFoundError(error: unknown): boolean {

  return getErrorCode(error) === "ENOENT";
}
