/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: File-based logging with size-based trimming for NalVault.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Log lines are collected in memory and appended to the log file once a second. Every SIZE_CHECK_FREQUENCY writes the real file size is checked, and a file over the
 * configured maximum is cut down to the most recent half, on a line boundary, through a temp file and a rename. Trimming is suspended while debug output is on.
 *
 * A write failure disables the sink for ERROR_RETRY_DELAY_MS and reports once on the console.
 *
 * Line format: [yyyy/mm/dd HH:MM:ss.l] [LEVEL] message. Info lines carry no level tag; debug lines carry [DEBUG:category].
 */

const ANSI_RESET = "\x1b[0m";

const ERROR_RETRY_DELAY_MS = 60000;
const FLUSH_INTERVAL_MS = 1000;
const SIZE_CHECK_FREQUENCY = 100;

/**
 * Buffered append-only log file with size trimming.
 */
export class FileLogSink {

  private approximateSize = 0;
  private disabledAt = 0;
  private flushTimer: Nullable<ReturnType<typeof setInterval>> = null;
  private readonly logFilePath: string;
  private readonly maxSize: number;
  private writeBuffer: string[] = [];
  private writeCount = 0;

  constructor(logFilePath: string, maxSize: number) {

    this.logFilePath = logFilePath;
    this.maxSize = maxSize;
  }

  /**
   * Creates the log file and its directory if needed, and starts the periodic flush timer.
   */
  public async open(): Promise<void> {

    await fsPromises.mkdir(path.dirname(this.logFilePath), { recursive: true });

    const handle = await fsPromises.open(this.logFilePath, "a");

    try {

      this.approximateSize = (await handle.stat()).size;
    } finally {

      await handle.close();
    }

    this.flushTimer = setInterval((): void => {

      void this.flush();
    }, FLUSH_INTERVAL_MS);

    this.flushTimer.unref();
  }

  /**
   * Formats and buffers one log line.
   * @param level - The log level.
   * @param message - The formatted message.
   * @param color - Optional ANSI color for the line.
   * @param categoryTag - Optional debug category.
   */
  public write(level: string, message: string, color?: string, categoryTag?: string): void {

    if(this.disabledAt) {

      if((Date.now() - this.disabledAt) < ERROR_RETRY_DELAY_MS) {

        return;
      }

      this.disabledAt = 0;
    }

    const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
    const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");
    const entry = [ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join("");

    this.writeBuffer.push(entry);
    this.approximateSize += entry.length;
    this.writeCount++;

    if((this.writeCount % SIZE_CHECK_FREQUENCY) === 0) {

      void this.checkAndTrim();
    }
  }

  /**
   * Appends the buffered lines to the file.
   */
  public async flush(): Promise<void> {

    if(this.writeBuffer.length === 0) {

      return;
    }

    const content = this.writeBuffer.join("");

    this.writeBuffer = [];

    try {

      await fsPromises.appendFile(this.logFilePath, content, "utf-8");
    } catch(error) {

      this.disabledAt = Date.now();

      // eslint-disable-next-line no-console
      console.error("Failed to write to log file: %s. File logging disabled for %s seconds.", (error instanceof Error) ? error.message : String(error),
        ERROR_RETRY_DELAY_MS / 1000);
    }
  }

  /**
   * Stops the flush timer and writes whatever is still buffered, synchronously. Safe to call from a process "exit" handler.
   */
  public close(): void {

    if(this.flushTimer) {

      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }

    if(this.writeBuffer.length === 0) {

      return;
    }

    const content = this.writeBuffer.join("");

    this.writeBuffer = [];

    try {

      fs.appendFileSync(this.logFilePath, content, "utf-8");
    } catch(error) {

      // eslint-disable-next-line no-console
      console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
    }
  }

  /**
   * Checks the real file size and trims the file when it exceeds the maximum.
   */
  public async checkAndTrim(): Promise<void> {

    try {

      this.approximateSize = (await fsPromises.stat(this.logFilePath)).size;

      if((this.approximateSize > this.maxSize) && !isAnyDebugEnabled()) {

        await this.trim();
      }
    } catch(error) {

      // eslint-disable-next-line no-console
      console.warn("Error checking log file size: %s.", (error instanceof Error) ? error.message : String(error));
    }
  }

  /**
   * Keeps the most recent half of the maximum size, starting at the first complete line.
   */
  private async trim(): Promise<void> {

    const content = await fsPromises.readFile(this.logFilePath, "utf-8");
    const cutPosition = content.length - Math.floor(this.maxSize / 2);

    if(cutPosition <= 0) {

      return;
    }

    const newline = content.indexOf("\n", cutPosition);
    const trimmed = content.substring((newline === -1) ? cutPosition : (newline + 1));
    const tempPath = this.logFilePath + ".tmp";

    await fsPromises.writeFile(tempPath, trimmed, "utf-8");
    await fsPromises.rename(tempPath, this.logFilePath);

    this.approximateSize = trimmed.length;
  }
}

/* The process-wide sink. LOG writes here in file mode; before initializeFileLogger() runs (or after it fails) lines are discarded.
 */

let activeSink: Nullable<FileLogSink> = null;

/**
 * Opens the process-wide log file. Failure is reported on the console and leaves file logging off.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  const sink = new FileLogSink(logPath, maxSize);

  try {

    await sink.open();

    activeSink = sink;
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Buffers a line in the process-wide sink.
 * @param level - The log level.
 * @param message - The formatted message.
 * @param color - Optional ANSI color.
 * @param categoryTag - Optional debug category.
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  activeSink?.write(level, message, color, categoryTag);
}

/**
 * Synchronously flushes the process-wide sink. Used from the process "exit" handler.
 */
export function flushLogBufferSync(): void {

  activeSink?.close();
}

/**
 * Closes the process-wide sink.
 */
export function shutdownFileLogger(): void {

  activeSink?.close();
  activeSink = null;
}
