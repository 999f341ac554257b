/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.ts: FFmpeg process management for live preview decoding.
 */
import type { Readable, Writable } from "node:stream";
import type { EventEmitter } from "node:events";
import { LOG } from "./logger.js";
import type { Nullable } from "../types/index.js";
import { spawn } from "node:child_process";

/*
 * FFMPEG PREVIEW DECODING
 *
 * Live preview is produced by an external ffmpeg process per source. The raw Annex-B elementary stream is written to ffmpeg's stdin and a stream of JPEG images comes
 * back on stdout:
 *
 * - `-f h264|hevc -i pipe:0`: raw elementary stream input, no container.
 * - `-hwaccel auto`: optional hardware decoding.
 * - `-f image2pipe -c:v mjpeg -q:v 5 pipe:1`: one JPEG per decoded picture on stdout.
 *
 * Recording never goes through ffmpeg. If ffmpeg is missing, preview is disabled and recording is unaffected.
 */

/*
 * FFMPEG PATH RESOLUTION
 *
 * A configured path (preview.ffmpegPath) is checked first, then the system PATH. The result is cached after the first lookup.
 */

// Null means not yet resolved, undefined means not found.
let cachedFFmpegPath: Nullable<string> | undefined = null;

/**
 * Checks whether ffmpeg runs at a path.
 * @param pathToCheck - Path or command name of the ffmpeg executable.
 * @returns True if `ffmpeg -version` exits with code 0.
 */
async function checkFFmpegAtPath(pathToCheck: string): Promise<boolean> {

  return new Promise((resolve) => {

    const ffmpeg = spawn(pathToCheck, ["-version"], { stdio: [ "ignore", "ignore", "ignore" ] });

    ffmpeg.on("error", () => {

      resolve(false);
    });

    ffmpeg.on("exit", (code) => {

      resolve(code === 0);
    });
  });
}

/**
 * Resolves the ffmpeg executable. The result is cached for later calls.
 * @param configuredPath - The configured ffmpeg path, or null to search PATH only.
 * @returns The usable ffmpeg path, or undefined if none was found.
 */
export async function resolveFFmpegPath(configuredPath: Nullable<string> = null): Promise<string | undefined> {

  if(cachedFFmpegPath !== null) {

    return cachedFFmpegPath;
  }

  const candidates = configuredPath ? [ configuredPath, "ffmpeg" ] : ["ffmpeg"];

  for(const candidate of candidates) {

    // eslint-disable-next-line no-await-in-loop
    if(await checkFFmpegAtPath(candidate)) {

      cachedFFmpegPath = candidate;

      return cachedFFmpegPath;
    }
  }

  cachedFFmpegPath = undefined;

  return undefined;
}

/**
 * The parts of a child process the preview decoder uses. Node's ChildProcess spawned with piped stdio satisfies it, and tests supply an in-process fake.
 */
export interface FFmpegChildProcess extends EventEmitter {

  kill: (signal?: NodeJS.Signals) => boolean;
  readonly killed: boolean;
  readonly stderr: Readable;
  readonly stdin: Writable;
  readonly stdout: Readable;
}

/**
 * Starts a child process. The default uses child_process.spawn with all three stdio streams piped.
 */
export type FFmpegSpawner = (command: string, args: string[]) => FFmpegChildProcess;

/**
 * The default spawner.
 * @param command - Executable to run.
 * @param args - Arguments.
 * @returns The child process.
 */
export const defaultSpawner: FFmpegSpawner = (command, args) => spawn(command, args, { stdio: [ "pipe", "pipe", "pipe" ] });

/**
 * A running ffmpeg process.
 */
export interface FFmpegProcess {

  // Terminates the process. Any exit after kill() is treated as normal.
  kill: () => void;

  // The underlying child process.
  process: FFmpegChildProcess;

  // Elementary stream input.
  stdin: Writable;

  // Decoded output.
  stdout: Readable;
}

/**
 * Builds the ffmpeg argument list for preview decoding.
 * @param codec - "h264" or "h265".
 * @param hardwareAcceleration - Whether to request hardware decoding.
 * @returns The argument list.
 */
export function buildPreviewArgs(codec: "h264" | "h265", hardwareAcceleration: boolean): string[] {

  return [
    "-hide_banner",
    "-loglevel", "warning",
    ...(hardwareAcceleration ? [ "-hwaccel", "auto" ] : []),
    "-fflags", "nobuffer",
    "-flags", "low_delay",
    "-f", (codec === "h265") ? "hevc" : "h264",
    "-i", "pipe:0",
    "-f", "image2pipe",
    "-c:v", "mjpeg",
    "-q:v", "5",
    "pipe:1"
  ];
}

/**
 * Spawns ffmpeg and wires up stderr logging and exit handling. stderr lines are logged under the preview:ffmpeg debug category, minus progress noise. An unexpected
 * exit or spawn error is reported through onError; exits after kill() are not.
 * @param ffmpegPath - The ffmpeg executable.
 * @param args - Arguments.
 * @param onError - Called when ffmpeg fails or exits unexpectedly.
 * @param sourceName - Source name for log lines.
 * @param spawner - Process spawner.
 * @returns The process wrapper.
 */
export function spawnFFmpeg(ffmpegPath: string, args: string[], onError: (error: Error) => void, sourceName: string,
  spawner: FFmpegSpawner = defaultSpawner): FFmpegProcess {

  const ffmpeg = spawner(ffmpegPath, args);
  const log = LOG.withSource(sourceName);

  let shuttingDown = false;

  ffmpeg.stderr.on("data", (data: Buffer) => {

    if(shuttingDown) {

      return;
    }

    const message = data.toString().trim();
    const noisePatterns = [ "Press [q] to stop", "frame=", "size=", "time=", "bitrate=", "speed=" ];

    if((message.length === 0) || noisePatterns.some((pattern) => message.includes(pattern))) {

      return;
    }

    log.debug("preview:ffmpeg", "FFmpeg: %s", message);
  });

  ffmpeg.on("exit", (code: Nullable<number>, signal: Nullable<NodeJS.Signals>) => {

    if(shuttingDown || (signal === "SIGTERM")) {

      return;
    }

    if((code !== null) && (code !== 0)) {

      onError(new Error("FFmpeg exited with code " + String(code) + "."));
    } else if(signal) {

      onError(new Error("FFmpeg killed by signal " + signal + "."));
    }
  });

  ffmpeg.on("error", (error: Error) => {

    if(shuttingDown) {

      return;
    }

    onError(error);
  });

  // Writes into a dying process fail with EPIPE on stdin. Those are reported through the exit handler, not here.
  ffmpeg.stdin.on("error", (error: Error) => {

    log.debug("preview:ffmpeg", "FFmpeg stdin error: %s.", error.message);
  });

  const kill = (): void => {

    shuttingDown = true;

    if(!ffmpeg.killed) {

      ffmpeg.stdin.end();
      ffmpeg.kill("SIGTERM");
    }
  };

  return { kill, process: ffmpeg, stdin: ffmpeg.stdin, stdout: ffmpeg.stdout };
}
