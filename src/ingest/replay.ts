/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * replay.ts: Replays an Annex-B H.264 file into a slot as if a device were sending it.
 */
import type { Nullable, SourceIdentity } from "../types/index.js";
import { demuxAnnexB, toAnnexB } from "../codec/nal.js";
import { AccessUnitAssembler } from "../codec/accessUnit.js";
import { LOG } from "../utils/logger.js";
import type { ReceiverCallbacks } from "./receiver.js";
import { basename } from "node:path";
import { delay } from "../utils/delay.js";
import { readFile } from "node:fs/promises";

/* The replay receiver stands in for a network receiver. It goes through the same callback sequence a real sender produces: a connection attempt, a connect, the codec
 * announcement, one onVideoData() per access unit, and a disconnect at the end. Each access unit is stamped at the configured frame rate from a base timestamp, so the
 * recorder's timing and the frame governor behave as they would for a live source.
 */

// Types.

/**
 * Options for a file replay.
 */
export interface FileReplayOptions {

  // The slot to feed.
  callbacks: ReceiverCallbacks;

  // Path to a raw Annex-B H.264 elementary stream.
  file: string;

  // Frames per second used for timestamps and pacing. Default: 30.
  frameRate?: number;

  // The device identity to connect as. Defaults to one derived from the file name.
  identity?: SourceIdentity;

  // Start over at the end of the file until stopped. Default: false.
  loop?: boolean;

  // Pace access units in real time. When false, they are sent as fast as the event loop allows. Default: true.
  realtime?: boolean;

  // Capture timestamp of the first access unit, in nanoseconds. Defaults to the current wall-clock time.
  startTimestamp?: bigint;
}

/**
 * Outcome of a replay.
 */
export interface ReplayResult {

  // Access units delivered.
  accessUnits: number;

  // True if the slot refused the connection.
  rejected: boolean;
}

// Constants.

const DEFAULT_FRAME_RATE = 30;

/**
 * Splits an Annex-B elementary stream into access units that carry a picture, each re-encoded with four-byte start codes. Parameter sets and SEI stay with the picture
 * that follows them.
 * @param data - The elementary stream.
 * @returns One buffer per picture, in stream order.
 */
export function splitAccessUnits(data: Buffer): Buffer[] {

  const assembler = new AccessUnitAssembler({ flushOnPacketEnd: false });
  const units = assembler.push(demuxAnnexB(data), 0n);
  const last = assembler.flush();

  if(last) {

    units.push(last);
  }

  return units.filter((unit) => unit.hasPicture).map((unit) => toAnnexB(unit.nals));
}

export class FileReplayReceiver {

  private readonly callbacks: ReceiverCallbacks;
  private readonly file: string;
  private readonly frameRate: number;
  private readonly identity: SourceIdentity;
  private readonly loop: boolean;
  private readonly realtime: boolean;
  private readonly startTimestamp: Nullable<bigint>;
  private stopped = false;

  constructor(options: FileReplayOptions) {

    const name = basename(options.file);

    this.callbacks = options.callbacks;
    this.file = options.file;
    this.frameRate = options.frameRate ?? DEFAULT_FRAME_RATE;
    this.identity = options.identity ?? { deviceId: "replay:" + name, model: "File", name };
    this.loop = options.loop ?? false;
    this.realtime = options.realtime ?? true;
    this.startTimestamp = options.startTimestamp ?? null;
  }

  /**
   * Plays the file into the slot. Resolves once the file has played through (or, when looping, once stop() is called) and the disconnect has been delivered.
   * @returns How many access units were delivered.
   * @throws If the file cannot be read or holds no pictures.
   */
  public async run(): Promise<ReplayResult> {

    const units = splitAccessUnits(await readFile(this.file));

    if(units.length === 0) {

      throw new Error(this.file + " contains no H.264 pictures.");
    }

    const { deviceId, model, name } = this.identity;

    if(!this.callbacks.onConnectionAttempt(deviceId, model, name)) {

      LOG.warn("Replay of %s was refused.", this.file);

      return { accessUnits: 0, rejected: true };
    }

    this.callbacks.onConnect(deviceId, model, name);
    this.callbacks.onCodecSet(false);

    LOG.info("Replaying %s (%d access units at %d fps%s).", this.file, units.length, this.frameRate, this.loop ? ", looping" : "");

    const base = this.startTimestamp ?? (BigInt(Date.now()) * 1_000_000n);
    const frameNanoseconds = BigInt(Math.round(1e9 / this.frameRate));
    const frameMs = this.realtime ? (1000 / this.frameRate) : 0;
    let sent = 0;

    do {

      for(const unit of units) {

        if(this.stopped) {

          break;
        }

        this.callbacks.onVideoData(unit, false, base + (BigInt(sent) * frameNanoseconds));
        sent++;

        await delay(frameMs);
      }

      if(this.loop && !this.stopped) {

        LOG.debug("replay", "Reached the end of %s after %d access units; starting over.", this.file, sent);
      }
    } while(this.loop && !this.stopped);

    this.callbacks.onDisconnect(deviceId);

    return { accessUnits: sent, rejected: false };
  }

  /**
   * Ends the replay after the access unit in flight.
   */
  public stop(): void {

    this.stopped = true;
  }
}
