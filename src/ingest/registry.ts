/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * registry.ts: The set of device slots and their wiring to the recording session.
 */
import type { Config, Nullable, SourceIdentity } from "../types/index.js";
import type { RecorderState, RecorderStats } from "../recording/recorder.js";
import { LOG, formatError } from "../utils/index.js";
import type { ConnectionLog } from "./connectionLog.js";
import type { FFmpegSpawner } from "../utils/ffmpeg.js";
import { PreviewDecoder } from "../preview/decoder.js";
import type { RecordingSession } from "../recording/session.js";
import type { SlotSnapshot } from "./slot.js";
import { SourceSlot } from "./slot.js";

/* The registry creates the configured number of slots at startup and owns them for the life of the process. When preview is enabled and ffmpeg was found, each slot
 * gets its own preview decoder, attached permanently to the slot's bridge.
 *
 * bindSession() connects slot events to the recording session. Session calls are asynchronous and may fail (a directory that cannot be created, a recorder that
 * cannot start); a failure is logged against the slot and never reaches the receiver that raised the event.
 */

// Types.

/**
 * A slot summary with its recorder and preview state, for the API.
 */
export interface SourceSummary extends SlotSnapshot {

  preview: Nullable<{ frames: number; hasFrame: boolean; running: boolean }>;
  recorder: Nullable<{ state: RecorderState; stats: RecorderStats }>;
}

/**
 * Options for creating the registry.
 */
export interface SlotRegistryOptions {

  config: Config;

  // Where slots record connection events.
  connectionLog: ConnectionLog;

  // Resolved ffmpeg executable. Without one, no preview decoders are created.
  ffmpegPath?: string;

  // Process spawner for the preview decoders.
  spawner?: FFmpegSpawner;
}

export class SlotRegistry {

  private readonly decoders = new Map<number, PreviewDecoder>();
  private readonly slotList: SourceSlot[] = [];

  constructor(options: SlotRegistryOptions) {

    const { config, connectionLog, ffmpegPath, spawner } = options;
    const previewPath = config.preview.enabled ? ffmpegPath : undefined;

    if(config.preview.enabled && (previewPath === undefined)) {

      LOG.warn("Live preview is enabled but ffmpeg was not found. Recording is unaffected; previews are unavailable.");
    }

    for(let index = 1; index <= config.slots.count; index++) {

      const slot = new SourceSlot({ blocklist: config.admission.blocklist, connectionLog, index, namePrefix: config.slots.namePrefix });

      if(previewPath !== undefined) {

        const decoder = new PreviewDecoder({ config: config.preview, ffmpegPath: previewPath, sourceName: slot.serviceName, spawner });

        this.decoders.set(index, decoder);
        slot.attachDecoder(decoder);
      }

      // A departed source's last picture is not left on screen.
      slot.on("disconnected", () => this.decoders.get(index)?.reset());

      this.slotList.push(slot);
    }
  }

  public get slots(): readonly SourceSlot[] {

    return this.slotList;
  }

  /**
   * @returns The number of occupied slots.
   */
  public get occupiedCount(): number {

    return this.slotList.filter((slot) => slot.isOccupied).length;
  }

  /**
   * @param index - 1-based slot index.
   * @returns The slot, or undefined if there is no such slot.
   */
  public get(index: number): SourceSlot | undefined {

    return this.slotList[index - 1];
  }

  /**
   * @param index - 1-based slot index.
   * @returns The slot's preview decoder, or undefined when preview is off.
   */
  public decoderFor(index: number): PreviewDecoder | undefined {

    return this.decoders.get(index);
  }

  /**
   * Routes slot connection events into a recording session.
   * @param session - The session.
   */
  public bindSession(session: RecordingSession): void {

    for(const slot of this.slotList) {

      const log = LOG.withSource(slot.serviceName);
      const report = (action: string) => (error: unknown): void => {

        log.error("Recording could not %s: %s.", action, formatError(error));
      };

      slot.on("connected", () => {

        session.sourceConnected(slot).catch(report("start for the new source"));
      });

      slot.on("replaced", (previous: SourceIdentity, identity: SourceIdentity) => {

        log.info("%s replaced %s; starting a new recorder.", identity.name, previous.name);
        session.sourceReplaced(slot).catch(report("switch to the new device"));
      });

      slot.on("disconnected", () => {

        session.sourceDisconnected(slot).catch(report("finish for the departed source"));
      });
    }
  }

  /**
   * Builds the API summary of every slot.
   * @param session - The recording session, for recorder state.
   * @returns One summary per slot, in slot order.
   */
  public summaries(session: Nullable<RecordingSession>): SourceSummary[] {

    return this.slotList.map((slot) => {

      const decoder = this.decoders.get(slot.index);
      const recorder = session?.recorderFor(slot.serviceName);

      return {

        ...slot.snapshot,
        preview: decoder ? { frames: decoder.frameCount, hasFrame: decoder.latestFrame !== null, running: decoder.isRunning } : null,
        recorder: recorder ? { state: recorder.state, stats: recorder.stats } : null
      };
    });
  }

  /**
   * Stops every preview decoder.
   */
  public stopDecoders(): void {

    for(const decoder of this.decoders.values()) {

      decoder.stop();
    }
  }
}
