/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * slot.ts: Device slot state machine.
 */
import type { BridgeStats, MediaSink } from "./bridge.js";
import type { Nullable, SourceIdentity, VideoCodec } from "../types/index.js";
import type { BoundLogger } from "../utils/logger.js";
import type { ConnectionLog } from "./connectionLog.js";
import { EventEmitter } from "node:events";
import { LOG } from "../utils/logger.js";
import type { ReceiverCallbacks } from "./receiver.js";
import { ReceiverBridge } from "./bridge.js";
import type { RecordingTarget } from "../recording/session.js";

/* A slot is one advertised receiver endpoint. It is either vacant or occupied by one device:
 *
 *   Vacant --connect--> Occupied(A) --connect(B)--> Occupied(B)     (A is replaced)
 *                           |
 *                       disconnect --> Vacant
 *
 * Receivers that let a new device take over a busy endpoint report the new connect before the old device's disconnect. The slot counts every replacement in
 * pendingEvictionDisconnects, and the next disconnect that does not name the current occupant consumes one of them instead of vacating the slot. A disconnect that
 * names the occupant always vacates.
 *
 * Events:
 *   "connected" (identity)              a device occupied a vacant slot
 *   "replaced" (previous, identity)     a different device took over an occupied slot
 *   "disconnected" (identity)           the occupant left and the slot is vacant
 *   "rejected" (identity)               a connection attempt was refused by admission control
 */

// Types.

export type SlotState = { kind: "vacant" } | { connectedAt: Date; identity: SourceIdentity; kind: "occupied" };

/**
 * Slot summary for the API.
 */
export interface SlotSnapshot {

  codec: VideoCodec;
  connectedAt: Nullable<string>;
  identity: Nullable<SourceIdentity>;
  index: number;
  serviceName: string;
  state: SlotState["kind"];
  stats: BridgeStats;
}

/**
 * Options for creating a slot.
 */
export interface SourceSlotOptions {

  // Device ids or names that are refused. Compared case-insensitively.
  blocklist?: readonly string[];

  // Where connection events are recorded.
  connectionLog: ConnectionLog;

  // Preview decoder sink, if preview is enabled.
  decoder?: Nullable<MediaSink>;

  // 1-based slot index.
  index: number;

  // Prefix for the service name.
  namePrefix: string;
}

/**
 * Builds a slot's service name: the prefix and the slot index, zero-padded to two digits.
 * @param namePrefix - The configured prefix.
 * @param index - 1-based slot index.
 * @returns The service name (e.g., "NalVault-01").
 */
export function slotServiceName(namePrefix: string, index: number): string {

  return namePrefix + "-" + String(index).padStart(2, "0");
}

export class SourceSlot extends EventEmitter implements ReceiverCallbacks, RecordingTarget {

  private readonly blocklist: Set<string>;
  private readonly bridge: ReceiverBridge;
  private readonly connectionLog: ConnectionLog;
  private currentState: SlotState = { kind: "vacant" };
  private readonly log: BoundLogger;
  private pendingEvictions = 0;

  public readonly index: number;
  public readonly serviceName: string;

  constructor(options: SourceSlotOptions) {

    super();

    this.blocklist = new Set((options.blocklist ?? []).map((entry) => entry.trim().toLowerCase()).filter((entry) => entry.length > 0));
    this.bridge = new ReceiverBridge(options.decoder ?? null);
    this.connectionLog = options.connectionLog;
    this.index = options.index;
    this.serviceName = slotServiceName(options.namePrefix, options.index);
    this.log = LOG.withSource(this.serviceName);
  }

  public get state(): SlotState {

    return this.currentState;
  }

  public get isOccupied(): boolean {

    return this.currentState.kind === "occupied";
  }

  /**
   * @returns The connected device, or null when vacant.
   */
  public get identity(): Nullable<SourceIdentity> {

    return (this.currentState.kind === "occupied") ? this.currentState.identity : null;
  }

  /**
   * @returns Replacements whose late disconnect has not arrived yet.
   */
  public get pendingEvictionDisconnects(): number {

    return this.pendingEvictions;
  }

  public get codec(): VideoCodec {

    return this.bridge.currentCodec;
  }

  public get snapshot(): SlotSnapshot {

    return {

      codec: this.bridge.currentCodec,
      connectedAt: (this.currentState.kind === "occupied") ? this.currentState.connectedAt.toISOString() : null,
      identity: this.identity,
      index: this.index,
      serviceName: this.serviceName,
      state: this.currentState.kind,
      stats: this.bridge.stats
    };
  }

  /**
   * Checks a device against the blocklist.
   * @param identity - The device asking to connect.
   * @returns True if the device may connect.
   */
  public admit(identity: SourceIdentity): boolean {

    if(!this.blocklist.has(identity.deviceId.toLowerCase()) && !this.blocklist.has(identity.name.toLowerCase())) {

      return true;
    }

    this.connectionLog.record({ deviceId: identity.deviceId, kind: "reject", model: identity.model, name: identity.name, slot: this.index });
    this.emit("rejected", identity);

    return false;
  }

  /**
   * Applies a connect.
   * @param identity - The connecting device.
   */
  public connect(identity: SourceIdentity): void {

    const now = new Date();

    if(this.currentState.kind === "vacant") {

      this.currentState = { connectedAt: now, identity, kind: "occupied" };
      this.connectionLog.record({ deviceId: identity.deviceId, kind: "connect", model: identity.model, name: identity.name, slot: this.index }, now);
      this.emit("connected", identity);

      return;
    }

    const previous = this.currentState;

    if(previous.identity.deviceId === identity.deviceId) {

      this.log.debug("slot", "Reconnect from %s; already connected.", identity.deviceId);

      return;
    }

    this.pendingEvictions++;
    this.currentState = { connectedAt: now, identity, kind: "occupied" };

    this.connectionLog.record({

      deviceId: previous.identity.deviceId,
      durationMs: now.getTime() - previous.connectedAt.getTime(),
      kind: "replace",
      model: previous.identity.model,
      name: previous.identity.name,
      replacedBy: identity.deviceId,
      slot: this.index
    }, now);

    this.connectionLog.record({ deviceId: identity.deviceId, kind: "connect", model: identity.model, name: identity.name, slot: this.index }, now);
    this.emit("replaced", previous.identity, identity);
  }

  /**
   * Applies a disconnect.
   * @param deviceId - The device that disconnected, when the receiver knows it.
   */
  public disconnect(deviceId?: string): void {

    if(this.currentState.kind === "vacant") {

      if(this.pendingEvictions > 0) {

        this.pendingEvictions--;
      }

      return;
    }

    // A disconnect that names the occupant always vacates.
    if((deviceId !== undefined) && (deviceId === this.currentState.identity.deviceId)) {

      this.vacate();

      return;
    }

    if(this.pendingEvictions > 0) {

      this.pendingEvictions--;
      this.log.debug("slot", "Late disconnect of a replaced device (%s).", deviceId ?? "unnamed");

      return;
    }

    if(deviceId !== undefined) {

      this.log.debug("slot", "Ignoring disconnect from %s, which does not occupy the slot.", deviceId);

      return;
    }

    this.vacate();
  }

  /**
   * Routes media into a recorder.
   * @param sink - The recorder, or null to detach.
   */
  public attachRecorder(sink: Nullable<MediaSink>): void {

    this.bridge.attachRecorder(sink);
  }

  /**
   * Routes media into a preview decoder.
   * @param sink - The decoder, or null to detach.
   */
  public attachDecoder(sink: Nullable<MediaSink>): void {

    this.bridge.attachDecoder(sink);
  }

  public onCodecSet(isH265: boolean): void {

    const codec: VideoCodec = isH265 ? "h265" : "h264";

    if(codec !== this.bridge.currentCodec) {

      this.log.info("Codec set to %s.", isH265 ? "H.265" : "H.264");
    }

    this.bridge.setCodec(codec);
  }

  public onConnect(deviceId: string, model: string, name: string): void {

    this.connect({ deviceId, model, name });
  }

  public onConnectionAttempt(deviceId: string, model: string, name: string): boolean {

    return this.admit({ deviceId, model, name });
  }

  public onDisconnect(deviceId?: string): void {

    this.disconnect(deviceId);
  }

  public onVideoData(bytes: Uint8Array, isH265: boolean, ntpTimestamp: bigint): void {

    if(isH265 !== (this.bridge.currentCodec === "h265")) {

      this.onCodecSet(isH265);
    }

    this.bridge.push(bytes, ntpTimestamp);
  }

  private vacate(): void {

    if(this.currentState.kind === "vacant") {

      return;
    }

    const { connectedAt, identity } = this.currentState;

    this.currentState = { kind: "vacant" };
    this.connectionLog.record({ deviceId: identity.deviceId, durationMs: Date.now() - connectedAt.getTime(), kind: "disconnect", model: identity.model,
      name: identity.name, slot: this.index });
    this.emit("disconnected", identity);
  }
}
