/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * connectionLog.ts: Bounded history of device connection events.
 */
import { LOG } from "../utils/logger.js";
import { formatDuration } from "../utils/format.js";

// Types.

export type ConnectionEventKind = "connect" | "disconnect" | "reject" | "replace";

/**
 * One connection event.
 */
export interface ConnectionEvent {

  deviceId: string;

  // How long the device was connected. Set on disconnect and on replace (for the device that was replaced).
  durationMs?: number;

  kind: ConnectionEventKind;
  model: string;
  name: string;

  // On replace: the device that took over the slot.
  replacedBy?: string;

  // 1-based slot index.
  slot: number;

  // ISO 8601 time of the event.
  timestamp: string;
}

// Constants.

const DEFAULT_CAPACITY = 200;

export class ConnectionLog {

  private readonly capacity: number;
  private readonly events: ConnectionEvent[] = [];

  constructor(capacity = DEFAULT_CAPACITY) {

    this.capacity = capacity;
  }

  /**
   * Appends an event, dropping the oldest one when the log is full.
   * @param event - The event, without its timestamp.
   * @param at - Event time. Defaults to now.
   * @returns The stored event.
   */
  public record(event: Omit<ConnectionEvent, "timestamp">, at = new Date()): ConnectionEvent {

    const entry: ConnectionEvent = { ...event, timestamp: at.toISOString() };

    this.events.push(entry);

    if(this.events.length > this.capacity) {

      this.events.splice(0, this.events.length - this.capacity);
    }

    const duration = (entry.durationMs !== undefined) ? " after " + formatDuration(entry.durationMs) : "";

    switch(entry.kind) {

      case "connect":

        LOG.info("Slot %d: %s (%s, %s) connected.", entry.slot, entry.name, entry.model, entry.deviceId);

        break;

      case "disconnect":

        LOG.info("Slot %d: %s (%s) disconnected%s.", entry.slot, entry.name, entry.deviceId, duration);

        break;

      case "replace":

        LOG.info("Slot %d: %s (%s) replaced by %s%s.", entry.slot, entry.name, entry.deviceId, entry.replacedBy ?? "another device", duration);

        break;

      case "reject":

        LOG.warn("Slot %d: refused connection from %s (%s, %s).", entry.slot, entry.name, entry.model, entry.deviceId);

        break;

      default:

        break;
    }

    return entry;
  }

  /**
   * @param limit - Maximum number of events to return.
   * @returns The most recent events, newest first.
   */
  public recent(limit = this.capacity): ConnectionEvent[] {

    return (limit > 0) ? this.events.slice(-limit).reverse() : [];
  }

  public get size(): number {

    return this.events.length;
  }
}
