/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * slot.test.ts: Tests for the slot state machine.
 */
import { SourceSlot, slotServiceName } from "./slot.js";
import { annexB, buildSlice } from "../testing/h264.js";
import { describe, expect, it } from "vitest";
import { ConnectionLog } from "./connectionLog.js";
import type { NalUnit } from "../codec/nal.js";
import type { SourceIdentity } from "../types/index.js";

const A: SourceIdentity = { deviceId: "AA:01", model: "Phone1", name: "Front Door" };
const B: SourceIdentity = { deviceId: "BB:02", model: "Phone2", name: "Garage" };

function createSlot(blocklist: string[] = []): { log: ConnectionLog; slot: SourceSlot } {

  const log = new ConnectionLog();

  return { log, slot: new SourceSlot({ blocklist, connectionLog: log, index: 1, namePrefix: "NalVault" }) };
}

describe("slotServiceName", () => {

  it("pads the index to two digits", () => {

    expect(slotServiceName("NalVault", 1)).toBe("NalVault-01");
    expect(slotServiceName("Bench", 12)).toBe("Bench-12");
  });
});

describe("SourceSlot", () => {

  it("moves between vacant and occupied", () => {

    const { log, slot } = createSlot();
    const events: string[] = [];

    slot.on("connected", (identity: SourceIdentity) => events.push("connected " + identity.deviceId));
    slot.on("disconnected", (identity: SourceIdentity) => events.push("disconnected " + identity.deviceId));

    expect(slot.serviceName).toBe("NalVault-01");
    expect(slot.isOccupied).toBe(false);

    slot.onConnect(A.deviceId, A.model, A.name);

    expect(slot.identity).toEqual(A);
    expect(slot.snapshot.state).toBe("occupied");

    slot.onDisconnect(A.deviceId);

    expect(slot.isOccupied).toBe(false);
    expect(slot.snapshot.connectedAt).toBeNull();
    expect(events).toEqual([ "connected AA:01", "disconnected AA:01" ]);
    expect(log.recent().map((event) => event.kind)).toEqual([ "disconnect", "connect" ]);
  });

  it("ignores a repeated connect from the occupant", () => {

    const { log, slot } = createSlot();

    slot.connect(A);
    slot.connect(A);

    expect(slot.pendingEvictionDisconnects).toBe(0);
    expect(log.size).toBe(1);
  });

  it("absorbs the late disconnect of a replaced device", () => {

    const { log, slot } = createSlot();
    const replaced: string[][] = [];

    slot.on("replaced", (previous: SourceIdentity, identity: SourceIdentity) => replaced.push([ previous.deviceId, identity.deviceId ]));
    slot.connect(A);
    slot.connect(B);

    expect(replaced).toEqual([[ "AA:01", "BB:02" ]]);
    expect(slot.pendingEvictionDisconnects).toBe(1);
    expect(log.recent(2).map((event) => [ event.kind, event.deviceId, event.replacedBy ])).toEqual([
      [ "connect", "BB:02", undefined ],
      [ "replace", "AA:01", "BB:02" ]
    ]);

    slot.disconnect(A.deviceId);

    expect(slot.identity).toEqual(B);
    expect(slot.pendingEvictionDisconnects).toBe(0);

    slot.disconnect();

    expect(slot.isOccupied).toBe(false);
  });

  it("vacates on a disconnect naming the occupant even with replacements pending", () => {

    const { slot } = createSlot();

    slot.connect(A);
    slot.connect(B);
    slot.disconnect(B.deviceId);

    expect(slot.isOccupied).toBe(false);
    expect(slot.pendingEvictionDisconnects).toBe(1);

    slot.disconnect(A.deviceId);

    expect(slot.pendingEvictionDisconnects).toBe(0);
  });

  it("ignores a disconnect naming another device when nothing is pending", () => {

    const { slot } = createSlot();

    slot.connect(A);
    slot.disconnect("CC:03");

    expect(slot.identity).toEqual(A);
  });

  it("refuses blocklisted devices by id or name", () => {

    const { log, slot } = createSlot([ " aa:01 ", "GARAGE" ]);
    const rejected: string[] = [];

    slot.on("rejected", (identity: SourceIdentity) => rejected.push(identity.deviceId));

    expect(slot.onConnectionAttempt(A.deviceId, A.model, A.name)).toBe(false);
    expect(slot.onConnectionAttempt(B.deviceId, B.model, B.name)).toBe(false);
    expect(slot.onConnectionAttempt("CC:03", "Phone3", "Porch")).toBe(true);
    expect(rejected).toEqual([ "AA:01", "BB:02" ]);
    expect(log.recent().map((event) => event.kind)).toEqual([ "reject", "reject" ]);
  });

  it("routes video to the attached recorder and follows the packet codec", () => {

    const { slot } = createSlot();
    const codecs: string[] = [];
    const pushes: { nals: readonly NalUnit[]; timestamp: bigint }[] = [];
    const packet = annexB([buildSlice({ keyframe: true })]);

    slot.attachRecorder({ pushNals: (nals, timestamp) => pushes.push({ nals, timestamp }), setCodec: (codec) => codecs.push(codec) });
    slot.onVideoData(packet, false, 7n);
    slot.onVideoData(annexB([Buffer.from([ 0x26, 0x01, 0xAF ])]), true, 8n);

    expect(pushes.map((push) => push.timestamp)).toEqual([ 7n, 8n ]);
    expect(pushes[0].nals[0].type).toBe(5);
    expect(pushes[1].nals[0].type).toBe(19);
    expect(codecs).toEqual(["h265"]);
    expect(slot.codec).toBe("h265");
    expect(slot.snapshot.stats.packetsReceived).toBe(2);
  });
});
