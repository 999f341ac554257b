/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * accessUnit.test.ts: Tests for access unit assembly.
 */
import { annexB, buildPps, buildSlice, buildSps } from "../testing/h264.js";
import { describe, expect, it } from "vitest";
import { AccessUnitAssembler } from "./accessUnit.js";
import type { NalUnit } from "./nal.js";
import { demuxAnnexB } from "./nal.js";

const SPS = buildSps({ height: 480, width: 640 });
const PPS = buildPps();
const AUD = Buffer.from([ 0x09, 0xF0 ]);

function nals(...units: Buffer[]): NalUnit[] {

  return demuxAnnexB(annexB(units));
}

describe("AccessUnitAssembler", () => {

  it("closes one access unit per packet by default", () => {

    const assembler = new AccessUnitAssembler();
    const units = assembler.push(nals(SPS, PPS, buildSlice({ keyframe: true })), 1000n);

    expect(units).toHaveLength(1);
    expect(units[0]).toMatchObject({ hasPicture: true, keyframe: true, timestamp: 1000n });
    expect(units[0].nals.map((nal) => nal.type)).toEqual([ 7, 8, 5 ]);
  });

  it("splits a packet holding two pictures", () => {

    const assembler = new AccessUnitAssembler();
    const units = assembler.push(nals(buildSlice({ keyframe: true }), buildSlice({ keyframe: false, seed: 2 })), 5n);

    expect(units.map((unit) => unit.keyframe)).toEqual([ true, false ]);
    expect(units.map((unit) => unit.timestamp)).toEqual([ 5n, 5n ]);
  });

  it("keeps the slices of one picture together across packets", () => {

    const assembler = new AccessUnitAssembler({ flushOnPacketEnd: false });

    expect(assembler.push(nals(buildSlice({ firstMb: 0, keyframe: true })), 10n)).toEqual([]);
    expect(assembler.push(nals(buildSlice({ firstMb: 600, keyframe: true })), 11n)).toEqual([]);

    const units = assembler.push(nals(AUD, buildSlice({ keyframe: false })), 20n);

    expect(units).toHaveLength(1);
    expect(units[0].nals).toHaveLength(2);
    expect(units[0].timestamp).toBe(10n);

    const pending = assembler.flush();

    expect(pending?.nals.map((nal) => nal.type)).toEqual([ 9, 1 ]);
    expect(pending?.keyframe).toBe(false);
    expect(pending?.timestamp).toBe(20n);
  });

  it("starts a new access unit at a slice with first_mb_in_slice of zero", () => {

    const assembler = new AccessUnitAssembler({ flushOnPacketEnd: false });

    assembler.push(nals(buildSlice({ keyframe: false })), 1n);

    const units = assembler.push(nals(buildSlice({ keyframe: false, seed: 3 })), 2n);

    expect(units).toHaveLength(1);
    expect(units[0].timestamp).toBe(1n);
  });

  it("stamps an access unit with the packet that delivered its first slice", () => {

    const assembler = new AccessUnitAssembler({ flushOnPacketEnd: false });

    expect(assembler.push(nals(SPS, PPS), 5n)).toEqual([]);
    expect(assembler.push(nals(buildSlice({ keyframe: true })), 7n)).toEqual([]);

    const unit = assembler.flush();

    expect(unit?.timestamp).toBe(7n);
    expect(unit?.nals.map((nal) => nal.type)).toEqual([ 7, 8, 5 ]);
  });

  it("reports parameter-set-only access units without a picture", () => {

    const units = new AccessUnitAssembler().push(nals(SPS, PPS), 3n);

    expect(units).toHaveLength(1);
    expect(units[0]).toMatchObject({ hasPicture: false, keyframe: false, timestamp: 3n });
  });

  it("treats an unreadable slice header as a continuation", () => {

    const assembler = new AccessUnitAssembler({ flushOnPacketEnd: false });

    assembler.push(nals(buildSlice({ keyframe: true })), 1n);

    // A lone header byte with no slice header bits.
    expect(assembler.push(nals(Buffer.from([0x41])), 2n)).toEqual([]);
    expect(assembler.flush()?.nals).toHaveLength(2);
  });

  it("drops the pending access unit on reset", () => {

    const assembler = new AccessUnitAssembler({ flushOnPacketEnd: false });

    assembler.push(nals(buildSlice({ keyframe: true })), 1n);
    assembler.reset();

    expect(assembler.flush()).toBeNull();
  });
});
