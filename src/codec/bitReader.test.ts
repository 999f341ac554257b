/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * bitReader.test.ts: Tests for RBSP unescaping and Exp-Golomb decoding.
 */
import { BitReader, unescapeRbsp } from "./bitReader.js";
import { BitWriter, escapeRbsp } from "../testing/h264.js";
import { describe, expect, it } from "vitest";

describe("unescapeRbsp", () => {

  it("removes emulation prevention bytes", () => {

    expect([...unescapeRbsp(Buffer.from([ 0x00, 0x00, 0x03, 0x01 ]))]).toEqual([ 0x00, 0x00, 0x01 ]);
    expect([...unescapeRbsp(Buffer.from([ 0x11, 0x00, 0x00, 0x03 ]))]).toEqual([ 0x11, 0x00, 0x00 ]);
  });

  it("keeps a 0x03 that is not followed by a byte of 0x03 or less", () => {

    expect([...unescapeRbsp(Buffer.from([ 0x00, 0x00, 0x03, 0x04 ]))]).toEqual([ 0x00, 0x00, 0x03, 0x04 ]);
  });

  it("returns the input unchanged when nothing is escaped", () => {

    const input = Buffer.from([ 0x42, 0x00, 0x1F ]);

    expect(unescapeRbsp(input)).toBe(input);
  });

  it("inverts escaping", () => {

    const raw = Buffer.from([ 0x00, 0x00, 0x00, 0x00, 0x00, 0x02, 0x7F ]);

    expect([...unescapeRbsp(escapeRbsp(raw))]).toEqual([...raw]);
  });
});

describe("BitReader", () => {

  it("reads fixed-width fields MSB first", () => {

    const reader = new BitReader(Buffer.from([ 0b10110000, 0xFF ]));

    expect(reader.readBits(3)).toBe(0b101);
    expect(reader.readFlag()).toBe(true);
    expect(reader.bitsLeft).toBe(12);

    reader.skipBits(4);

    expect(reader.readBits(8)).toBe(0xFF);
  });

  it("decodes unsigned Exp-Golomb codes", () => {

    const reader = new BitReader(Buffer.from([ 0b10100110, 0b01000000 ]));

    expect([ reader.readUE(), reader.readUE(), reader.readUE(), reader.readUE() ]).toEqual([ 0, 1, 2, 3 ]);
  });

  it("decodes signed Exp-Golomb codes", () => {

    const writer = new BitWriter();

    for(const value of [ 0, 1, -1, 5, -7 ]) {

      writer.writeSE(value);
    }

    writer.writeTrailingBits();

    const reader = new BitReader(writer.toBuffer());

    expect([ reader.readSE(), reader.readSE(), reader.readSE(), reader.readSE(), reader.readSE() ]).toEqual([ 0, 1, -1, 5, -7 ]);
  });

  it("throws when reading past the end", () => {

    const reader = new BitReader(Buffer.from([0x00]));

    expect(() => reader.readUE()).toThrow(RangeError);
    expect(() => new BitReader(Buffer.from([0xFF])).skipBits(9)).toThrow(RangeError);
  });
});
