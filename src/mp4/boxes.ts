/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * boxes.ts: ISO BMFF box construction and traversal helpers.
 */
import type { Nullable } from "../types/index.js";
import type { ParameterSetPair } from "../codec/parameterSets.js";
import { parseSps } from "../codec/sps.js";

/* MP4 files are sequences of boxes. Each box is:
 *
 * - 4 bytes: size (big-endian uint32), the total box size including the header
 * - 4 bytes: type (four ASCII characters)
 * - payload
 *
 * A size of 1 means a 64-bit size follows the type; a size of 0 means the box extends to the end of the file. FullBoxes add a version byte and 24 bits of flags at the
 * start of the payload.
 */

// Constants.

// Header size of a box with a 32-bit size field.
export const BOX_HEADER_SIZE = 8;

// Header size of a box with a 64-bit size field.
export const EXTENDED_BOX_HEADER_SIZE = 16;

// Unity transformation matrix used by mvhd and tkhd.
const UNITY_MATRIX = [ 0x00010000, 0, 0, 0, 0x00010000, 0, 0, 0, 0x40000000 ];

// Construction.

/**
 * Builds a box with a 32-bit size field.
 * @param type - The four-character box type.
 * @param payloads - Payload pieces, concatenated in order.
 * @returns The complete box.
 */
export function box(type: string, ...payloads: Buffer[]): Buffer {

  const payloadSize = payloads.reduce((sum, part) => sum + part.length, 0);
  const header = Buffer.alloc(BOX_HEADER_SIZE);

  header.writeUInt32BE(BOX_HEADER_SIZE + payloadSize, 0);
  header.write(type, 4, 4, "latin1");

  return Buffer.concat([ header, ...payloads ]);
}

/**
 * Builds a FullBox.
 * @param type - The four-character box type.
 * @param version - The version byte.
 * @param flags - The 24-bit flags.
 * @param payloads - Payload pieces after the version and flags.
 * @returns The complete box.
 */
export function fullBox(type: string, version: number, flags: number, ...payloads: Buffer[]): Buffer {

  const versionAndFlags = Buffer.alloc(4);

  versionAndFlags.writeUInt32BE(((version & 0xFF) * 0x1000000) + (flags & 0x00FFFFFF), 0);

  return box(type, versionAndFlags, ...payloads);
}

export function u8(value: number): Buffer {

  return Buffer.from([value & 0xFF]);
}

export function u16(value: number): Buffer {

  const buffer = Buffer.alloc(2);

  buffer.writeUInt16BE(value, 0);

  return buffer;
}

export function u32(value: number): Buffer {

  const buffer = Buffer.alloc(4);

  buffer.writeUInt32BE(value >>> 0, 0);

  return buffer;
}

export function u64(value: number): Buffer {

  const buffer = Buffer.alloc(8);

  buffer.writeBigUInt64BE(BigInt(value), 0);

  return buffer;
}

/**
 * @returns The unity matrix as 36 bytes.
 */
export function unityMatrix(): Buffer {

  return Buffer.concat(UNITY_MATRIX.map((value) => u32(value)));
}

/**
 * Builds an AVCDecoderConfigurationRecord (ISO/IEC 14496-15 5.3.3.1) for one SPS and one PPS, with 4-byte NAL length fields.
 * @param pair - The parameter sets, NAL headers included.
 * @returns The avcC box.
 */
export function buildAvcC(pair: ParameterSetPair): Buffer {

  return box("avcC",
    Buffer.from([ 0x01, pair.sps[1], pair.sps[2], pair.sps[3], 0xFC | 0x03, 0xE0 | 0x01 ]),
    u16(pair.sps.length), pair.sps,
    u8(1), u16(pair.pps.length), pair.pps);
}

/**
 * Builds an avc1 visual sample entry for a parameter set pair. The picture size comes from the SPS.
 * @param pair - The parameter sets, NAL headers included.
 * @returns The avc1 box.
 * @throws If the SPS cannot be parsed.
 */
export function buildAvc1SampleEntry(pair: ParameterSetPair): Buffer {

  const sps = parseSps(pair.sps);
  const compressorName = Buffer.alloc(32);

  return box("avc1",
    Buffer.alloc(6), u16(1),
    Buffer.alloc(16),
    u16(sps.width), u16(sps.height),
    u32(0x00480000), u32(0x00480000),
    u32(0), u16(1),
    compressorName,
    u16(0x0018), u16(0xFFFF),
    buildAvcC(pair));
}

// Traversal.

/**
 * Location of a box inside a buffer.
 */
export interface BoxLocation {

  // Offset of the payload (after the header) within the buffer.
  payloadOffset: number;

  // Offset of the box header within the buffer.
  offset: number;

  // Total box size including the header.
  size: number;

  // The four-character box type.
  type: string;
}

/**
 * Iterates over consecutive boxes in a byte range. Stops at the first malformed header: a size smaller than its header, a box that overruns the range, or a
 * 64-bit size beyond 2^53.
 * @param data - The buffer holding the boxes.
 * @param start - Offset of the first box.
 * @param end - Offset one past the last byte of the range.
 * @param callback - Called with each box's location.
 */
export function iterateBoxes(data: Buffer, start: number, end: number, callback: (location: BoxLocation) => void): void {

  let pos = start;

  while((pos + BOX_HEADER_SIZE) <= end) {

    const sizeField = data.readUInt32BE(pos);

    let boxSize: number;
    let headerSize = BOX_HEADER_SIZE;

    if(sizeField === 1) {

      if((pos + EXTENDED_BOX_HEADER_SIZE) > end) {

        return;
      }

      const extended = data.readBigUInt64BE(pos + 8);

      if(extended > BigInt(Number.MAX_SAFE_INTEGER)) {

        return;
      }

      boxSize = Number(extended);
      headerSize = EXTENDED_BOX_HEADER_SIZE;
    } else if(sizeField === 0) {

      boxSize = end - pos;
    } else {

      boxSize = sizeField;
    }

    if((boxSize < headerSize) || ((pos + boxSize) > end)) {

      return;
    }

    callback({ offset: pos, payloadOffset: pos + headerSize, size: boxSize, type: data.toString("latin1", pos + 4, pos + 8) });

    pos += boxSize;
  }
}

/**
 * Lists the immediate children of a container box.
 * @param data - The buffer holding the container.
 * @param parent - The container's location.
 * @param skip - Bytes between the container's header and its first child (8 for stsd's FullBox header and entry count, for example).
 * @returns The child locations.
 */
export function childBoxes(data: Buffer, parent: BoxLocation, skip = 0): BoxLocation[] {

  const children: BoxLocation[] = [];

  iterateBoxes(data, parent.payloadOffset + skip, parent.offset + parent.size, (location) => children.push(location));

  return children;
}

/**
 * Finds the first immediate child of a given type.
 * @param data - The buffer holding the container.
 * @param parent - The container's location.
 * @param type - The child type to find.
 * @returns The child's location, or null.
 */
export function findChildBox(data: Buffer, parent: BoxLocation, type: string): Nullable<BoxLocation> {

  return childBoxes(data, parent).find((child) => child.type === type) ?? null;
}
