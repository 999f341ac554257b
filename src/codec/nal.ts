/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * nal.ts: Annex-B NAL unit demultiplexing for NalVault.
 */
import type { VideoCodec } from "../types/index.js";

/* An Annex-B elementary stream has no container framing. NAL units are delimited by start codes, either the 3-byte 00 00 01 or the 4-byte 00 00 00 01, and the
 * start codes may fall anywhere in a packet. demuxAnnexB() turns one packet into an ordered list of NAL views:
 *
 * - A packet with no start code yields an empty list.
 * - The last NAL extends to the end of the packet.
 * - Zero bytes immediately before a start code belong to the start code (the leading zero of a 4-byte code, or trailing_zero_8bits), not to the preceding NAL.
 * - Adjacent start codes produce zero-length NALs, which are skipped.
 *
 * The returned views share memory with the input buffer. A caller that keeps them past the current call must own the buffer (the receiver bridge copies each packet
 * before demuxing it).
 */

// Types.

/**
 * A view of one NAL unit inside a demuxed buffer.
 */
export interface NalUnit {

  // The NAL bytes, header included, start code excluded. A subarray of the source buffer, not a copy.
  data: Buffer;

  // Length of the NAL in bytes.
  length: number;

  // Offset of the NAL's first byte within the source buffer.
  offset: number;

  // NAL unit type as decoded for the codec the buffer was demuxed with.
  type: number;
}

// Constants.

/**
 * H.264 NAL unit types (ITU-T H.264 Table 7-1) used by the access-unit assembler and the recorder.
 */
export const H264_NAL_TYPES = {

  AUD: 9,
  END_OF_SEQUENCE: 10,
  END_OF_STREAM: 11,
  FILLER: 12,
  IDR: 5,
  NON_IDR: 1,
  PPS: 8,
  SEI: 6,
  SPS: 7,
  SPS_EXTENSION: 13
} as const;

/**
 * H.265 NAL unit types (ITU-T H.265 Table 7-1) used by the preview decoder.
 */
export const H265_NAL_TYPES = {

  AUD: 35,
  CRA: 21,
  IDR_N_LP: 20,
  IDR_W_RADL: 19,
  PPS: 34,
  PREFIX_SEI: 39,
  SPS: 33,
  SUFFIX_SEI: 40,
  VPS: 32
} as const;

const START_CODE = Buffer.from([ 0x00, 0x00, 0x01 ]);

// Classification.

/**
 * Decodes the NAL unit type from the first byte of a NAL. H.264 keeps the type in the low 5 bits; H.265 keeps it in bits 1-6 of a two-byte header.
 * @param headerByte - The first byte of the NAL.
 * @param codec - The coding standard.
 * @returns The NAL unit type.
 */
export function nalType(headerByte: number, codec: VideoCodec = "h264"): number {

  return (codec === "h265") ? ((headerByte >> 1) & 0x3F) : (headerByte & 0x1F);
}

/**
 * Checks whether a NAL type carries coded picture data (a VCL NAL).
 * @param type - The NAL unit type.
 * @param codec - The coding standard.
 * @returns True for slice NALs.
 */
export function isVclType(type: number, codec: VideoCodec = "h264"): boolean {

  return (codec === "h265") ? (type < H265_NAL_TYPES.VPS) : ((type >= H264_NAL_TYPES.NON_IDR) && (type <= H264_NAL_TYPES.IDR));
}

/**
 * Checks whether a NAL type marks a random access point.
 * @param type - The NAL unit type.
 * @param codec - The coding standard.
 * @returns True for H.264 IDR slices and H.265 IRAP pictures.
 */
export function isKeyframeType(type: number, codec: VideoCodec = "h264"): boolean {

  return (codec === "h265") ? ((type >= 16) && (type <= H265_NAL_TYPES.CRA)) : (type === H264_NAL_TYPES.IDR);
}

// Demuxing.

/**
 * Splits an Annex-B buffer into NAL unit views.
 * @param buffer - The Annex-B bytes.
 * @param codec - The coding standard, which decides how NAL types are read.
 * @returns The NAL units in stream order.
 */
export function demuxAnnexB(buffer: Buffer, codec: VideoCodec = "h264"): NalUnit[] {

  const units: NalUnit[] = [];

  const pushUnit = (start: number, end: number): void => {

    if(end <= start) {

      return;
    }

    units.push({ data: buffer.subarray(start, end), length: end - start, offset: start, type: nalType(buffer[start], codec) });
  };

  let nalStart = -1;
  let position = buffer.indexOf(START_CODE);

  while(position !== -1) {

    if(nalStart !== -1) {

      let end = position;

      while((end > nalStart) && (buffer[end - 1] === 0x00)) {

        end--;
      }

      pushUnit(nalStart, end);
    }

    nalStart = position + START_CODE.length;
    position = buffer.indexOf(START_CODE, nalStart);
  }

  if(nalStart !== -1) {

    pushUnit(nalStart, buffer.length);
  }

  return units;
}

// Reframing.

/**
 * Converts NAL units to the length-prefixed form stored in MP4 samples: each NAL preceded by its length as a 4-byte big-endian integer.
 * @param nals - The NAL units, in order.
 * @returns A new buffer holding the length-prefixed NALs.
 */
export function toLengthPrefixed(nals: readonly Pick<NalUnit, "data">[]): Buffer {

  const total = nals.reduce((sum, nal) => sum + 4 + nal.data.length, 0);
  const output = Buffer.allocUnsafe(total);

  let position = 0;

  for(const nal of nals) {

    output.writeUInt32BE(nal.data.length, position);
    nal.data.copy(output, position + 4);
    position += 4 + nal.data.length;
  }

  return output;
}

/**
 * Converts NAL units back to Annex-B form with 4-byte start codes. Used to feed the preview decoder.
 * @param nals - The NAL units, in order.
 * @returns A new buffer holding the Annex-B stream.
 */
export function toAnnexB(nals: readonly Pick<NalUnit, "data">[]): Buffer {

  const parts: Buffer[] = [];

  for(const nal of nals) {

    parts.push(Buffer.from([ 0x00, 0x00, 0x00, 0x01 ]), nal.data);
  }

  return Buffer.concat(parts);
}
