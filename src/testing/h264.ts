/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * h264.ts: Synthetic H.264 bitstream builders for tests.
 */

/* These builders produce small, syntactically valid H.264 NAL units: a baseline SPS with optional cropping, a matching PPS, and slices whose headers carry
 * first_mb_in_slice and slice_type followed by opaque filler. The filler never contains a zero byte, so it cannot emulate a start code. Nothing here is decodable
 * video; it only has to survive demuxing, SPS parsing and the MP4 round trip.
 */

export class BitWriter {

  private bits: number[] = [];

  public writeBits(value: number, count: number): void {

    for(let i = count - 1; i >= 0; i--) {

      this.bits.push(Math.floor(value / (2 ** i)) % 2);
    }
  }

  public writeFlag(flag: boolean): void {

    this.bits.push(flag ? 1 : 0);
  }

  public writeUE(value: number): void {

    const codeNum = value + 1;
    const length = Math.floor(Math.log2(codeNum));

    this.writeBits(0, length);
    this.writeBits(codeNum, length + 1);
  }

  public writeSE(value: number): void {

    this.writeUE((value > 0) ? ((2 * value) - 1) : (-2 * value));
  }

  /**
   * Appends rbsp_trailing_bits: a stop bit, then zero bits up to the next byte boundary.
   */
  public writeTrailingBits(): void {

    this.bits.push(1);

    while((this.bits.length % 8) !== 0) {

      this.bits.push(0);
    }
  }

  /**
   * @returns The written bits, zero-padded to a whole number of bytes.
   */
  public toBuffer(): Buffer {

    const output = Buffer.alloc(Math.ceil(this.bits.length / 8));

    this.bits.forEach((bit, index) => {

      if(bit) {

        output[index >> 3] |= 0x80 >> (index & 7);
      }
    });

    return output;
  }
}

/**
 * Inserts emulation prevention bytes.
 * @param rbsp - The raw payload.
 * @returns The escaped payload.
 */
export function escapeRbsp(rbsp: Buffer): Buffer {

  const output: number[] = [];

  let zeros = 0;

  for(const byte of rbsp) {

    if((zeros >= 2) && (byte <= 0x03)) {

      output.push(0x03);
      zeros = 0;
    }

    output.push(byte);
    zeros = (byte === 0x00) ? (zeros + 1) : 0;
  }

  return Buffer.from(output);
}

export interface SpsOptions {

  height: number;
  levelIdc?: number;
  width: number;
}

/**
 * Builds a baseline-profile SPS NAL (header included) for a picture size. Sizes that are not multiples of 16 are expressed with frame cropping.
 * @param options - Picture size and level.
 * @returns The SPS NAL.
 */
export function buildSps(options: SpsOptions): Buffer {

  const writer = new BitWriter();
  const widthInMbs = Math.ceil(options.width / 16);
  const heightInMbs = Math.ceil(options.height / 16);
  const cropRight = ((widthInMbs * 16) - options.width) / 2;
  const cropBottom = ((heightInMbs * 16) - options.height) / 2;

  // profile_idc 66, constraint_set1_flag, level_idc.
  writer.writeBits(66, 8);
  writer.writeBits(0x40, 8);
  writer.writeBits(options.levelIdc ?? 31, 8);

  // seq_parameter_set_id, log2_max_frame_num_minus4, pic_order_cnt_type 2, max_num_ref_frames, gaps_in_frame_num_value_allowed_flag.
  writer.writeUE(0);
  writer.writeUE(0);
  writer.writeUE(2);
  writer.writeUE(1);
  writer.writeFlag(false);

  writer.writeUE(widthInMbs - 1);
  writer.writeUE(heightInMbs - 1);

  // frame_mbs_only_flag, direct_8x8_inference_flag.
  writer.writeFlag(true);
  writer.writeFlag(true);

  if((cropRight > 0) || (cropBottom > 0)) {

    writer.writeFlag(true);
    writer.writeUE(0);
    writer.writeUE(cropRight);
    writer.writeUE(0);
    writer.writeUE(cropBottom);
  } else {

    writer.writeFlag(false);
  }

  // vui_parameters_present_flag.
  writer.writeFlag(false);
  writer.writeTrailingBits();

  return Buffer.concat([ Buffer.from([0x67]), escapeRbsp(writer.toBuffer()) ]);
}

/**
 * Builds a minimal PPS NAL referencing SPS 0.
 * @param initQp - pic_init_qp_minus26, varied to produce distinct PPS bytes.
 * @returns The PPS NAL.
 */
export function buildPps(initQp = 0): Buffer {

  const writer = new BitWriter();

  writer.writeUE(0);
  writer.writeUE(0);
  writer.writeFlag(false);
  writer.writeFlag(false);
  writer.writeUE(0);
  writer.writeUE(0);
  writer.writeUE(0);
  writer.writeFlag(false);
  writer.writeBits(0, 2);
  writer.writeSE(initQp);
  writer.writeSE(0);
  writer.writeSE(0);
  writer.writeFlag(true);
  writer.writeFlag(false);
  writer.writeFlag(false);
  writer.writeTrailingBits();

  return Buffer.concat([ Buffer.from([0x68]), escapeRbsp(writer.toBuffer()) ]);
}

export interface SliceOptions {

  // first_mb_in_slice. Default: 0.
  firstMb?: number;

  // IDR slice when true, non-IDR otherwise.
  keyframe: boolean;

  // Varies the filler bytes. Default: 1.
  seed?: number;

  // Total NAL size in bytes. Default: 32.
  size?: number;
}

/**
 * Builds a slice NAL with a real header prefix and zero-free filler.
 * @param options - Slice options.
 * @returns The slice NAL.
 */
export function buildSlice(options: SliceOptions): Buffer {

  const writer = new BitWriter();
  const size = options.size ?? 32;
  const seed = options.seed ?? 1;

  writer.writeUE(options.firstMb ?? 0);
  writer.writeUE(options.keyframe ? 7 : 5);
  writer.writeUE(0);
  writer.writeTrailingBits();

  const header = Buffer.concat([ Buffer.from([options.keyframe ? 0x65 : 0x41]), writer.toBuffer() ]);
  const filler = Buffer.alloc(Math.max(0, size - header.length));

  for(let i = 0; i < filler.length; i++) {

    filler[i] = (((seed * 31) + (i * 7)) % 254) + 1;
  }

  return Buffer.concat([ header, filler ]);
}

/**
 * Joins NAL units into an Annex-B buffer.
 * @param nals - The NAL units.
 * @param fourByteStartCodes - Use 00 00 00 01 instead of 00 00 01. Default: true.
 * @returns The Annex-B bytes.
 */
export function annexB(nals: readonly Buffer[], fourByteStartCodes = true): Buffer {

  const startCode = fourByteStartCodes ? Buffer.from([ 0x00, 0x00, 0x00, 0x01 ]) : Buffer.from([ 0x00, 0x00, 0x01 ]);

  return Buffer.concat(nals.flatMap((nal) => [ startCode, nal ]));
}
