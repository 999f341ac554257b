/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * sps.ts: H.264 sequence parameter set and slice header parsing.
 */
import { BitReader, unescapeRbsp } from "./bitReader.js";

/* The recorder needs a handful of SPS fields: profile, compatibility flags and level for the avcC record, and the coded picture size for the avc1 sample entry and
 * the track header. Parsing stops at the frame cropping fields. Everything after them (VUI) is irrelevant here.
 */

/**
 * Fields extracted from an H.264 SPS.
 */
export interface SpsInfo {

  // constraint_set flags byte, copied into avcC as profile_compatibility.
  constraintFlags: number;

  // Cropped picture height in luma samples.
  height: number;

  levelIdc: number;
  profileIdc: number;

  // seq_parameter_set_id.
  spsId: number;

  // Cropped picture width in luma samples.
  width: number;
}

// Profiles whose SPS carries chroma format, bit depth, and scaling matrix fields (ITU-T H.264 7.3.2.1.1).
const HIGH_PROFILES = new Set([ 44, 83, 86, 100, 110, 118, 122, 128, 134, 135, 138, 139, 244 ]);

/**
 * Skips one scaling_list() structure.
 * @param reader - The bit reader.
 * @param size - 16 for 4x4 lists, 64 for 8x8 lists.
 */
function skipScalingList(reader: BitReader, size: number): void {

  let lastScale = 8;
  let nextScale = 8;

  for(let j = 0; j < size; j++) {

    if(nextScale !== 0) {

      nextScale = (lastScale + reader.readSE() + 256) % 256;
    }

    lastScale = (nextScale === 0) ? lastScale : nextScale;
  }
}

/**
 * Parses an H.264 SPS NAL.
 * @param nal - The SPS NAL, header byte included.
 * @returns The parsed fields.
 * @throws RangeError if the SPS is truncated, Error if the NAL is not an SPS.
 */
export function parseSps(nal: Buffer): SpsInfo {

  if((nal.length < 4) || ((nal[0] & 0x1F) !== 7)) {

    throw new Error("Not an H.264 SPS NAL unit.");
  }

  const reader = new BitReader(unescapeRbsp(nal.subarray(1)));
  const profileIdc = reader.readBits(8);
  const constraintFlags = reader.readBits(8);
  const levelIdc = reader.readBits(8);
  const spsId = reader.readUE();

  let chromaFormatIdc = 1;
  let separateColourPlane = false;

  if(HIGH_PROFILES.has(profileIdc)) {

    chromaFormatIdc = reader.readUE();

    if(chromaFormatIdc === 3) {

      separateColourPlane = reader.readFlag();
    }

    // bit_depth_luma_minus8, bit_depth_chroma_minus8, qpprime_y_zero_transform_bypass_flag.
    reader.readUE();
    reader.readUE();
    reader.skipBits(1);

    if(reader.readFlag()) {

      const listCount = (chromaFormatIdc === 3) ? 12 : 8;

      for(let i = 0; i < listCount; i++) {

        if(reader.readFlag()) {

          skipScalingList(reader, (i < 6) ? 16 : 64);
        }
      }
    }
  }

  // log2_max_frame_num_minus4.
  reader.readUE();

  const picOrderCntType = reader.readUE();

  if(picOrderCntType === 0) {

    reader.readUE();
  } else if(picOrderCntType === 1) {

    reader.skipBits(1);
    reader.readSE();
    reader.readSE();

    const cycleLength = reader.readUE();

    for(let i = 0; i < cycleLength; i++) {

      reader.readSE();
    }
  }

  // max_num_ref_frames, gaps_in_frame_num_value_allowed_flag.
  reader.readUE();
  reader.skipBits(1);

  const widthInMbs = reader.readUE() + 1;
  const heightInMapUnits = reader.readUE() + 1;
  const frameMbsOnly = reader.readFlag();

  if(!frameMbsOnly) {

    reader.skipBits(1);
  }

  // direct_8x8_inference_flag.
  reader.skipBits(1);

  let cropLeft = 0;
  let cropRight = 0;
  let cropTop = 0;
  let cropBottom = 0;

  if(reader.readFlag()) {

    cropLeft = reader.readUE();
    cropRight = reader.readUE();
    cropTop = reader.readUE();
    cropBottom = reader.readUE();
  }

  // Crop units per ITU-T H.264 equations 7-19 to 7-22.
  const monochrome = (chromaFormatIdc === 0) || separateColourPlane;
  const subWidthC = (chromaFormatIdc === 3) ? 1 : 2;
  const subHeightC = (chromaFormatIdc === 1) ? 2 : 1;
  const frameHeightFactor = frameMbsOnly ? 1 : 2;
  const cropUnitX = monochrome ? 1 : subWidthC;
  const cropUnitY = (monochrome ? 1 : subHeightC) * frameHeightFactor;

  return {

    constraintFlags,
    height: (frameHeightFactor * heightInMapUnits * 16) - ((cropTop + cropBottom) * cropUnitY),
    levelIdc,
    profileIdc,
    spsId,
    width: (widthInMbs * 16) - ((cropLeft + cropRight) * cropUnitX)
  };
}

/**
 * Reads first_mb_in_slice from an H.264 slice NAL. A value of zero marks the first slice of a new primary picture.
 * @param nal - The slice NAL, header byte included.
 * @returns The macroblock address of the slice's first macroblock.
 * @throws RangeError if the slice header is truncated.
 */
export function readFirstMbInSlice(nal: Buffer): number {

  return new BitReader(unescapeRbsp(nal.subarray(1, 9))).readUE();
}
