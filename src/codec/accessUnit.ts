/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * accessUnit.ts: Access unit assembly from H.264 NAL units.
 */
import { H264_NAL_TYPES, isVclType } from "./nal.js";
import { LOG } from "../utils/logger.js";
import type { NalUnit } from "./nal.js";
import type { Nullable } from "../types/index.js";
import { readFirstMbInSlice } from "./sps.js";

/* NAL units arrive in packets whose boundaries need not match picture boundaries. The assembler groups them into access units using the H.264 rules
 * (ITU-T H.264 7.4.1.2.3): once the current access unit holds a picture, any of the following starts a new one:
 *
 * - an access unit delimiter, SPS, PPS, or SEI NAL, or a NAL of type 14 through 18;
 * - a slice whose first_mb_in_slice is 0, which is the first slice of the next primary picture.
 *
 * Each access unit therefore holds at most one primary picture. Senders that deliver exactly one frame per packet are the common case, so by default the assembler
 * also closes the access unit at the end of each packet.
 *
 * An access unit's timestamp is the capture timestamp of the packet that delivered its first slice. Access units without a slice (parameter sets alone) take the
 * timestamp of their first NAL's packet.
 */

/**
 * A complete access unit.
 */
export interface AccessUnit {

  // True if the access unit contains a slice.
  hasPicture: boolean;

  // True if the access unit contains an IDR slice.
  keyframe: boolean;

  // The NAL units, in stream order.
  nals: NalUnit[];

  // Capture timestamp in nanoseconds.
  timestamp: bigint;
}

/**
 * Options for the assembler.
 */
export interface AccessUnitAssemblerOptions {

  // Close the current access unit at the end of every packet. Default: true.
  flushOnPacketEnd?: boolean;
}

// NAL types that open a new access unit once a picture has been seen.
const AU_START_TYPES = new Set<number>([ H264_NAL_TYPES.SEI, H264_NAL_TYPES.SPS, H264_NAL_TYPES.PPS, H264_NAL_TYPES.AUD, 14, 15, 16, 17, 18 ]);

export class AccessUnitAssembler {

  private current: NalUnit[] = [];
  private currentHasPicture = false;
  private currentKeyframe = false;
  private currentTimestamp: Nullable<bigint> = null;
  private readonly flushOnPacketEnd: boolean;

  constructor(options: AccessUnitAssemblerOptions = {}) {

    this.flushOnPacketEnd = options.flushOnPacketEnd ?? true;
  }

  /**
   * Adds one packet's NAL units.
   * @param nals - The NAL units from one packet.
   * @param timestamp - The packet's capture timestamp in nanoseconds.
   * @returns The access units completed by this packet, in order.
   */
  public push(nals: readonly NalUnit[], timestamp: bigint): AccessUnit[] {

    const completed: AccessUnit[] = [];

    for(const nal of nals) {

      if(this.currentHasPicture && this.startsNewAccessUnit(nal)) {

        completed.push(this.take());
      }

      if(isVclType(nal.type)) {

        if(!this.currentHasPicture) {

          this.currentTimestamp = timestamp;
        }

        this.currentHasPicture = true;
        this.currentKeyframe ||= (nal.type === H264_NAL_TYPES.IDR);
      }

      this.currentTimestamp ??= timestamp;
      this.current.push(nal);
    }

    if(this.flushOnPacketEnd && (this.current.length > 0)) {

      completed.push(this.take());
    }

    return completed;
  }

  /**
   * Closes and returns the access unit in progress, if any.
   * @returns The pending access unit, or null.
   */
  public flush(): Nullable<AccessUnit> {

    return (this.current.length > 0) ? this.take() : null;
  }

  /**
   * Drops the access unit in progress.
   */
  public reset(): void {

    this.current = [];
    this.currentHasPicture = false;
    this.currentKeyframe = false;
    this.currentTimestamp = null;
  }

  /**
   * Decides whether a NAL opens a new access unit, given that the current one already holds a picture.
   * @param nal - The NAL unit.
   * @returns True at an access unit boundary.
   */
  private startsNewAccessUnit(nal: NalUnit): boolean {

    if(AU_START_TYPES.has(nal.type)) {

      return true;
    }

    if(!isVclType(nal.type)) {

      return false;
    }

    try {

      return readFirstMbInSlice(nal.data) === 0;
    } catch(error) {

      // A slice too short to carry a header is treated as a continuation of the current picture.
      LOG.debug("codec:au", "Unreadable slice header (%d bytes): %s.", nal.length, error instanceof Error ? error.message : String(error));

      return false;
    }
  }

  private take(): AccessUnit {

    const unit: AccessUnit = {

      hasPicture: this.currentHasPicture,
      keyframe: this.currentKeyframe,
      nals: this.current,
      timestamp: this.currentTimestamp ?? 0n
    };

    this.reset();

    return unit;
  }
}
