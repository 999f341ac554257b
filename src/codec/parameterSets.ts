/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * parameterSets.ts: Per-source SPS/PPS cache with rebuild detection.
 */
import type { Nullable } from "../types/index.js";

/* Decoding and container contexts are built from one SPS/PPS pair. The cache holds the latest SPS and PPS seen on a source and the pair the current context was built
 * from, and answers one question: must the context be (re)built before the next frame?
 *
 * shouldRebuild() is true exactly when both parameter sets are present and either no context has been built yet, or the stored bytes differ from the pair last
 * built. Comparison is by content, so a sender that repeats identical parameter sets before every keyframe does not cause rebuilds.
 *
 * Each consumer (the recorder, the preview decoder) keeps its own cache, written only from that source's serialized path.
 */

/**
 * An SPS/PPS pair.
 */
export interface ParameterSetPair {

  pps: Buffer;
  sps: Buffer;
}

export class ParameterSetCache {

  private builtPps: Nullable<Buffer> = null;
  private builtSps: Nullable<Buffer> = null;
  private pps: Nullable<Buffer> = null;
  private sps: Nullable<Buffer> = null;

  /**
   * Stores an SPS. The bytes are copied.
   * @param data - The SPS NAL, header included.
   * @returns True if the stored SPS changed.
   */
  public updateSps(data: Buffer): boolean {

    if(this.sps?.equals(data)) {

      return false;
    }

    this.sps = Buffer.from(data);

    return true;
  }

  /**
   * Stores a PPS. The bytes are copied.
   * @param data - The PPS NAL, header included.
   * @returns True if the stored PPS changed.
   */
  public updatePps(data: Buffer): boolean {

    if(this.pps?.equals(data)) {

      return false;
    }

    this.pps = Buffer.from(data);

    return true;
  }

  /**
   * @returns The current SPS/PPS pair, or null until both have been seen.
   */
  public get current(): Nullable<ParameterSetPair> {

    return (this.sps && this.pps) ? { pps: this.pps, sps: this.sps } : null;
  }

  /**
   * @returns True if a context must be built before the next frame.
   */
  public shouldRebuild(): boolean {

    if(!this.sps || !this.pps) {

      return false;
    }

    if(!this.builtSps || !this.builtPps) {

      return true;
    }

    return !this.sps.equals(this.builtSps) || !this.pps.equals(this.builtPps);
  }

  /**
   * Records that a context was built from the current pair.
   * @returns The pair that was marked.
   * @throws If either parameter set is missing.
   */
  public markBuilt(): ParameterSetPair {

    const pair = this.current;

    if(!pair) {

      throw new Error("Cannot mark a context as built without both SPS and PPS.");
    }

    this.builtSps = pair.sps;
    this.builtPps = pair.pps;

    return pair;
  }

  /**
   * Forgets the built pair, so the next shouldRebuild() is true once both sets are present. Used on codec changes and teardown.
   */
  public invalidate(): void {

    this.builtSps = null;
    this.builtPps = null;
  }

  /**
   * Drops everything.
   */
  public clear(): void {

    this.invalidate();
    this.sps = null;
    this.pps = null;
  }
}
