/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * governor.test.ts: Tests for the frame-rate governor.
 */
import { describe, expect, it } from "vitest";
import { FrameRateGovernor } from "./governor.js";

function run(governor: FrameRateGovernor, pattern: boolean[]): boolean[] {

  return pattern.map((keyframe) => governor.admit(keyframe));
}

describe("FrameRateGovernor", () => {

  it("keeps 15 of an IDR followed by 29 P-frames at ratio 2", () => {

    const kept = run(new FrameRateGovernor(2), [ true, ...new Array<boolean>(29).fill(false) ]);

    expect(kept.filter(Boolean)).toHaveLength(15);
    expect(kept.slice(0, 5)).toEqual([ true, false, true, false, true ]);
  });

  it("always keeps keyframes", () => {

    const governor = new FrameRateGovernor(2);

    // Counter values 1 and 2: the keyframe lands on a multiple of the ratio and is still kept.
    expect(run(governor, [ false, true ])).toEqual([ true, true ]);
    expect(run(new FrameRateGovernor(3), [ true, true, true, true ])).toEqual([ true, true, true, true ]);
  });

  it("keeps everything at ratio 1", () => {

    expect(run(new FrameRateGovernor(1), [ true, false, false, false ])).toEqual([ true, true, true, true ]);
  });

  it("records one access unit in every ratio", () => {

    // Counters 4 and 7 are one past a multiple of 3.
    expect(run(new FrameRateGovernor(3), [ true, false, false, false, false, false, false ])).toEqual([ true, false, false, true, false, false, true ]);
  });

  it("carries the counter phase across keyframes", () => {

    const governor = new FrameRateGovernor(2);

    // First GOP: counters 1-4 keep 1 and 3. Second GOP: counters 5-8 drop the P-frames at 6 and 8.
    expect(run(governor, [ true, false, false, false ])).toEqual([ true, false, true, false ]);
    expect(run(governor, [ true, false, false, false ])).toEqual([ true, false, true, false ]);

    // An odd GOP length shifts the phase: counters 9-11, then 12-15.
    expect(run(governor, [ true, false, false ])).toEqual([ true, false, true ]);
    expect(run(governor, [ true, false, false, false ])).toEqual([ true, true, false, true ]);
    expect(governor.count).toBe(15);
  });

  it("restarts the cadence after reset", () => {

    const governor = new FrameRateGovernor(2);

    run(governor, [ true, false, false ]);
    governor.reset();

    expect(governor.count).toBe(0);
    expect(run(governor, [ false, false ])).toEqual([ true, false ]);
  });
});
