/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * parameterSets.test.ts: Tests for the parameter set cache.
 */
import { buildPps, buildSps } from "../testing/h264.js";
import { describe, expect, it } from "vitest";
import { ParameterSetCache } from "./parameterSets.js";

describe("ParameterSetCache", () => {

  it("asks for a build only once both parameter sets are present", () => {

    const cache = new ParameterSetCache();

    expect(cache.shouldRebuild()).toBe(false);
    expect(cache.updateSps(buildSps({ height: 480, width: 640 }))).toBe(true);
    expect(cache.shouldRebuild()).toBe(false);
    expect(cache.current).toBeNull();
    expect(cache.updatePps(buildPps())).toBe(true);
    expect(cache.shouldRebuild()).toBe(true);
  });

  it("compares parameter sets by content", () => {

    const cache = new ParameterSetCache();

    cache.updateSps(buildSps({ height: 480, width: 640 }));
    cache.updatePps(buildPps());
    cache.markBuilt();

    expect(cache.updateSps(buildSps({ height: 480, width: 640 }))).toBe(false);
    expect(cache.updatePps(buildPps())).toBe(false);
    expect(cache.shouldRebuild()).toBe(false);

    expect(cache.updatePps(buildPps(3))).toBe(true);
    expect(cache.shouldRebuild()).toBe(true);

    cache.markBuilt();

    expect(cache.shouldRebuild()).toBe(false);
  });

  it("copies the bytes it stores", () => {

    const cache = new ParameterSetCache();
    const sps = buildSps({ height: 480, width: 640 });

    cache.updateSps(sps);
    cache.updatePps(buildPps());
    sps[1] = 0x00;

    expect(cache.current?.sps[1]).toBe(66);
  });

  it("forces a rebuild after invalidate and forgets everything after clear", () => {

    const cache = new ParameterSetCache();

    cache.updateSps(buildSps({ height: 480, width: 640 }));
    cache.updatePps(buildPps());
    cache.markBuilt();
    cache.invalidate();

    expect(cache.shouldRebuild()).toBe(true);

    cache.clear();

    expect(cache.current).toBeNull();
    expect(cache.shouldRebuild()).toBe(false);
    expect(() => cache.markBuilt()).toThrow("Cannot mark a context as built without both SPS and PPS.");
  });
});
