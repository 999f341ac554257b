/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.test.ts: Tests for the buffered log file sink.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { FileLogSink } from "./fileLogger.js";
import { join } from "node:path";
import { tmpdir } from "node:os";

// 100 lines of nine bytes each: "line-000\n" through "line-099\n".
const LINES = Array.from({ length: 100 }, (_, i) => [ "line-", String(i).padStart(3, "0"), "\n" ].join(""));

describe("FileLogSink", () => {

  let dir: string;
  let logPath: string;

  beforeEach(async () => {

    dir = await mkdtemp(join(tmpdir(), "nalvault-log-"));
    logPath = join(dir, "nalvault.log");
  });

  afterEach(async () => {

    await rm(dir, { force: true, recursive: true });
  });

  it("formats info, warning and debug lines", async () => {

    const sink = new FileLogSink(logPath, 1024 * 1024);

    await sink.open();

    sink.write("info", "Recording to /data.");
    sink.write("warn", "Frame dropped.", "\x1b[33m");
    sink.write("debug", "Rotation requested.", undefined, "recorder");

    await sink.flush();
    sink.close();

    const lines = (await readFile(logPath, "utf-8")).split("\n");
    const stamp = "\\[\\d{4}/\\d{2}/\\d{2} \\d{2}:\\d{2}:\\d{2}\\.\\d{3}\\] ";

    expect(lines).toHaveLength(4);
    expect(lines[0]).toMatch(new RegExp("^" + stamp + "Recording to /data\\.$"));
    expect(lines[1]).toMatch(new RegExp("^" + stamp + "\\x1b\\[33m\\[WARN\\] Frame dropped\\.\\x1b\\[0m$"));
    expect(lines[2]).toMatch(new RegExp("^" + stamp + "\\[DEBUG:recorder\\] Rotation requested\\.$"));
    expect(lines[3]).toBe("");
  });

  it("cuts an oversized file down to the most recent half of the maximum on a line boundary", async () => {

    await writeFile(logPath, LINES.join(""));

    const sink = new FileLogSink(logPath, 400);

    await sink.checkAndTrim();

    expect(await readFile(logPath, "utf-8")).toBe(LINES.slice(78).join(""));
  });

  it("leaves a file within the maximum alone", async () => {

    await writeFile(logPath, LINES.join(""));

    await new FileLogSink(logPath, 900).checkAndTrim();

    expect(await readFile(logPath, "utf-8")).toBe(LINES.join(""));
  });

  it("checks the file size every hundred writes", async () => {

    await writeFile(logPath, LINES.join(""));

    const sink = new FileLogSink(logPath, 400);

    for(let i = 0; i < 100; i++) {

      sink.write("info", "entry " + String(i));
    }

    await vi.waitFor(async () => {

      expect(await readFile(logPath, "utf-8")).toBe(LINES.slice(78).join(""));
    });

    sink.close();
  });
});
