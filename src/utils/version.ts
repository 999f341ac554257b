/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup for NalVault.
 */
import type { Nullable } from "../types/index.js";
import { fileURLToPath } from "node:url";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

let cachedPackageVersion: Nullable<string> = null;

/**
 * Reads the version from package.json. This file lives in src/utils/ or dist/utils/, so package.json is two directories up in both layouts.
 * @returns The version string, or "0.0.0" if package.json cannot be read.
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  try {

    const currentDir = fileURLToPath(new URL(".", import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(resolve(currentDir, "../../package.json"), "utf-8"));

    if((typeof packageJson === "object") && (packageJson !== null) && ("version" in packageJson) && (typeof packageJson.version === "string")) {

      cachedPackageVersion = packageJson.version;

      return cachedPackageVersion;
    }
  } catch {

    return "0.0.0";
  }

  return "0.0.0";
}
