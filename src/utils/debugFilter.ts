/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for NalVault.
 */

/* Debug output is grouped into colon-separated categories ("recorder:writer", "consolidation", "preview:ffmpeg"). The NALVAULT_DEBUG environment variable, or the
 * --debug CLI flag, selects which categories produce output. A pattern string is a comma-separated list of:
 *
 *   - "*"            every category.
 *   - "name"         the category "name" and any "name:..." sub-category.
 *   - "-name"        exclude "name" and its sub-categories. Exclusions win over everything else, including "*".
 *
 * Examples:
 *   NALVAULT_DEBUG=recorder                       All recorder categories.
 *   NALVAULT_DEBUG=*,-recorder:writer,-codec:au   Everything except per-frame writer and access-unit chatter.
 */

// Fast-path flag. When false, LOG.debug returns before any category work.
let anyEnabled = false;

// Set when "*" appears in the pattern.
let wildcardEnabled = false;

const includeSet = new Set<string>();
const excludeSet = new Set<string>();

/**
 * Checks a category against a pattern set, honoring the prefix rule for sub-categories.
 * @param category - The category to check.
 * @param patterns - The patterns to match against.
 * @returns True if any pattern covers the category.
 */
function matchesAny(category: string, patterns: Set<string>): boolean {

  if(patterns.has(category)) {

    return true;
  }

  for(const pattern of patterns) {

    if(category.startsWith(pattern + ":")) {

      return true;
    }
  }

  return false;
}

/**
 * Configures the filter from a pattern string, replacing any previous configuration. An empty string disables debug output.
 * @param pattern - Comma-separated category patterns (e.g., "recorder,-recorder:writer").
 */
export function initDebugFilter(pattern: string): void {

  includeSet.clear();
  excludeSet.clear();
  wildcardEnabled = false;
  anyEnabled = false;

  const parts = pattern.split(",").map((p) => p.trim()).filter((p) => p.length > 0);

  for(const part of parts) {

    if(part === "*") {

      wildcardEnabled = true;
    } else if(part.startsWith("-")) {

      excludeSet.add(part.substring(1));
    } else {

      includeSet.add(part);
    }
  }

  anyEnabled = parts.length > 0;
}

/**
 * Checks whether debug output is enabled for a category.
 * @param category - The category (e.g., "recorder:governor").
 * @returns True if LOG.debug calls for this category should produce output.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!anyEnabled || matchesAny(category, excludeSet)) {

    return false;
  }

  return wildcardEnabled || matchesAny(category, includeSet);
}

/**
 * @returns True if at least one debug pattern is configured.
 */
export function isAnyDebugEnabled(): boolean {

  return anyEnabled;
}

/**
 * Rebuilds the active pattern string from the filter state. The wildcard comes first, then exclusions, then inclusions.
 * @returns The current pattern, or an empty string when debug output is off.
 */
export function getCurrentPattern(): string {

  if(!anyEnabled) {

    return "";
  }

  return [ ...(wildcardEnabled ? ["*"] : []), ...Array.from(excludeSet, (entry) => "-" + entry), ...includeSet ].join(",");
}

/**
 * A known debug category and what it covers.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

/**
 * Known debug categories, sorted alphabetically. Printed by --list-env.
 */
export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "codec:au", description: "Access unit boundaries and dropped malformed packets." },
  { category: "codec:params", description: "SPS/PPS changes and parsed picture dimensions." },
  { category: "consolidation", description: "Segment listing, merge lists, temp file handling, skipped cycles." },
  { category: "preview", description: "Preview decoder lifecycle: spawn, rebuild, teardown." },
  { category: "preview:ffmpeg", description: "FFmpeg stderr output from the preview decoder." },
  { category: "recorder", description: "Recorder state transitions and segment finalization." },
  { category: "recorder:governor", description: "Per-frame governor keep/drop decisions." },
  { category: "recorder:writer", description: "Writer back-pressure retries and per-frame appends." },
  { category: "replay", description: "File replay receiver progress." },
  { category: "session", description: "Session naming, auto-start, auto-stop, periodic passes." },
  { category: "slot", description: "Slot connect, replace, disconnect, and admission decisions." }
];
