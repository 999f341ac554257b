/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for NalVault.
 */

/**
 * Formats a duration in milliseconds as a short human-readable string: "17s", "6m 39s", or "1h 23m".
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Formats a media duration in timescale ticks as seconds with millisecond precision (e.g., "11.500s").
 * @param ticks - Duration in timescale units.
 * @param timescale - Units per second.
 * @returns Formatted duration string.
 */
export function formatMediaDuration(ticks: number, timescale: number): string {

  return (ticks / timescale).toFixed(3) + "s";
}
