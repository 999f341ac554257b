/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async timing helpers for NalVault.
 */

/**
 * Resolves after the given number of milliseconds. Used by bounded retry loops such as the recorder's writer readiness wait.
 * @param ms - The delay duration in milliseconds.
 * @returns A promise that resolves after the delay.
 */
export async function delay(ms: number): Promise<void> {

  return new Promise<void>((resolve) => {

    setTimeout(resolve, ms);
  });
}
