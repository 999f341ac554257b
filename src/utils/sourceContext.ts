/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * sourceContext.ts: AsyncLocalStorage-based source context for log correlation.
 */
import { AsyncLocalStorage } from "node:async_hooks";

/* Work done on behalf of a source (ingesting its frames, finalizing its segments, consolidating its directory) runs inside a source context. The logger reads the
 * context and prefixes each line with the source name, so the many concurrent per-source promise chains stay readable in a shared log.
 *
 * The context follows async/await chains but not timers: a setInterval or setTimeout callback must re-enter the context with runWithSourceContext().
 */

/**
 * Metadata carried by a source context.
 */
export interface SourceContext {

  // Slot index (1-based), when the work belongs to a slot.
  slot?: number;

  // Source name used as the log prefix (the slot's service name).
  sourceName: string;
}

const sourceContextStorage = new AsyncLocalStorage<SourceContext>();

/**
 * Runs a function inside a source context.
 * @param context - The source context.
 * @param fn - The function to run.
 * @returns Whatever the function returns.
 */
export function runWithSourceContext<T>(context: SourceContext, fn: () => T): T {

  return sourceContextStorage.run(context, fn);
}

/**
 * @returns The current source name, or undefined outside a source context.
 */
export function getSourceName(): string | undefined {

  return sourceContextStorage.getStore()?.sourceName;
}
