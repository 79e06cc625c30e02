/**
 * Utility functions for processing operations
 */

import { ComicMergeError } from "../errors";

/**
 * Yield to the event loop to prevent blocking.
 * Use this between CPU-intensive operations.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ComicMergeError("Cancelled", "Operation was cancelled");
  }
}

export function chapterEntryName(chapter: number, page: number, extension: string): string {
  return `ch${chapter}_${String(page).padStart(3, "0")}.${extension}`;
}
