import type { MergeWarning } from "./types";

export type ErrorCode =
  | "UnreadableArchive"
  | "EmptyArchive"
  | "CorruptEntry"
  | "PathRejected"
  | "NoFormatsSelected"
  | "OperationInProgress"
  | "Cancelled"
  | "IOFailure"
  | "InvalidOutputPath"
  | "InvalidSource";

interface ErrorDetails {
  path?: string;
  entry?: string;
  cause?: unknown;
  warnings?: MergeWarning[];
}

export class ComicMergeError extends Error {
  readonly code: ErrorCode;
  readonly path?: string;
  readonly entry?: string;
  warnings: MergeWarning[];

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "ComicMergeError";
    this.code = code;
    this.path = details.path;
    this.entry = details.entry;
    this.warnings = details.warnings ?? [];
  }
}

export function isComicMergeError(error: unknown): error is ComicMergeError {
  return error instanceof ComicMergeError;
}

/**
 * Wrap a filesystem error from writing the output or staging area.
 * Errors that are already classified pass through unchanged.
 */
export function toIOFailure(error: unknown, path: string): ComicMergeError {
  if (isComicMergeError(error)) return error;

  const detail = error instanceof Error ? error.message : String(error);
  return new ComicMergeError("IOFailure", `Failed to write ${path}: ${detail}`, {
    path,
    cause: error,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
