import { basename } from "path";

import { ComicMergeError, errorMessage, isComicMergeError } from "../errors";
import type {
  ArchiveKind,
  ImageFormat,
  InspectionReport,
  SourceEntry,
  SourceInspection,
} from "../types";
import { ArchiveReader, detectArchiveKind, withArchive } from "./archive-reader";

export { ArchiveReader, ArchiveHandle, withArchive, detectArchiveKind, imageFormatOf } from "./archive-reader";
export { compareNatural, sortNatural } from "./natural-sort";
export { validateEntryName } from "./path-validator";
export { ImageExtractor } from "./image-extractor";
export { MergeEngine, resolveNameCollisions } from "./merge-engine";
export { ProgressReporter, MergeProgressReporter } from "./progress";
export { isWellFormedComicInfo } from "./comic-info";

export interface SourceInput {
  path: string;
  kind?: ArchiveKind;
  chapter?: number;
}

/**
 * Build the ordered source list for a merge. Kinds not given by the caller are
 * taken from the file extension.
 */
export function toSourceEntries(inputs: readonly SourceInput[]): SourceEntry[] {
  return inputs.map((input, position) => {
    const kind = input.kind ?? detectArchiveKind(input.path);
    if (!kind) {
      throw new ComicMergeError("InvalidSource", `Unsupported source type: ${basename(input.path)} (expected .cbz or .zip)`, {
        path: input.path,
      });
    }
    return { path: input.path, position, kind, chapter: input.chapter };
  });
}

/**
 * Open each source and report what a merge would get from it.
 */
export async function inspectSources(
  sources: readonly SourceEntry[],
  reader: ArchiveReader = new ArchiveReader(),
): Promise<InspectionReport> {
  const results: SourceInspection[] = [];

  for (const source of sources) {
    try {
      const inspection = await withArchive(reader, source.path, async (handle) => {
        const listing = reader.listImageEntries(handle);
        const formats = [...new Set<ImageFormat>(listing.entries.map((entry) => entry.extension))];
        const mimeTypes = [...new Set(listing.entries.map((entry) => entry.mimeType))];
        const comicInfo = await reader.readComicInfo(handle);
        return {
          path: source.path,
          kind: source.kind,
          ok: true,
          pageCount: listing.entries.length,
          fileSize: handle.size,
          formats,
          mimeTypes,
          hasComicInfo: comicInfo !== null,
        };
      });
      results.push(inspection);
    } catch (error) {
      results.push({
        path: source.path,
        kind: source.kind,
        ok: false,
        pageCount: 0,
        fileSize: 0,
        formats: [],
        mimeTypes: [],
        hasComicInfo: false,
        error: {
          code: isComicMergeError(error) ? error.code : "UnreadableArchive",
          message: errorMessage(error),
        },
      });
    }
  }

  const valid = results.filter((result) => result.ok);
  return {
    sources: results,
    totalSize: valid.reduce((sum, result) => sum + result.fileSize, 0),
    totalPages: valid.reduce((sum, result) => sum + result.pageCount, 0),
    validCount: valid.length,
    invalidCount: results.length - valid.length,
  };
}
