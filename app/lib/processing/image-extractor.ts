import { mkdir, writeFile } from "fs/promises";
import { basename, join } from "path";

import { ComicMergeError, errorMessage, isComicMergeError, toIOFailure } from "../errors";
import type {
  ArchiveEntry,
  ChapterGroup,
  ExtractOptions,
  ImageFormat,
  MergeWarning,
  RenamedEntry,
} from "../types";
import { ArchiveReader, rejectionWarning, withArchive } from "./archive-reader";
import type { ArchiveHandle, ArchiveListing } from "./archive-reader";
import { discardFile } from "../storage";
import { validateEntryName } from "./path-validator";
import { createExtractionReporter } from "./progress";
import { chapterEntryName, throwIfCancelled, yieldToEventLoop } from "./utils";

/**
 * Keep the listed entries whose format was selected, in natural order.
 */
export function selectEntries(
  listing: ArchiveListing,
  formats: ReadonlySet<ImageFormat>,
): ArchiveEntry[] {
  return listing.entries.filter((entry) => formats.has(entry.extension));
}

function describeFormats(formats: ReadonlySet<ImageFormat>): string {
  return [...formats].join(", ");
}

/**
 * Extracts the images of one archive into a directory as a numbered chapter:
 * ch{chapter}_{page:03}.{ext}, pages following natural order of the entry names.
 */
export class ImageExtractor {
  constructor(private readonly reader: ArchiveReader = new ArchiveReader()) {}

  async extract(
    sourcePath: string,
    chapterIndex: number,
    selectedFormats: ReadonlySet<ImageFormat>,
    destinationDir: string,
    options: ExtractOptions = {},
  ): Promise<ChapterGroup> {
    if (selectedFormats.size === 0) {
      throw new ComicMergeError("NoFormatsSelected", "Select at least one image format to extract", {
        path: sourcePath,
      });
    }
    if (!Number.isInteger(chapterIndex) || chapterIndex < 1) {
      throw new ComicMergeError("InvalidSource", `Chapter number must be a positive integer, got ${chapterIndex}`, {
        path: sourcePath,
      });
    }

    const { strict = false, signal } = options;
    const reporter = createExtractionReporter(sourcePath, options.onProgress);
    const warnings: MergeWarning[] = [];
    const entries: RenamedEntry[] = [];

    try {
      await mkdir(destinationDir, { recursive: true });
    } catch (error) {
      throw toIOFailure(error, destinationDir);
    }

    try {
      await withArchive(this.reader, sourcePath, async (handle) => {
        const listing = this.reader.listImageEntries(handle);

        for (const item of listing.rejected) {
          const warning = rejectionWarning(sourcePath, item);
          if (strict && item.code === "PathRejected") {
            throw new ComicMergeError("PathRejected", warning.message, {
              path: sourcePath,
              entry: item.name,
            });
          }
          console.warn(`[Extract] ${warning.message}`);
          warnings.push(warning);
        }

        const selected = selectEntries(listing, selectedFormats);
        if (selected.length === 0) {
          throw new ComicMergeError(
            "EmptyArchive",
            `No images of the selected formats (${describeFormats(selectedFormats)}) in ${sourcePath}`,
            { path: sourcePath },
          );
        }

        reporter.publish({ entriesFound: selected.length, phase: "extracting" });

        for (const entry of selected) {
          throwIfCancelled(signal);
          // Pages lost to corrupt entries leave no gap in the numbering
          const page = entries.length + 1;
          const renamed = await this.extractEntry(
            handle,
            entry,
            chapterIndex,
            page,
            destinationDir,
            strict,
            warnings,
          );
          if (!renamed) continue;

          entries.push(renamed);
          reporter.publish({ entriesExtracted: entries.length, currentFile: entry.name });
          await yieldToEventLoop();
        }
      });

      if (entries.length === 0) {
        throw new ComicMergeError("CorruptEntry", `No readable images survived extraction of ${sourcePath}`, {
          path: sourcePath,
        });
      }
    } catch (error) {
      await Promise.all(entries.map((entry) => discardFile(entry.stagedPath)));
      const failure = isComicMergeError(error)
        ? error
        : new ComicMergeError("UnreadableArchive", errorMessage(error), { path: sourcePath, cause: error });
      failure.warnings = [...warnings, ...failure.warnings];
      reporter.publish({
        phase: failure.code === "Cancelled" ? "cancelled" : "failed",
        currentFile: null,
        error: failure.message,
      });
      throw failure;
    }

    reporter.publish({ phase: "done", currentFile: null });
    console.log(`[Extract] ${basename(sourcePath)} → ${entries.length} pages as chapter ${chapterIndex}`);

    return { chapter: chapterIndex, sourcePath, entries, warnings };
  }

  private async extractEntry(
    handle: ArchiveHandle,
    entry: ArchiveEntry,
    chapter: number,
    page: number,
    destinationDir: string,
    strict: boolean,
    warnings: MergeWarning[],
  ): Promise<RenamedEntry | null> {
    let data: Buffer;
    try {
      data = await this.reader.readEntry(handle, entry);
    } catch (error) {
      if (!isComicMergeError(error) || error.code !== "CorruptEntry") throw error;
      console.warn(`[Extract] ${error.message}`);
      warnings.push({ code: "CorruptEntry", message: error.message, source: handle.path, entry: entry.name });
      return null;
    }

    const targetName = chapterEntryName(chapter, page, entry.extension);
    const validation = validateEntryName(targetName, destinationDir);
    if (!validation.ok) {
      const message = `Target name ${targetName} rejected: ${validation.reason}`;
      if (strict) {
        throw new ComicMergeError("PathRejected", message, { path: handle.path, entry: entry.name });
      }
      console.warn(`[Extract] ${message}`);
      warnings.push({ code: "PathRejected", message, source: handle.path, entry: entry.name });
      return null;
    }

    const stagedPath = join(destinationDir, validation.name);
    try {
      await writeFile(stagedPath, data);
    } catch (error) {
      throw toIOFailure(error, stagedPath);
    }

    return {
      chapter,
      page,
      targetName,
      originalName: entry.name,
      extension: entry.extension,
      stagedPath,
      size: data.length,
    };
  }
}
