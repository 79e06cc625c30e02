import JSZip from "jszip";
import { createWriteStream, createReadStream } from "fs";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { basename, join, resolve } from "path";

import { ComicMergeError, errorMessage, isComicMergeError, toIOFailure } from "../errors";
import { SUPPORTED_FORMATS } from "../types";
import type {
  ChapterGroup,
  ImageFormat,
  MergeOptions,
  MergeResult,
  MergeWarning,
  RenamedEntry,
  SkippedSource,
  SourceEntry,
} from "../types";
import {
  createStagingDir,
  discardFile,
  formatFileSize,
  promoteOutput,
  removeStagingDir,
  temporaryOutputPath,
  validateOutputPath,
} from "../storage";
import { ArchiveReader, withArchive } from "./archive-reader";
import { COMIC_INFO_ENTRY, isWellFormedComicInfo } from "./comic-info";
import { ImageExtractor, selectEntries } from "./image-extractor";
import { MergeProgressReporter } from "./progress";
import { chapterEntryName, throwIfCancelled, yieldToEventLoop } from "./utils";

// Fixed entry timestamp so identical inputs give byte-identical archives
const ENTRY_DATE = new Date(Date.UTC(2000, 0, 1));
const ALL_FORMATS: ReadonlySet<ImageFormat> = new Set(SUPPORTED_FORMATS);

// Output paths with a merge in flight, across all engine instances
const activeOutputs = new Set<string>();

interface SourcePlan {
  source: SourceEntry;
  chapter: number;
  formats: ReadonlySet<ImageFormat>;
  entryCount: number;
  comicInfo: string | null;
}

interface MergeState {
  warnings: MergeWarning[];
  skippedSources: SkippedSource[];
}

/**
 * Final entry order and names. Pages keep their per-chapter numbering unless two
 * groups produced the same name; then every chapter is renumbered by position in
 * the concatenated stream.
 */
export function resolveNameCollisions(groups: readonly ChapterGroup[]): {
  entries: RenamedEntry[];
  resequenced: boolean;
} {
  const entries = groups.flatMap((group) => group.entries);
  const seen = new Set<string>();
  const collides = entries.some((entry) => {
    if (seen.has(entry.targetName)) return true;
    seen.add(entry.targetName);
    return false;
  });
  if (!collides) return { entries, resequenced: false };

  const pagesByChapter = new Map<number, number>();
  const renumbered = entries.map((entry) => {
    const page = (pagesByChapter.get(entry.chapter) ?? 0) + 1;
    pagesByChapter.set(entry.chapter, page);
    return { ...entry, page, targetName: chapterEntryName(entry.chapter, page, entry.extension) };
  });
  return { entries: renumbered, resequenced: true };
}

function stagedEntryStream(path: string, onDrained: () => void): Readable {
  // Opened only when the archive writer reaches this entry
  async function* chunks(): AsyncGenerator<Buffer> {
    for await (const chunk of createReadStream(path)) {
      yield chunk;
    }
    onDrained();
  }
  return Readable.from(chunks(), { objectMode: false });
}

function sourceFailureCode(error: unknown): string {
  return isComicMergeError(error) ? error.code : "UnreadableArchive";
}

/**
 * Merges an ordered list of comic archives into one CBZ. One merge runs at a
 * time per engine; the output only appears once every source was processed.
 */
export class MergeEngine {
  private readonly reader: ArchiveReader;
  private readonly extractor: ImageExtractor;
  private controller: AbortController | null = null;

  constructor(reader: ArchiveReader = new ArchiveReader(), extractor?: ImageExtractor) {
    this.reader = reader;
    this.extractor = extractor ?? new ImageExtractor(reader);
  }

  get isBusy(): boolean {
    return this.controller !== null;
  }

  /** Request cancellation of the running merge; takes effect at the next entry. */
  cancel(): boolean {
    if (!this.controller) return false;
    this.controller.abort();
    return true;
  }

  async merge(sources: readonly SourceEntry[], options: MergeOptions): Promise<MergeResult> {
    const outputKey = resolve(options.outputPath);
    if (this.controller || activeOutputs.has(outputKey)) {
      throw new ComicMergeError("OperationInProgress", "A merge is already running", {
        path: options.outputPath,
      });
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    this.controller = controller;
    activeOutputs.add(outputKey);
    try {
      return await this.run(sources, options, controller.signal);
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
      activeOutputs.delete(outputKey);
      this.controller = null;
    }
  }

  private async run(
    sources: readonly SourceEntry[],
    options: MergeOptions,
    signal: AbortSignal,
  ): Promise<MergeResult> {
    const { strict = false, preserveComicInfo = true, overwrite = false } = options;
    const reporter = new MergeProgressReporter(sources.length, options.onProgress);
    const state: MergeState = { warnings: [], skippedSources: [] };
    let stagingDir: string | null = null;
    let tempPath: string | null = null;

    console.log(`[Merge] Starting merge of ${sources.length} sources → ${options.outputPath}`);

    try {
      reporter.phase("validating");
      const outputPath = await validateOutputPath(options.outputPath, overwrite);
      const plans = await this.validate(sources, outputPath, options.selectedFormats, strict, state, reporter, signal);
      const totalEntries = plans.reduce((sum, plan) => sum + plan.entryCount, 0);
      reporter.publish({ totalEntries });

      stagingDir = await createStagingDir(options.stagingRoot).catch((error: unknown) => {
        throw toIOFailure(error, options.stagingRoot ?? "staging directory");
      });

      const processed: { plan: SourcePlan; group: ChapterGroup }[] = [];
      for (const [index, plan] of plans.entries()) {
        throwIfCancelled(signal);
        const group = await this.processSource(plan, index, stagingDir, strict, state, reporter, signal);
        if (group) processed.push({ plan, group });
        reporter.sourceCompleted();
      }

      if (processed.length === 0) {
        throw new ComicMergeError("EmptyArchive", "None of the sources produced any pages");
      }

      // Pages lost to corrupt entries shrink the expected total
      const written = processed.reduce((sum, { group }) => sum + group.entries.length, 0);
      reporter.publish({ totalEntries: written });

      const groups = processed.map(({ group }) => group);
      const { entries, resequenced } = resolveNameCollisions(groups);
      if (resequenced) {
        console.warn("[Merge] Duplicate page names across chapters, renumbering by stream position");
      }

      const comicInfo = preserveComicInfo ? this.pickComicInfo(processed[0].plan, state) : null;

      reporter.phase("writing", { currentSource: null });
      tempPath = temporaryOutputPath(outputPath);
      await this.writeArchive(entries, comicInfo, tempPath, reporter, signal);
      throwIfCancelled(signal);

      const outputSize = await promoteOutput(tempPath, outputPath).catch((error: unknown) => {
        throw toIOFailure(error, outputPath);
      });
      tempPath = null;

      reporter.phase("done");
      console.log(
        `[Merge] Wrote ${entries.length} pages from ${groups.length} chapters to ${outputPath} (${formatFileSize(outputSize)})`,
      );

      return {
        outputPath,
        chapters: groups.map((group) => ({
          sourcePath: group.sourcePath,
          chapter: group.chapter,
          pages: group.entries.length,
        })),
        totalPages: entries.length,
        outputSize,
        comicInfoIncluded: comicInfo !== null,
        warnings: state.warnings,
        skippedSources: state.skippedSources,
      };
    } catch (error) {
      const failure = signal.aborted
        ? new ComicMergeError("Cancelled", "Merge was cancelled", { cause: error })
        : isComicMergeError(error)
          ? error
          : toIOFailure(error, options.outputPath);
      failure.warnings = [...state.warnings, ...failure.warnings];

      reporter.fail(failure.code === "Cancelled" ? "cancelled" : "failed", failure.message);
      console.error(`[Merge] ${failure.code}: ${failure.message}`);
      throw failure;
    } finally {
      if (tempPath) await discardFile(tempPath);
      if (stagingDir) await removeStagingDir(stagingDir);
    }
  }

  private async validate(
    sources: readonly SourceEntry[],
    outputPath: string,
    selectedFormats: ReadonlySet<ImageFormat>,
    strict: boolean,
    state: MergeState,
    reporter: MergeProgressReporter,
    signal: AbortSignal,
  ): Promise<SourcePlan[]> {
    if (sources.length === 0) {
      throw new ComicMergeError("InvalidSource", "No source archives were given");
    }
    if (selectedFormats.size === 0 && sources.some((source) => source.kind === "zip")) {
      throw new ComicMergeError("NoFormatsSelected", "Select at least one image format to extract from ZIP sources");
    }

    const plans: SourcePlan[] = [];
    for (const [index, source] of sources.entries()) {
      throwIfCancelled(signal);
      const chapter = source.chapter ?? index + 1;

      if (resolve(source.path) === outputPath) {
        throw new ComicMergeError("InvalidOutputPath", `Output would overwrite source ${source.path}`, {
          path: source.path,
        });
      }
      if (!Number.isInteger(chapter) || chapter < 1) {
        throw new ComicMergeError("InvalidSource", `Chapter number must be a positive integer, got ${chapter}`, {
          path: source.path,
        });
      }

      const formats = source.kind === "cbz" ? ALL_FORMATS : selectedFormats;
      try {
        const plan = await withArchive(this.reader, source.path, async (handle) => {
          const listing = this.reader.listImageEntries(handle);
          const rejectedPath = listing.rejected.find((item) => item.code === "PathRejected");
          if (strict && rejectedPath) {
            throw new ComicMergeError(
              "PathRejected",
              `Unsafe entry ${rejectedPath.name} in ${source.path}: ${rejectedPath.reason}`,
              { path: source.path, entry: rejectedPath.name },
            );
          }
          const entryCount = selectEntries(listing, formats).length;
          if (entryCount === 0) {
            throw new ComicMergeError("EmptyArchive", `No images of the selected formats in ${source.path}`, {
              path: source.path,
            });
          }
          const comicInfo = await this.reader.readComicInfo(handle);
          return { source, chapter, formats, entryCount, comicInfo };
        });
        plans.push(plan);
      } catch (error) {
        if (strict) throw error;
        this.skipSource(source, error, state);
        // Skipped sources count as completed
        reporter.sourceCompleted();
      }
    }

    if (plans.length === 0) {
      throw new ComicMergeError("EmptyArchive", "None of the sources could be read");
    }
    return plans;
  }

  private async processSource(
    plan: SourcePlan,
    index: number,
    stagingDir: string,
    strict: boolean,
    state: MergeState,
    reporter: MergeProgressReporter,
    signal: AbortSignal,
  ): Promise<ChapterGroup | null> {
    const { source } = plan;
    reporter.phase(source.kind === "zip" ? "extracting" : "reading", { currentSource: basename(source.path) });

    // One staging subdirectory per source so equal page names never overwrite
    const destination = join(stagingDir, String(index + 1).padStart(4, "0"));
    try {
      const group = await this.extractor.extract(source.path, plan.chapter, plan.formats, destination, {
        strict,
        signal,
      });
      state.warnings.push(...group.warnings);
      await yieldToEventLoop();
      return group;
    } catch (error) {
      const fatal =
        strict ||
        signal.aborted ||
        (isComicMergeError(error) && (error.code === "IOFailure" || error.code === "Cancelled"));
      if (fatal) throw error;
      this.skipSource(source, error, state);
      return null;
    }
  }

  private skipSource(source: SourceEntry, error: unknown, state: MergeState): void {
    const reason = errorMessage(error);
    if (isComicMergeError(error)) state.warnings.push(...error.warnings);
    console.warn(`[Merge] Skipping ${source.path}: ${reason}`);
    state.skippedSources.push({ path: source.path, code: sourceFailureCode(error), reason });
    state.warnings.push({
      code: "SourceSkipped",
      message: `Skipped ${basename(source.path)}: ${reason}`,
      source: source.path,
    });
  }

  private pickComicInfo(plan: SourcePlan, state: MergeState): string | null {
    if (plan.comicInfo === null) return null;
    if (isWellFormedComicInfo(plan.comicInfo)) return plan.comicInfo;

    const message = `Malformed ${COMIC_INFO_ENTRY} in ${basename(plan.source.path)} was not copied`;
    console.warn(`[Merge] ${message}`);
    state.warnings.push({ code: "ComicInfoDropped", message, source: plan.source.path });
    return null;
  }

  private async writeArchive(
    entries: readonly RenamedEntry[],
    comicInfo: string | null,
    tempPath: string,
    reporter: MergeProgressReporter,
    signal: AbortSignal,
  ): Promise<void> {
    const zip = new JSZip();
    for (const entry of entries) {
      const stream = stagedEntryStream(entry.stagedPath, () => {
        throwIfCancelled(signal);
        reporter.entryWritten();
      });
      zip.file(entry.targetName, stream, { binary: true, date: ENTRY_DATE, createFolders: false });
    }
    if (comicInfo !== null) {
      zip.file(COMIC_INFO_ENTRY, comicInfo, { date: ENTRY_DATE, createFolders: false });
    }

    try {
      await pipeline(
        zip.generateNodeStream({
          type: "nodebuffer",
          streamFiles: true,
          compression: "DEFLATE",
          compressionOptions: { level: 6 },
        }),
        createWriteStream(tempPath),
      );
    } catch (error) {
      if (signal.aborted) throw new ComicMergeError("Cancelled", "Merge was cancelled", { cause: error });
      throw toIOFailure(error, tempPath);
    }
    reporter.flush();
  }
}
