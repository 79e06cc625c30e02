export type ArchiveKind = "cbz" | "zip";

export type ImageFormat = "jpg" | "jpeg" | "png" | "webp" | "gif" | "bmp";

export const SUPPORTED_FORMATS: readonly ImageFormat[] = [
  "jpg",
  "jpeg",
  "png",
  "webp",
  "gif",
  "bmp",
];

export interface SourceEntry {
  path: string;
  /** Position in the caller's list; list order is merge order */
  position: number;
  kind: ArchiveKind;
  /** Explicit chapter number; defaults to position + 1 */
  chapter?: number;
}

export interface ArchiveEntry {
  /** Key used to read the entry back from its archive */
  ref: string;
  /** Entry name with "/" separators */
  name: string;
  extension: ImageFormat;
  mimeType: string;
  size: number;
}

export interface RenamedEntry {
  chapter: number;
  page: number;
  targetName: string;
  originalName: string;
  extension: ImageFormat;
  /** File in the staging directory holding the entry bytes */
  stagedPath: string;
  size: number;
}

export interface ChapterGroup {
  chapter: number;
  sourcePath: string;
  entries: RenamedEntry[];
  warnings: MergeWarning[];
}

export type WarningCode = "CorruptEntry" | "PathRejected" | "SourceSkipped" | "ComicInfoDropped";

export interface MergeWarning {
  code: WarningCode;
  message: string;
  source?: string;
  entry?: string;
}

export type MergePhase =
  | "validating"
  | "reading"
  | "extracting"
  | "writing"
  | "done"
  | "failed"
  | "cancelled";

export interface MergeProgress {
  readonly totalSources: number;
  readonly sourcesCompleted: number;
  readonly currentSource: string | null;
  readonly totalEntries: number;
  readonly entriesWritten: number;
  readonly phase: MergePhase;
  readonly error?: string;
}

export interface ExtractionProgress {
  readonly source: string;
  readonly entriesFound: number;
  readonly entriesExtracted: number;
  readonly currentFile: string | null;
  readonly phase: MergePhase;
  readonly error?: string;
}

export type ProgressObserver<T> = (snapshot: T) => void;

export interface MergeOptions {
  outputPath: string;
  selectedFormats: ReadonlySet<ImageFormat>;
  strict?: boolean;
  preserveComicInfo?: boolean;
  overwrite?: boolean;
  /** Parent directory for the staging area; defaults to the OS temp dir */
  stagingRoot?: string;
  signal?: AbortSignal;
  onProgress?: ProgressObserver<MergeProgress>;
}

export interface ExtractOptions {
  strict?: boolean;
  signal?: AbortSignal;
  onProgress?: ProgressObserver<ExtractionProgress>;
}

export interface MergedChapter {
  sourcePath: string;
  chapter: number;
  pages: number;
}

export interface SkippedSource {
  path: string;
  code: string;
  reason: string;
}

export interface MergeResult {
  outputPath: string;
  chapters: MergedChapter[];
  totalPages: number;
  outputSize: number;
  comicInfoIncluded: boolean;
  warnings: MergeWarning[];
  skippedSources: SkippedSource[];
}

export interface SourceInspection {
  path: string;
  kind: ArchiveKind;
  ok: boolean;
  pageCount: number;
  fileSize: number;
  formats: ImageFormat[];
  mimeTypes: string[];
  hasComicInfo: boolean;
  error?: { code: string; message: string };
}

export interface InspectionReport {
  sources: SourceInspection[];
  totalSize: number;
  totalPages: number;
  validCount: number;
  invalidCount: number;
}
