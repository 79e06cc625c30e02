import JSZip from "jszip";
import { readFile } from "fs/promises";
import { basename, extname } from "path";
import { lookup } from "mime-types";

import { ComicMergeError, errorMessage } from "../errors";
import { SUPPORTED_FORMATS } from "../types";
import type { ArchiveEntry, ArchiveKind, ImageFormat, MergeWarning } from "../types";
import { sortNatural } from "./natural-sort";
import { isSymlinkEntry, validateEntryName } from "./path-validator";

// Entries larger than this are skipped rather than read into memory
export const MAX_ENTRY_SIZE = 100 * 1024 * 1024;

const COMIC_INFO_NAME = "comicinfo.xml";

export interface RejectedEntry {
  name: string;
  code: "PathRejected" | "CorruptEntry";
  reason: string;
}

export interface ArchiveListing {
  /** Image entries in natural order */
  entries: ArchiveEntry[];
  /** Entries that were dropped before reading, with the reason */
  rejected: RejectedEntry[];
}

/**
 * An opened archive. Holds the parsed central directory until closed.
 */
export class ArchiveHandle {
  private zip: JSZip | null;

  constructor(
    readonly path: string,
    readonly size: number,
    zip: JSZip,
  ) {
    this.zip = zip;
  }

  get isOpen(): boolean {
    return this.zip !== null;
  }

  files(): JSZip.JSZipObject[] {
    return Object.values(this.requireZip().files);
  }

  file(ref: string): JSZip.JSZipObject | null {
    return this.requireZip().file(ref);
  }

  close(): void {
    this.zip = null;
  }

  private requireZip(): JSZip {
    if (!this.zip) {
      throw new ComicMergeError("UnreadableArchive", `Archive is closed: ${this.path}`, {
        path: this.path,
      });
    }
    return this.zip;
  }
}

export function detectArchiveKind(path: string): ArchiveKind | null {
  const ext = extname(path).toLowerCase();
  if (ext === ".cbz") return "cbz";
  if (ext === ".zip") return "zip";
  return null;
}

export function imageFormatOf(name: string): ImageFormat | null {
  const ext = extname(name).toLowerCase().replace(/^\./, "");
  return SUPPORTED_FORMATS.find((format) => format === ext) ?? null;
}

/** Original entry name, before JSZip strips ".." segments on load */
function rawEntryName(file: JSZip.JSZipObject): string {
  return file.unsafeOriginalName ?? file.name;
}

function declaredSize(file: JSZip.JSZipObject): number | null {
  const data: unknown = Reflect.get(file, "_data");
  if (
    data &&
    typeof data === "object" &&
    "uncompressedSize" in data &&
    typeof data.uncompressedSize === "number"
  ) {
    return data.uncompressedSize;
  }
  return null;
}

function hasZipSignature(buffer: Buffer): boolean {
  // PK\x03\x04 (local header) or PK\x05\x06 (empty archive)
  return (
    buffer.length >= 4 &&
    buffer[0] === 0x50 &&
    buffer[1] === 0x4b &&
    ((buffer[2] === 0x03 && buffer[3] === 0x04) || (buffer[2] === 0x05 && buffer[3] === 0x06))
  );
}

export function rejectionWarning(source: string, item: RejectedEntry): MergeWarning {
  return {
    code: item.code,
    message: `Skipped ${item.name} in ${basename(source)}: ${item.reason}`,
    source,
    entry: item.name,
  };
}

export class ArchiveReader {
  async open(path: string): Promise<ArchiveHandle> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error) {
      throw new ComicMergeError("UnreadableArchive", `Cannot read ${path}: ${errorMessage(error)}`, {
        path,
        cause: error,
      });
    }

    if (buffer.length === 0) {
      throw new ComicMergeError("UnreadableArchive", `Archive is empty (0 bytes): ${path}`, { path });
    }
    if (!hasZipSignature(buffer)) {
      throw new ComicMergeError("UnreadableArchive", `Not a ZIP archive: ${path}`, { path });
    }

    try {
      const zip = await JSZip.loadAsync(buffer);
      return new ArchiveHandle(path, buffer.length, zip);
    } catch (error) {
      throw new ComicMergeError(
        "UnreadableArchive",
        `Corrupted archive ${path}: ${errorMessage(error)}`,
        { path, cause: error },
      );
    }
  }

  /**
   * List the image entries of an archive in natural order. Every entry name is
   * checked before it is used; unsafe names end up in `rejected`.
   */
  listImageEntries(handle: ArchiveHandle): ArchiveListing {
    const entries: ArchiveEntry[] = [];
    const rejected: RejectedEntry[] = [];
    let total = 0;

    for (const file of handle.files()) {
      if (file.dir) continue;
      total++;

      const name = rawEntryName(file);
      const extension = imageFormatOf(name);
      if (!extension) continue;

      const validation = validateEntryName(name);
      if (!validation.ok) {
        rejected.push({ name, code: "PathRejected", reason: validation.reason });
        continue;
      }
      if (isSymlinkEntry(file.unixPermissions)) {
        rejected.push({ name, code: "PathRejected", reason: "symbolic link entry" });
        continue;
      }

      const size = declaredSize(file) ?? 0;
      if (size > MAX_ENTRY_SIZE) {
        rejected.push({ name, code: "CorruptEntry", reason: "entry exceeds size limit" });
        continue;
      }

      entries.push({
        ref: file.name,
        name: validation.name,
        extension,
        mimeType: lookup(name) || "application/octet-stream",
        size,
      });
    }

    console.log(
      `[Archive] ${basename(handle.path)}: ${total} files, ${entries.length} images, ${rejected.length} rejected`,
    );

    if (entries.length === 0) {
      throw new ComicMergeError("EmptyArchive", `No supported images found in ${handle.path}`, {
        path: handle.path,
        warnings: rejected.map((item) => rejectionWarning(handle.path, item)),
      });
    }

    return { entries: sortNatural(entries, (entry) => entry.name), rejected };
  }

  async readEntry(handle: ArchiveHandle, entry: ArchiveEntry): Promise<Buffer> {
    const file = handle.file(entry.ref);
    if (!file) {
      throw new ComicMergeError("CorruptEntry", `Entry ${entry.name} is missing from ${handle.path}`, {
        path: handle.path,
        entry: entry.name,
      });
    }

    try {
      const data = await file.async("nodebuffer");
      if (data.length > MAX_ENTRY_SIZE) {
        throw new Error("entry exceeds size limit");
      }
      return data;
    } catch (error) {
      throw new ComicMergeError(
        "CorruptEntry",
        `Cannot read ${entry.name} from ${handle.path}: ${errorMessage(error)}`,
        { path: handle.path, entry: entry.name, cause: error },
      );
    }
  }

  /** Raw ComicInfo.xml text, or null when the archive has none */
  async readComicInfo(handle: ArchiveHandle): Promise<string | null> {
    const file = handle
      .files()
      .find((candidate) => !candidate.dir && basename(rawEntryName(candidate)).toLowerCase() === COMIC_INFO_NAME);
    if (!file || !validateEntryName(rawEntryName(file)).ok) return null;

    try {
      return await file.async("string");
    } catch (error) {
      console.warn(`[Archive] Unreadable ComicInfo.xml in ${handle.path}: ${errorMessage(error)}`);
      return null;
    }
  }
}

/**
 * Open an archive for the duration of `fn` and release it on every exit path.
 */
export async function withArchive<T>(
  reader: ArchiveReader,
  path: string,
  fn: (handle: ArchiveHandle) => Promise<T>,
): Promise<T> {
  const handle = await reader.open(path);
  try {
    return await fn(handle);
  } finally {
    handle.close();
  }
}
