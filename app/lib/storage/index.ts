import { existsSync, statSync, constants } from "fs";
import { access, mkdtemp, rename, rm, stat } from "fs/promises";
import { tmpdir } from "os";
import { basename, dirname, extname, join, resolve } from "path";
import { v4 as uuid } from "uuid";

import { ComicMergeError, errorMessage } from "../errors";

const STAGING_PREFIX = "comic-merge-";
const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;
const RESERVED_NAMES = new Set([
  "CON",
  "PRN",
  "AUX",
  "NUL",
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);
const MAX_FILENAME_LENGTH = 255;

/**
 * Create an exclusively-owned staging directory for one operation.
 */
export async function createStagingDir(root?: string): Promise<string> {
  return mkdtemp(join(root ?? tmpdir(), STAGING_PREFIX));
}

export async function removeStagingDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    console.warn(`[Storage] Failed to remove staging directory ${dir}: ${errorMessage(error)}`);
  }
}

/**
 * Temporary file beside the final output, so the last step is a same-volume rename.
 */
export function temporaryOutputPath(outputPath: string): string {
  const absolute = resolve(outputPath);
  return join(dirname(absolute), `.${basename(absolute)}.${uuid()}.partial`);
}

export async function promoteOutput(tempPath: string, outputPath: string): Promise<number> {
  await rename(tempPath, outputPath);
  return (await stat(outputPath)).size;
}

export async function discardFile(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    console.warn(`[Storage] Failed to remove ${path}: ${errorMessage(error)}`);
  }
}

function fileNameProblem(name: string): string | null {
  if (!name.trim()) return "file name is empty";
  const illegal = name.match(ILLEGAL_FILENAME_CHARS);
  if (illegal) return `file name contains an illegal character: ${JSON.stringify(illegal[0])}`;
  const stem = basename(name, extname(name)).toUpperCase();
  if (RESERVED_NAMES.has(stem)) return `file name uses a reserved name: ${stem}`;
  if (name.length > MAX_FILENAME_LENGTH) return `file name is longer than ${MAX_FILENAME_LENGTH} characters`;
  if (/^[ .]|[ .]$/.test(name)) return "file name cannot start or end with a dot or space";
  return null;
}

/**
 * Reject output paths the merge cannot safely create.
 */
export async function validateOutputPath(outputPath: string, overwrite = false): Promise<string> {
  const invalid = (message: string) =>
    new ComicMergeError("InvalidOutputPath", message, { path: outputPath });

  if (!outputPath.trim()) throw invalid("Output path is empty");

  const absolute = resolve(outputPath);
  const name = basename(absolute);
  const problem = fileNameProblem(name);
  if (problem) throw invalid(`Invalid output ${problem}`);
  if (extname(name).toLowerCase() !== ".cbz") throw invalid("Output file must use the .cbz extension");

  const parent = dirname(absolute);
  if (!existsSync(parent) || !statSync(parent).isDirectory()) {
    throw invalid(`Output directory does not exist: ${parent}`);
  }
  try {
    await access(parent, constants.W_OK);
  } catch {
    throw invalid(`Output directory is not writable: ${parent}`);
  }

  if (existsSync(absolute)) {
    if (!overwrite) throw invalid(`Output file already exists: ${name}`);
    if (!statSync(absolute).isFile()) throw invalid(`Output path exists and is not a file: ${absolute}`);
  }

  return absolute;
}

export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(ILLEGAL_FILENAME_CHARS, "_").replace(/^[ .]+|[ .]+$/g, "");
  return cleaned || "unnamed";
}

/**
 * First free name in `directory`: base.cbz, base_1.cbz, base_2.cbz, ...
 */
export function getUniqueFileName(directory: string, baseName: string, extension = ".cbz"): string {
  const base = sanitizeFileName(baseName);
  let candidate = `${base}${extension}`;
  for (let counter = 1; existsSync(join(directory, candidate)); counter++) {
    candidate = `${base}_${counter}${extension}`;
  }
  return candidate;
}

export function formatFileSize(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }
  return unit === 0 ? `${size} B` : `${size.toFixed(1)} ${units[unit]}`;
}
