import { isAbsolute, relative, resolve, sep } from "path";

export type PathValidation =
  | { ok: true; name: string }
  | { ok: false; reason: string };

const DRIVE_SPECIFIER = /^[a-zA-Z]:/;
// ZIP external attributes carry the Unix file type in the upper bits
const UNIX_FILE_TYPE_MASK = 0o170000;
const UNIX_SYMLINK = 0o120000;

/**
 * Check an archive entry name before it is used to build a filesystem path
 * or an output entry name. When `baseDir` is given, the resolved path must
 * also stay inside it.
 */
export function validateEntryName(entryName: string, baseDir?: string): PathValidation {
  if (entryName.length === 0) {
    return { ok: false, reason: "empty entry name" };
  }
  if (entryName.includes("\0")) {
    return { ok: false, reason: "entry name contains a NUL byte" };
  }

  const normalized = entryName.replace(/\\/g, "/");

  if (normalized.startsWith("/")) {
    return { ok: false, reason: "absolute path" };
  }
  if (DRIVE_SPECIFIER.test(normalized)) {
    return { ok: false, reason: "drive specifier" };
  }
  if (normalized.split("/").some((segment) => segment === "..")) {
    return { ok: false, reason: "parent directory segment" };
  }

  if (baseDir !== undefined) {
    const root = resolve(baseDir);
    const target = resolve(root, normalized);
    const rel = relative(root, target);
    if (rel === "" || rel.startsWith(`..${sep}`) || rel === ".." || isAbsolute(rel)) {
      return { ok: false, reason: `resolves outside ${root}` };
    }
  }

  return { ok: true, name: normalized };
}

export function isSymlinkEntry(unixPermissions: number | string | null | undefined): boolean {
  if (typeof unixPermissions !== "number") return false;
  return (unixPermissions & UNIX_FILE_TYPE_MASK) === UNIX_SYMLINK;
}
