import JSZip from "jszip";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

export type FixtureFile = [name: string, content: string | Buffer, unixPermissions?: number];

export function createTempDir(prefix = "comic-merge-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a ZIP fixture. Names are stored exactly as given, "../" segments included.
 * Unix modes are only recorded when some file sets one.
 */
export async function writeZip(path: string, files: FixtureFile[]): Promise<string> {
  const zip = new JSZip();
  for (const [name, content, unixPermissions] of files) {
    zip.file(name, content, { createFolders: false, unixPermissions });
  }
  const unix = files.some(([, , mode]) => mode !== undefined);
  const buffer = await zip.generateAsync({ type: "nodebuffer", platform: unix ? "UNIX" : "DOS" });
  writeFileSync(path, buffer);
  return path;
}

/** Entry names of an archive on disk, in central directory order */
export async function listZip(path: string): Promise<string[]> {
  const zip = await JSZip.loadAsync(readFileSync(path));
  return Object.keys(zip.files);
}

export async function readZipEntry(path: string, name: string): Promise<string | null> {
  const zip = await JSZip.loadAsync(readFileSync(path));
  const file = zip.file(name);
  return file ? file.async("string") : null;
}

export async function waitFor(condition: () => boolean, timeoutMs = 5000): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error("Timed out waiting for condition");
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
