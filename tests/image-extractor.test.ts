import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, readdirSync, readFileSync } from "fs";
import { join } from "path";

import { ArchiveReader } from "../app/lib/processing/archive-reader";
import { ImageExtractor } from "../app/lib/processing/image-extractor";
import { ComicMergeError } from "../app/lib/errors";
import type { ExtractionProgress, ImageFormat } from "../app/lib/types";
import { createTempDir, removeTempDir, writeZip } from "./helpers";

describe("image-extractor", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempDir(dir);
  });

  it("should extract only the selected formats as a numbered chapter", async () => {
    const source = await writeZip(join(dir, "scans.zip"), [
      ["a.txt", "text"],
      ["img1.jpg", "jpeg bytes"],
      ["img2.gif", "gif bytes"],
    ]);
    const destination = join(dir, "out");

    const group = await new ImageExtractor().extract(source, 1, new Set<ImageFormat>(["jpg"]), destination);

    expect(group.chapter).toBe(1);
    expect(group.entries.map((entry) => entry.targetName)).toEqual(["ch1_001.jpg"]);
    expect(group.entries[0].originalName).toBe("img1.jpg");
    expect(readdirSync(destination)).toEqual(["ch1_001.jpg"]);
    expect(readFileSync(join(destination, "ch1_001.jpg"), "utf-8")).toBe("jpeg bytes");
    expect(group.warnings).toEqual([]);
  });

  it("should number pages in natural order of the entry names", async () => {
    const source = await writeZip(join(dir, "vol.cbz"), [
      ["page10.png", "ten"],
      ["page2.png", "two"],
      ["page1.png", "one"],
    ]);
    const destination = join(dir, "out");

    const group = await new ImageExtractor().extract(source, 3, new Set<ImageFormat>(["png"]), destination);

    expect(group.entries.map((entry) => [entry.targetName, entry.originalName])).toEqual([
      ["ch3_001.png", "page1.png"],
      ["ch3_002.png", "page2.png"],
      ["ch3_003.png", "page10.png"],
    ]);
    expect(readFileSync(join(destination, "ch3_003.png"), "utf-8")).toBe("ten");
  });

  it("should produce the same names when run twice", async () => {
    const source = await writeZip(join(dir, "vol.cbz"), [
      ["b.jpg", "b"],
      ["a.jpg", "a"],
    ]);
    const extractor = new ImageExtractor();

    const first = await extractor.extract(source, 1, new Set<ImageFormat>(["jpg"]), join(dir, "one"));
    const second = await extractor.extract(source, 1, new Set<ImageFormat>(["jpg"]), join(dir, "two"));

    expect(second.entries.map((entry) => entry.targetName)).toEqual(
      first.entries.map((entry) => entry.targetName),
    );
    expect(readFileSync(join(dir, "two", "ch1_001.jpg"))).toEqual(readFileSync(join(dir, "one", "ch1_001.jpg")));
  });

  it("should fail with NoFormatsSelected on an empty format set", async () => {
    const source = await writeZip(join(dir, "scans.zip"), [["img1.jpg", "x"]]);

    await expect(
      new ImageExtractor().extract(source, 1, new Set<ImageFormat>(), join(dir, "out")),
    ).rejects.toMatchObject({ code: "NoFormatsSelected" });
  });

  it("should fail with EmptyArchive when no entry matches the selected formats", async () => {
    const source = await writeZip(join(dir, "scans.zip"), [["img1.gif", "x"]]);

    await expect(
      new ImageExtractor().extract(source, 1, new Set<ImageFormat>(["png", "webp"]), join(dir, "out")),
    ).rejects.toMatchObject({
      code: "EmptyArchive",
      message: `No images of the selected formats (png, webp) in ${source}`,
    });
  });

  it("should reject a chapter number below one", async () => {
    const source = await writeZip(join(dir, "vol.cbz"), [["1.jpg", "x"]]);

    await expect(
      new ImageExtractor().extract(source, 0, new Set<ImageFormat>(["jpg"]), join(dir, "out")),
    ).rejects.toMatchObject({ code: "InvalidSource" });
  });

  describe("unsafe entries", () => {
    it("should skip a traversal entry with a warning", async () => {
      const source = await writeZip(join(dir, "evil.cbz"), [
        ["../../etc/passwd.jpg", "nope"],
        ["1.jpg", "one"],
      ]);
      const destination = join(dir, "out");

      const group = await new ImageExtractor().extract(source, 1, new Set<ImageFormat>(["jpg"]), destination);

      expect(group.entries.map((entry) => entry.targetName)).toEqual(["ch1_001.jpg"]);
      expect(group.warnings).toEqual([
        {
          code: "PathRejected",
          message: "Skipped ../../etc/passwd.jpg in evil.cbz: parent directory segment",
          source,
          entry: "../../etc/passwd.jpg",
        },
      ]);
      expect(existsSync(join(dir, "etc"))).toBe(false);
    });

    it("should fail in strict mode without writing anything", async () => {
      const source = await writeZip(join(dir, "evil.cbz"), [
        ["1.jpg", "one"],
        ["../../etc/passwd.jpg", "nope"],
      ]);
      const destination = join(dir, "out");

      await expect(
        new ImageExtractor().extract(source, 1, new Set<ImageFormat>(["jpg"]), destination, { strict: true }),
      ).rejects.toMatchObject({ code: "PathRejected", entry: "../../etc/passwd.jpg" });
      expect(readdirSync(destination)).toEqual([]);
    });
  });

  describe("corrupt entries", () => {
    it("should skip an unreadable entry and keep page numbers contiguous", async () => {
      const source = await writeZip(join(dir, "vol.cbz"), [
        ["1.jpg", "one"],
        ["2.jpg", "two"],
        ["3.jpg", "three"],
      ]);
      const reader = new ArchiveReader();
      const original = reader.readEntry.bind(reader);
      vi.spyOn(reader, "readEntry").mockImplementation(async (handle, entry) => {
        if (entry.name === "2.jpg") {
          throw new ComicMergeError("CorruptEntry", "Cannot read 2.jpg: invalid data", {
            path: handle.path,
            entry: entry.name,
          });
        }
        return original(handle, entry);
      });

      const group = await new ImageExtractor(reader).extract(source, 1, new Set<ImageFormat>(["jpg"]), join(dir, "out"));

      expect(group.entries.map((entry) => [entry.targetName, entry.originalName])).toEqual([
        ["ch1_001.jpg", "1.jpg"],
        ["ch1_002.jpg", "3.jpg"],
      ]);
      expect(group.warnings).toEqual([
        { code: "CorruptEntry", message: "Cannot read 2.jpg: invalid data", source, entry: "2.jpg" },
      ]);
    });

    it("should fail when every entry is unreadable", async () => {
      const source = await writeZip(join(dir, "vol.cbz"), [["1.jpg", "one"]]);
      const reader = new ArchiveReader();
      vi.spyOn(reader, "readEntry").mockRejectedValue(
        new ComicMergeError("CorruptEntry", "Cannot read 1.jpg: invalid data"),
      );
      const destination = join(dir, "out");

      const failure = new ImageExtractor(reader).extract(source, 1, new Set<ImageFormat>(["jpg"]), destination);

      await expect(failure).rejects.toMatchObject({
        code: "CorruptEntry",
        message: `No readable images survived extraction of ${source}`,
      });
      expect(readdirSync(destination)).toEqual([]);
    });
  });

  describe("progress", () => {
    it("should publish frozen snapshots through to done", async () => {
      const source = await writeZip(join(dir, "vol.cbz"), [
        ["1.jpg", "one"],
        ["2.jpg", "two"],
      ]);
      const snapshots: ExtractionProgress[] = [];

      await new ImageExtractor().extract(source, 1, new Set<ImageFormat>(["jpg"]), join(dir, "out"), {
        onProgress: (snapshot) => snapshots.push(snapshot),
      });

      expect(snapshots.every((snapshot) => Object.isFrozen(snapshot))).toBe(true);
      expect(
        snapshots.filter((snapshot) => snapshot.phase === "extracting").map((snapshot) => snapshot.entriesExtracted),
      ).toEqual([0, 1, 2]);
      expect(snapshots[snapshots.length - 1]).toEqual({
        source,
        entriesFound: 2,
        entriesExtracted: 2,
        currentFile: null,
        phase: "done",
      });
    });

    it("should stop with Cancelled when the signal is aborted", async () => {
      const source = await writeZip(join(dir, "vol.cbz"), [["1.jpg", "one"]]);
      const controller = new AbortController();
      controller.abort();
      const destination = join(dir, "out");

      await expect(
        new ImageExtractor().extract(source, 1, new Set<ImageFormat>(["jpg"]), destination, { signal: controller.signal }),
      ).rejects.toMatchObject({ code: "Cancelled" });
      expect(readdirSync(destination)).toEqual([]);
    });
  });
});
