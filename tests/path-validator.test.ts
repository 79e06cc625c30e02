import { describe, it, expect } from "vitest";
import { resolve, sep } from "path";
import { isSymlinkEntry, validateEntryName } from "../app/lib/processing/path-validator";

describe("path-validator", () => {
  describe("validateEntryName", () => {
    it("should accept relative names and normalize backslashes", () => {
      expect(validateEntryName("pages/01.jpg")).toEqual({ ok: true, name: "pages/01.jpg" });
      expect(validateEntryName("pages\\01.jpg")).toEqual({ ok: true, name: "pages/01.jpg" });
      expect(validateEntryName("..cover.jpg")).toEqual({ ok: true, name: "..cover.jpg" });
    });

    it("should reject parent directory segments", () => {
      expect(validateEntryName("../../etc/passwd.jpg")).toEqual({
        ok: false,
        reason: "parent directory segment",
      });
      expect(validateEntryName("pages/../../x.jpg")).toEqual({
        ok: false,
        reason: "parent directory segment",
      });
    });

    it("should reject absolute paths and drive specifiers", () => {
      expect(validateEntryName("/etc/page.jpg")).toEqual({ ok: false, reason: "absolute path" });
      expect(validateEntryName("\\\\server\\share\\page.jpg")).toEqual({ ok: false, reason: "absolute path" });
      expect(validateEntryName("C:\\pages\\1.jpg")).toEqual({ ok: false, reason: "drive specifier" });
    });

    it("should reject empty names and NUL bytes", () => {
      expect(validateEntryName("")).toEqual({ ok: false, reason: "empty entry name" });
      expect(validateEntryName("a\0b.jpg")).toEqual({ ok: false, reason: "entry name contains a NUL byte" });
    });

    it("should keep accepted names inside the base directory", () => {
      const base = resolve("staging", "0001");
      const result = validateEntryName("ch1_001.jpg", base);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(resolve(base, result.name).startsWith(base + sep)).toBe(true);
      }
    });

    it("should reject a name that resolves to the base directory itself", () => {
      const base = resolve("staging");
      expect(validateEntryName(".", base)).toEqual({ ok: false, reason: `resolves outside ${base}` });
    });
  });

  describe("isSymlinkEntry", () => {
    it("should detect symlink file types", () => {
      expect(isSymlinkEntry(0o120777)).toBe(true);
      expect(isSymlinkEntry(0o100644)).toBe(false);
      expect(isSymlinkEntry(null)).toBe(false);
      expect(isSymlinkEntry(undefined)).toBe(false);
    });
  });
});
