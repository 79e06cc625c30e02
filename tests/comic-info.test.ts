import { describe, it, expect } from "vitest";
import { isWellFormedComicInfo } from "../app/lib/processing/comic-info";

describe("comic-info", () => {
  it("should accept a ComicInfo document with a declaration and comments", () => {
    const xml = [
      '\uFEFF<?xml version="1.0" encoding="utf-8"?>',
      "<!-- exported by a tagger -->",
      '<ComicInfo xmlns:xsd="http://www.w3.org/2001/XMLSchema">',
      "  <Title>Vol &amp; One</Title>",
      "  <Summary><![CDATA[Some <b>bold</b> text]]></Summary>",
      "  <Pages>",
      '    <Page Image="0" Type="FrontCover"/>',
      "  </Pages>",
      "</ComicInfo>",
    ].join("\n");

    expect(isWellFormedComicInfo(xml)).toBe(true);
  });

  it("should accept an empty self-closing root", () => {
    expect(isWellFormedComicInfo("<ComicInfo/>")).toBe(true);
  });

  it("should reject mismatched or unclosed tags", () => {
    expect(isWellFormedComicInfo("<ComicInfo><Title>x</ComicInfo>")).toBe(false);
    expect(isWellFormedComicInfo("<ComicInfo><Title>x</Title>")).toBe(false);
  });

  it("should reject other roots and multiple roots", () => {
    expect(isWellFormedComicInfo("<Book><Title>x</Title></Book>")).toBe(false);
    expect(isWellFormedComicInfo("<ComicInfo/><ComicInfo/>")).toBe(false);
  });

  it("should reject text outside the root and stray markup", () => {
    expect(isWellFormedComicInfo("not xml")).toBe(false);
    expect(isWellFormedComicInfo("<ComicInfo></ComicInfo>trailing")).toBe(false);
    expect(isWellFormedComicInfo("<ComicInfo><Title>a < b</Title></ComicInfo>")).toBe(false);
  });
});
