import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_BASELINE_CORRECTION, loadFont, loadFontOrFallback } from "../../src/fonts";
import { AssetError } from "../../src/lib/errors";
import { pathExtent, writeTestFont } from "../fixtures";

describe("loadFont", () => {
  let dir: string;
  let fontPath: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "freqcard-font-"));
    fontPath = path.join(dir, "TestSans.otf");
    writeTestFont(fontPath);
    fs.writeFileSync(path.join(dir, "broken.ttf"), "not a font");
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("scales an OpenType file to the requested size", () => {
    const font = loadFont(fontPath, 40);
    expect(font.family).toBe("Test Sans");
    expect(font.size).toBe(40);
    expect(font.ascent).toBe(32);
    expect(font.descent).toBe(8);
    expect(font.lineHeight).toBe(40);
    expect(font.baselineCorrection).toBe(DEFAULT_BASELINE_CORRECTION);
    expect(font.advanceWidth("x")).toBe(20);
    expect(font.advanceWidth("W")).toBe(40);
    expect(font.advanceWidth(" ")).toBe(10);
  });

  it("measures ink from the glyph outlines", () => {
    const font = loadFont(fontPath, 40);
    expect(font.boundingBoxWidth("abc")).toBe(60);
    // "A" is inked from 50 to 470 units
    expect(font.leftBearing("Abc")).toBe(2);
    expect(font.boundingBoxWidth("Ab")).toBe(38);
    expect(font.leftBearing("")).toBe(0);
    expect(font.boundingBoxWidth("")).toBe(0);
  });

  it("falls back to the advance for text without ink", () => {
    expect(loadFont(fontPath, 40).boundingBoxWidth("  ")).toBe(20);
  });

  it("takes a per-font baseline correction", () => {
    expect(loadFont(fontPath, 40, 5).baselineCorrection).toBe(5);
  });

  it("outlines text from the pen position on the baseline", () => {
    const extent = pathExtent(loadFont(fontPath, 40).outline("i", 10, 50) ?? "");
    expect(extent.left).toBeCloseTo(10, 2);
    expect(extent.right).toBeCloseTo(20, 2);
    // ink rises 700 units above the baseline
    expect(extent.top).toBeCloseTo(22, 2);
    expect(extent.bottom).toBeCloseTo(50, 2);
  });

  it("throws AssetError for a missing file", () => {
    expect(() => loadFont("/nonexistent/font.otf", 20)).toThrow(AssetError);
    expect(() => loadFont("/nonexistent/font.otf", 20)).toThrow(/Font not found/);
  });

  it("throws AssetError for a file that is not a font", () => {
    expect(() => loadFont(path.join(dir, "broken.ttf"), 20)).toThrow(AssetError);
    expect(() => loadFont(path.join(dir, "broken.ttf"), 20)).toThrow(/Cannot parse font/);
  });

  describe("loadFontOrFallback", () => {
    it("returns the loaded font without a warning", () => {
      const { font, warning } = loadFontOrFallback(fontPath, 20);
      expect(font.family).toBe("Test Sans");
      expect(warning).toBeNull();
    });

    it("substitutes the builtin font and explains why", () => {
      const { font, warning } = loadFontOrFallback("/nonexistent/font.otf", 42);
      expect(font.family).toBe("sans-serif");
      expect(font.size).toBe(42);
      expect(font.outline("abc", 0, 0)).toBeNull();
      expect(warning).toBe("Font not found: /nonexistent/font.otf. Using builtin fallback font.");
    });

    it("falls back on an unparseable file", () => {
      const { font, warning } = loadFontOrFallback(path.join(dir, "broken.ttf"), 42);
      expect(font.family).toBe("sans-serif");
      expect(warning).toMatch(/^Cannot parse font .*broken\.ttf: .*\. Using builtin fallback font\.$/);
    });
  });
});
