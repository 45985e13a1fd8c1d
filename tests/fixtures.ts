import sharp from "sharp";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type { CardRequest } from "../src/contracts";
import * as opentype from "opentype.js";
import { fontFromOpenType, type Font } from "../src/fonts";
import { DEFAULT_TEMPLATE } from "../src/scenes";

const UNITS_PER_EM = 1000;
const INK_TOP = 700;

/** Rectangle of ink from `left` to `right` font units, baseline to INK_TOP. */
function inkBox(left: number, right: number): opentype.Path {
  const p = new opentype.Path();
  p.moveTo(left, 0);
  p.lineTo(right, 0);
  p.lineTo(right, INK_TOP);
  p.lineTo(left, INK_TOP);
  p.close();
  return p;
}

/**
 * "Test Sans": 1000 units per em, ascender 800, descender -200.
 * Unmapped characters use .notdef: 500 units, inked edge to edge.
 * Space and "i" advance 250, "W" 1000; "A" is inked from 50 to 470.
 */
export function buildTestFont(): opentype.Font {
  const glyphs = [
    new opentype.Glyph({ name: ".notdef", index: 0, advanceWidth: 500, path: inkBox(0, 500) }),
    new opentype.Glyph({ name: "space", index: 1, unicode: 32, advanceWidth: 250, path: new opentype.Path() }),
    new opentype.Glyph({ name: "i", index: 2, unicode: 105, advanceWidth: 250, path: inkBox(0, 250) }),
    new opentype.Glyph({ name: "W", index: 3, unicode: 87, advanceWidth: 1000, path: inkBox(0, 1000) }),
    new opentype.Glyph({ name: "A", index: 4, unicode: 65, advanceWidth: 500, path: inkBox(50, 470) }),
    new opentype.Glyph({ name: "V", index: 5, unicode: 86, advanceWidth: 500, path: inkBox(0, 500) }),
  ];
  return new opentype.Font({
    familyName: "Test Sans",
    styleName: "Regular",
    unitsPerEm: UNITS_PER_EM,
    ascender: 800,
    descender: -200,
    glyphs,
  });
}

/** Write the test font as an .otf file. */
export function writeTestFont(filePath: string): void {
  fs.writeFileSync(filePath, Buffer.from(buildTestFont().toArrayBuffer()));
}

let parsedTestFont: opentype.Font | null = null;

/**
 * Test font at `size` px, parsed back from its binary form.
 * Every glyph advances size / 2 except space and "i" (size / 4) and "W" (size).
 * The pair "AV" kerns by -80 units.
 */
export function testFont(size = 20): Font {
  if (parsedTestFont === null) {
    const parsed = opentype.parse(buildTestFont().toArrayBuffer());
    parsed.kerningPairs[`${parsed.charToGlyph("A").index},${parsed.charToGlyph("V").index}`] = -80;
    parsedTestFont = parsed;
  }
  return fontFromOpenType(parsedTestFont, size);
}

/** Bounds of every coordinate in SVG path data. */
export function pathExtent(d: string): { left: number; right: number; top: number; bottom: number } {
  const values = (d.match(/-?\d*\.?\d+/g) ?? []).map(Number);
  const xs = values.filter((_, i) => i % 2 === 0);
  const ys = values.filter((_, i) => i % 2 === 1);
  return {
    left: Math.min(...xs),
    right: Math.max(...xs),
    top: Math.min(...ys),
    bottom: Math.max(...ys),
  };
}

export interface TestAssetsOptions {
  width?: number;
  height?: number;
  skipBackgrounds?: boolean;
  skipFonts?: boolean;
}

/**
 * Create a temporary assets directory with synthetic scene backgrounds and
 * the test font written under every template font name.
 * Caller is responsible for cleanup.
 */
export async function createTestAssets(options?: TestAssetsOptions): Promise<string> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "freqcard-test-"));
  const width = options?.width ?? 1080;
  const height = options?.height ?? 1920;

  if (!options?.skipBackgrounds) {
    const backgrounds: Array<[string, { r: number; g: number; b: number }]> = [
      ["orange.png", { r: 255, g: 120, b: 30 }],
      ["purple.png", { r: 90, g: 40, b: 160 }],
    ];
    for (const [name, background] of backgrounds) {
      const png = await sharp({
        create: { width, height, channels: 3, background },
      })
        .png()
        .toBuffer();
      fs.writeFileSync(path.join(dir, name), png);
    }
  }

  if (!options?.skipFonts) {
    const fontsDir = path.join(dir, "fonts");
    fs.mkdirSync(fontsDir);
    const files = new Set(Object.values(DEFAULT_TEMPLATE.fonts).map((f) => f.file));
    for (const file of files) {
      writeTestFont(path.join(fontsDir, file));
    }
  }

  return dir;
}

export function cleanupTestAssets(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export const SAMPLE_TAGS = ["Défensif", "Paisible", "Révélateur", "Percutant", "Hypnotique"];

export function sampleRequest(overrides?: Partial<CardRequest>): CardRequest {
  return {
    frequency: "97.3",
    sceneGenre: "House solaire",
    sceneName: "L'Atrium",
    radioStationName: "House solaire et organique",
    tags: [...SAMPLE_TAGS],
    dateLine: "le 31 juillet à La Rotonde",
    policy: "fixed-slot",
    verbatims: [],
    artists: [],
    seed: null,
    ...overrides,
  };
}
