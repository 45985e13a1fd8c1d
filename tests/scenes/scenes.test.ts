import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../../src/lib/errors";
import {
  DEFAULT_TEMPLATE,
  createEngineConfig,
  getAvailableScenes,
  getScene,
  pillColor,
  sceneSafeName,
} from "../../src/scenes";

describe("scene registry", () => {
  it("resolves both scenes ignoring case", () => {
    expect(getScene("l'atrium").background).toBe("orange.png");
    expect(getScene("LE REFUGE").background).toBe("purple.png");
    expect(getScene("  Le Refuge ").name).toBe("Le Refuge");
  });

  it("throws ConfigurationError for any other scene", () => {
    expect(() => getScene("Le Club")).toThrow(ConfigurationError);
    expect(() => getScene("Le Club")).toThrow(
      `Unknown scene "Le Club". Available: "L'Atrium", "Le Refuge"`
    );
  });

  it("lists the available scenes", () => {
    expect(getAvailableScenes()).toEqual(["L'Atrium", "Le Refuge"]);
  });

  it("derives file-safe names", () => {
    expect(sceneSafeName("L'Atrium")).toBe("latrium");
    expect(sceneSafeName("Le Refuge")).toBe("le_refuge");
  });
});

describe("pillColor", () => {
  const { palette } = getScene("L'Atrium");

  it("resolves accent and neutral styles", () => {
    expect(pillColor(palette, "accent", "tag")).toEqual({ r: 255, g: 134, b: 53, a: 255 });
    expect(pillColor(palette, "neutral", "artist")).toEqual({ r: 255, g: 255, b: 255, a: 220 });
  });

  it("looks categorical pills up by category", () => {
    expect(pillColor(palette, "categorical", "artist")).toEqual(palette.accent);
    expect(pillColor(palette, "categorical", "tag")).toEqual(palette.neutral);
  });
});

describe("createEngineConfig", () => {
  it("spans the canvas between margins and pitches rows on the tag font", () => {
    expect(createEngineConfig(DEFAULT_TEMPLATE, 1080)).toEqual({
      paddingX: 30,
      paddingY: 15,
      pillHeight: 72,
      gapX: 24,
      gapY: 24,
      rowMaxWidth: 948,
      maxLines: 3,
      trackingByElement: { frequency: -8, sceneGenre: 0, dateLine: 0, radioStation: -8 },
    });
  });
});
