import { describe, it, expect } from "vitest";
import * as path from "path";
import { DEFAULT_SHUFFLE_SEED, loadConfig } from "../../src/config";
import { ConfigurationError } from "../../src/lib/errors";

describe("loadConfig", () => {
  it("defaults to the bundled assets, the working directory and seed 42", () => {
    expect(loadConfig({})).toEqual({
      assetsDir: path.resolve(__dirname, "..", "..", "assets"),
      outputDir: process.cwd(),
      shuffleSeed: DEFAULT_SHUFFLE_SEED,
    });
    expect(DEFAULT_SHUFFLE_SEED).toBe(42);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      FREQCARD_ASSETS_DIR: "/srv/freqcard/assets",
      FREQCARD_OUTPUT_DIR: "/srv/freqcard/out",
      FREQCARD_SHUFFLE_SEED: "7",
    });
    expect(config).toEqual({
      assetsDir: path.resolve("/srv/freqcard/assets"),
      outputDir: path.resolve("/srv/freqcard/out"),
      shuffleSeed: 7,
    });
  });

  it("rejects a non-integer seed", () => {
    expect(() => loadConfig({ FREQCARD_SHUFFLE_SEED: "abc" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ FREQCARD_SHUFFLE_SEED: "1.5" })).toThrow(
      'Invalid FREQCARD_SHUFFLE_SEED: "1.5". Must be an integer.'
    );
  });

  it("treats an empty or blank seed as unset", () => {
    expect(loadConfig({ FREQCARD_SHUFFLE_SEED: "" }).shuffleSeed).toBe(42);
    expect(loadConfig({ FREQCARD_SHUFFLE_SEED: "  " }).shuffleSeed).toBe(42);
    expect(loadConfig({ FREQCARD_SHUFFLE_SEED: "0" }).shuffleSeed).toBe(0);
  });
});
