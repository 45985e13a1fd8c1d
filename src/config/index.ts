import * as dotenv from "dotenv";
import * as path from "path";
import { ConfigurationError } from "../lib/errors";

// Load .env from project root without overriding variables already set.
dotenv.config({ path: path.resolve(__dirname, "../../.env"), override: false });

export interface AppConfig {
  /** Directory holding scene backgrounds and the fonts/ directory */
  assetsDir: string;
  /** Directory `run` writes into when no --out is given */
  outputDir: string;
  /** Seed for the greedy-flow label shuffle */
  shuffleSeed: number;
}

export const DEFAULT_SHUFFLE_SEED = 42;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const assetsDir = env.FREQCARD_ASSETS_DIR
    ? path.resolve(env.FREQCARD_ASSETS_DIR)
    : path.resolve(__dirname, "../../assets");

  const outputDir = env.FREQCARD_OUTPUT_DIR
    ? path.resolve(env.FREQCARD_OUTPUT_DIR)
    : process.cwd();

  // Empty counts as unset; Number("") would be 0.
  const rawSeed = env.FREQCARD_SHUFFLE_SEED?.trim();
  const shuffleSeed = rawSeed ? Number(rawSeed) : DEFAULT_SHUFFLE_SEED;
  if (!Number.isInteger(shuffleSeed)) {
    throw new ConfigurationError(
      `Invalid FREQCARD_SHUFFLE_SEED: "${env.FREQCARD_SHUFFLE_SEED}". Must be an integer.`
    );
  }

  return { assetsDir, outputDir, shuffleSeed };
}
