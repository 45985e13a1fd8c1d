/**
 * Errors that abort a whole card generation.
 *
 * Overflow never throws: it is answered by truncation.
 */

/** Bad input or setup: unknown scene, wrong label count for fixed-slot. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A background or font file is missing or unreadable. */
export class AssetError extends Error {
  readonly assetPath: string;

  constructor(message: string, assetPath: string) {
    super(message);
    this.name = "AssetError";
    this.assetPath = assetPath;
  }
}
