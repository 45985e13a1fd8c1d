import * as fs from "fs";
import type { CardRequest, PackingPolicy, ValidationResult } from "../contracts";
import { ConfigurationError } from "../lib/errors";
import { FIXED_SLOT_COUNT } from "../layout";
import { getScene } from "../scenes";

// --- Constants ---

export const VALID_POLICIES: readonly PackingPolicy[] = ["fixed-slot", "greedy-flow"];

const KNOWN_FIELDS = new Set([
  "frequency",
  "sceneGenre",
  "sceneName",
  "radioStationName",
  "tags",
  "dateLine",
  "policy",
  "verbatims",
  "artists",
  "seed",
]);

// --- Field Readers ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isPackingPolicy(value: unknown): value is PackingPolicy {
  return VALID_POLICIES.some((p) => p === value);
}

function requiredString(obj: Record<string, unknown>, field: string, errors: string[]): string {
  const value = obj[field];
  if (typeof value !== "string" || value.trim().length === 0) {
    errors.push(`'${field}' is required and must be a non-empty string.`);
    return "";
  }
  return value;
}

function stringList(obj: Record<string, unknown>, field: string, errors: string[]): string[] {
  const value = obj[field];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    errors.push(`'${field}' must be an array of strings.`);
    return [];
  }
  return value;
}

/**
 * Validate a parsed card object.
 *
 * Malformed input policy:
 * - Missing required field or wrong type -> error
 * - Unknown scene -> error
 * - fixed-slot without exactly five tags -> error
 * - Unknown fields, extra labels ignored by fixed-slot -> warning
 *
 * `policyOverride` replaces the card's own policy (CLI --policy).
 */
export function parseCardRequest(
  parsed: unknown,
  policyOverride?: PackingPolicy
): { request: CardRequest | null; errors: string[]; warnings: string[] } {
  if (!isRecord(parsed)) {
    return { request: null, errors: ["Card must be a JSON object."], warnings: [] };
  }

  const errors: string[] = [];
  const warnings: string[] = [];

  let frequency = "";
  if (typeof parsed.frequency === "number" && Number.isFinite(parsed.frequency)) {
    frequency = String(parsed.frequency);
  } else {
    frequency = requiredString(parsed, "frequency", errors);
  }
  const sceneGenre = requiredString(parsed, "sceneGenre", errors);
  const sceneName = requiredString(parsed, "sceneName", errors);
  const radioStationName = requiredString(parsed, "radioStationName", errors);

  if (sceneName.length > 0) {
    try {
      getScene(sceneName);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      errors.push(err.message);
    }
  }

  const tags = stringList(parsed, "tags", errors);
  const verbatims = stringList(parsed, "verbatims", errors);
  const artists = stringList(parsed, "artists", errors);

  let dateLine: string | null = null;
  if (typeof parsed.dateLine === "string" && parsed.dateLine.trim().length > 0) {
    dateLine = parsed.dateLine;
  } else if (parsed.dateLine !== undefined && parsed.dateLine !== null && typeof parsed.dateLine !== "string") {
    errors.push("'dateLine' must be a string or null.");
  }

  let policy: PackingPolicy = "fixed-slot";
  if (policyOverride !== undefined) {
    policy = policyOverride;
  } else if (parsed.policy !== undefined) {
    if (isPackingPolicy(parsed.policy)) {
      policy = parsed.policy;
    } else {
      errors.push(`'policy' must be one of: ${VALID_POLICIES.join(", ")}.`);
    }
  }

  let seed: number | null = null;
  if (parsed.seed !== undefined && parsed.seed !== null) {
    if (typeof parsed.seed === "number" && Number.isInteger(parsed.seed)) {
      seed = parsed.seed;
    } else {
      errors.push("'seed' must be an integer.");
    }
  }

  if (policy === "fixed-slot") {
    if (tags.length !== FIXED_SLOT_COUNT) {
      errors.push(
        `fixed-slot policy requires exactly ${FIXED_SLOT_COUNT} tags, got ${tags.length}.`
      );
    }
    if (verbatims.length > 0 || artists.length > 0) {
      warnings.push("'verbatims' and 'artists' are only used by the greedy-flow policy.");
    }
    if (seed !== null) {
      warnings.push("'seed' is only used by the greedy-flow policy.");
    }
  }

  for (const key of Object.keys(parsed)) {
    if (!KNOWN_FIELDS.has(key)) {
      warnings.push(`Unknown field '${key}' ignored.`);
    }
  }

  if (errors.length > 0) {
    return { request: null, errors, warnings };
  }

  return {
    request: {
      frequency,
      sceneGenre,
      sceneName,
      radioStationName,
      tags,
      dateLine,
      policy,
      verbatims,
      artists,
      seed,
    },
    errors,
    warnings,
  };
}

/**
 * Read and parse a card file. Returns errors instead of throwing.
 */
function checkCardFile(
  cardPath: string,
  policyOverride?: PackingPolicy
): { request: CardRequest | null; errors: string[]; warnings: string[] } {
  if (!fs.existsSync(cardPath)) {
    return { request: null, errors: [`Card file not found: ${cardPath}`], warnings: [] };
  }

  let content: string;
  try {
    content = fs.readFileSync(cardPath, "utf-8");
  } catch {
    return { request: null, errors: [`Cannot read card file: ${cardPath}`], warnings: [] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return { request: null, errors: ["Card file contains invalid JSON."], warnings: [] };
  }

  return parseCardRequest(parsed, policyOverride);
}

export function validateCardFile(cardPath: string, policyOverride?: PackingPolicy): ValidationResult {
  const { errors, warnings } = checkCardFile(cardPath, policyOverride);
  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Read a card file into a request.
 * Throws ConfigurationError listing every problem found.
 */
export function readCardRequest(
  cardPath: string,
  policyOverride?: PackingPolicy
): { request: CardRequest; warnings: string[] } {
  const { request, errors, warnings } = checkCardFile(cardPath, policyOverride);
  if (!request) {
    throw new ConfigurationError(errors.join(" "));
  }
  return { request, warnings };
}
