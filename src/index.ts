#!/usr/bin/env node
import { parseArgs } from "./cli/parseArgs";
import { loadConfig, type AppConfig } from "./config";
import type { CardRequest, PackingPolicy } from "./contracts";
import { AssetError, ConfigurationError } from "./lib/errors";
import {
  defaultOutputPath,
  generateCard,
  prepareCard,
  readCardRequest,
  summarizePlan,
  validateCardFile,
} from "./pipeline";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function printWarnings(warnings: string[]): void {
  for (const w of warnings) {
    console.error(`Warning: ${w}`);
  }
}

function loadRequest(cardPath: string, policy: PackingPolicy | null): CardRequest {
  try {
    const { request, warnings } = readCardRequest(cardPath, policy ?? undefined);
    printWarnings(warnings);
    return request;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

// --- Run Command ---

async function runGenerate(
  config: AppConfig,
  cardPath: string,
  outputPath: string | null,
  policy: PackingPolicy | null
): Promise<void> {
  const request = loadRequest(cardPath, policy);
  const target = outputPath ?? defaultOutputPath(request.sceneName, config.outputDir);

  try {
    const result = await generateCard(request, {
      assetsDir: config.assetsDir,
      seed: config.shuffleSeed,
      outputPath: target,
    });
    printWarnings(result.warnings);
    console.log(`Wrote ${result.outputPath}`);
  } catch (err) {
    if (err instanceof ConfigurationError || err instanceof AssetError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    console.error(`Error composing image: ${errorMessage(err)}`);
    process.exit(1);
  }

  console.log("Done.");
}

// --- Validate Command ---

function runValidate(cardPath: string): void {
  const result = validateCardFile(cardPath);

  printWarnings(result.warnings);
  for (const e of result.errors) {
    console.error(`Error: ${e}`);
  }

  if (result.valid) {
    console.log(`Validation passed: ${cardPath}`);
  } else {
    console.error(`Validation failed: ${cardPath}`);
    process.exit(1);
  }
}

// --- Plan Command ---

async function runPlan(config: AppConfig, cardPath: string, policy: PackingPolicy | null): Promise<void> {
  const request = loadRequest(cardPath, policy);
  try {
    const prepared = await prepareCard(request, {
      assetsDir: config.assetsDir,
      seed: config.shuffleSeed,
    });
    printWarnings(prepared.warnings);
    console.log(JSON.stringify(summarizePlan(prepared.plan), null, 2));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}

// --- Main ---

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  if (parsed.command === "validate") {
    runValidate(parsed.cardPath);
    return;
  }

  if (parsed.command === "plan") {
    await runPlan(config, parsed.cardPath, parsed.policy);
    return;
  }

  // parsed.command === "run"
  console.log(`Processing ${parsed.cardPath}...`);
  await runGenerate(config, parsed.cardPath, parsed.outputPath, parsed.policy);
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
