import * as path from "path";
import type { PackingPolicy } from "../contracts";
import { VALID_POLICIES, isPackingPolicy } from "../pipeline/request";

// --- CLI Arg Types ---

export interface RunArgs {
  command: "run";
  cardPath: string;
  outputPath: string | null;
  policy: PackingPolicy | null;
}

export interface ValidateArgs {
  command: "validate";
  cardPath: string;
}

export interface PlanArgs {
  command: "plan";
  cardPath: string;
  policy: PackingPolicy | null;
}

export type ParsedArgs = RunArgs | ValidateArgs | PlanArgs;

// --- CLI Parsing ---

function printUsage(): void {
  console.error("Usage:");
  console.error("  freqcard run <card.json> [--out <file.png>] [--policy fixed-slot|greedy-flow]");
  console.error("  freqcard validate <card.json>");
  console.error("  freqcard plan <card.json> [--policy fixed-slot|greedy-flow]");
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function requireCardPath(args: string[], command: string): string {
  if (args.length < 2 || args[1].startsWith("--")) {
    console.error(`Error: '${command}' requires a card file path.`);
    printUsage();
    process.exit(1);
  }
  return path.resolve(args[1]);
}

function readValue(args: string[], i: number, flag: string): string {
  if (i + 1 >= args.length || args[i + 1].startsWith("--")) {
    fail(`${flag} requires a value`);
  }
  return args[i + 1];
}

function readPolicy(value: string): PackingPolicy {
  if (!isPackingPolicy(value)) {
    fail(`--policy must be one of: ${VALID_POLICIES.join(", ")}`);
  }
  return value;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.length === 0) {
    console.error("Error: No command or arguments provided.");
    printUsage();
    process.exit(1);
  }

  const firstArg = args[0];

  // run <card.json> [--out <file>] [--policy <policy>]
  if (firstArg === "run" || firstArg === "plan") {
    const cardPath = requireCardPath(args, firstArg);
    let outputPath: string | null = null;
    let policy: PackingPolicy | null = null;

    for (let i = 2; i < args.length; i++) {
      if (args[i] === "--policy") {
        policy = readPolicy(readValue(args, i, "--policy"));
        i++;
      } else if (args[i] === "--out" && firstArg === "run") {
        outputPath = path.resolve(readValue(args, i, "--out"));
        i++;
      } else {
        fail(`Unknown argument "${args[i]}"`);
      }
    }

    if (firstArg === "plan") {
      return { command: "plan", cardPath, policy };
    }
    return { command: "run", cardPath, outputPath, policy };
  }

  // validate <card.json>
  if (firstArg === "validate") {
    const cardPath = requireCardPath(args, "validate");
    if (args.length > 2) {
      fail("'validate' does not accept additional arguments.");
    }
    return { command: "validate", cardPath };
  }

  // Unknown
  if (firstArg.startsWith("--")) {
    console.error(`Error: Unknown flag "${firstArg}"`);
  } else {
    console.error(`Error: Unknown command "${firstArg}"`);
  }
  printUsage();
  process.exit(1);
}
