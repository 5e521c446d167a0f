import os from "node:os";
import path from "node:path";
import { RenderOptionsSchema, type RenderOptions } from "@cardsheet/schema";
import { ENV_MAX_SIZE_MB, ENV_SCRATCH_DIR } from "./constants.js";
import { defaultOutputPath } from "./io/output-path.js";

type Flags = Map<string, string | boolean>;

const BOOLEAN_FLAGS = new Set(["--no-scale", "--no-subfolders", "--help", "-h"]);
const VALUE_FLAGS = new Set(["--output", "--max-size-mb", "--scratch-dir"]);

export interface ParsedArgs {
  positionals: string[];
  flags: Flags;
}

export type CliCommand = { kind: "help" } | { kind: "render"; options: RenderOptions };

export function parseArgs(args: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Flags = new Map();

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === "--") {
      continue;
    }
    if (BOOLEAN_FLAGS.has(token)) {
      flags.set(token, true);
      continue;
    }
    if (VALUE_FLAGS.has(token)) {
      const value = args[index + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`${token} requires a value`);
      }
      flags.set(token, value);
      index += 1;
      continue;
    }
    if (token.startsWith("-")) {
      throw new Error(`Unknown option: ${token}`);
    }
    positionals.push(token);
  }

  return { positionals, flags };
}

export function resolveCliCommand(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): CliCommand {
  const { positionals, flags } = parseArgs(args);

  if (getBooleanFlag(flags, "--help") || getBooleanFlag(flags, "-h")) {
    return { kind: "help" };
  }

  const [folder, ...extra] = positionals;
  if (!folder) {
    throw new Error("Missing required <folder> argument");
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected arguments: ${extra.join(" ")}`);
  }

  const explicitOutput = getStringFlag(flags, "--output");
  const maxSizeMb =
    getOptionalIntFlag(flags, "--max-size-mb") ?? parseOptionalInt(env[ENV_MAX_SIZE_MB], ENV_MAX_SIZE_MB);
  const scratchDir = getStringFlag(flags, "--scratch-dir") ?? nonEmpty(env[ENV_SCRATCH_DIR]) ?? os.tmpdir();

  const parsed = RenderOptionsSchema.safeParse({
    folder: path.resolve(cwd, folder),
    outputPath: path.resolve(cwd, explicitOutput ?? defaultOutputPath(folder, cwd)),
    scaleImages: !getBooleanFlag(flags, "--no-scale"),
    includeSubfolders: !getBooleanFlag(flags, "--no-subfolders"),
    maxSizeMb,
    scratchDir: path.resolve(cwd, scratchDir)
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid options: ${issue?.path.join(".") || "<root>"} ${issue?.message ?? "unknown error"}`);
  }

  return { kind: "render", options: parsed.data };
}

function getStringFlag(flags: Flags, key: string): string | undefined {
  const value = flags.get(key);
  if (typeof value !== "string") {
    return undefined;
  }
  return value;
}

function getBooleanFlag(flags: Flags, key: string): boolean {
  return flags.get(key) === true;
}

function getOptionalIntFlag(flags: Flags, key: string): number | undefined {
  return parseOptionalInt(getStringFlag(flags, key), key);
}

function parseOptionalInt(value: string | undefined, key: string): number | undefined {
  if (!nonEmpty(value)) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${key} must be an integer >= 1`);
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

export const USAGE = `
Usage:
  npm run render -- <folder> [options]

Arguments:
  <folder>                 Folder containing card images (JPG/PNG)

Options:
  --output <file>          Output PDF (default: derived from the folder path)
  --no-scale               Keep original pixel sizes instead of 750x1050
  --no-subfolders          Only read images directly inside <folder>
  --max-size-mb <n>        Split output into -partN files of about n MB
  --scratch-dir <dir>      Where temporary card images are written (default: OS temp dir)
  --help                   Show this message

Quantities:
  name-x3.png              Prints three copies of the image
  cards.txt                Lines of "name,quantity" override the filename (also quantities*.txt)

Environment overrides:
  ${ENV_MAX_SIZE_MB}    Default for --max-size-mb
  ${ENV_SCRATCH_DIR}    Default for --scratch-dir
`;
