import { USAGE, resolveCliCommand } from "./cli-options.js";
import { emitDeck, megabytesToBytes } from "./emit/emit-deck.js";
import { discoverImages } from "./io/discover-images.js";
import { loadEnvLocal } from "./io/load-env-local.js";
import type { EmittedFile } from "./types.js";

export interface CliLogger {
  log: (message: string) => void;
  warn: (message: string) => void;
}

export const NO_IMAGES_WARNING =
  "Warning: No valid image files found. Make sure you're using JPG or PNG files with optional -xN or cards.txt.";

export async function runCli(
  args: readonly string[],
  env: NodeJS.ProcessEnv,
  cwd: string,
  logger: CliLogger
): Promise<EmittedFile[]> {
  loadEnvLocal(cwd, env);

  const command = resolveCliCommand(args, env, cwd);
  if (command.kind === "help") {
    logger.log(USAGE);
    return [];
  }

  const { options } = command;
  const imagePaths = await discoverImages({
    folder: options.folder,
    includeSubfolders: options.includeSubfolders,
    onWarning: logger.warn
  });

  if (imagePaths.length === 0) {
    logger.warn(NO_IMAGES_WARNING);
    return [];
  }

  logger.log(`Folder: ${options.folder}`);
  logger.log(`Cards: ${imagePaths.length}`);
  logger.log(`Scaling: ${options.scaleImages ? "750x1050" : "disabled"}`);
  logger.log(`Size cap: ${options.maxSizeMb === undefined ? "none" : `${options.maxSizeMb} MB`}`);

  const result = await emitDeck(imagePaths, {
    outputPath: options.outputPath,
    scaleImages: options.scaleImages,
    scratchDir: options.scratchDir,
    maxSizeBytes: options.maxSizeMb === undefined ? undefined : megabytesToBytes(options.maxSizeMb),
    onProgress: logger.log,
    onWarning: logger.warn
  });

  for (const file of result.files) {
    logger.log(`PDF saved to: ${file.path} (${file.cardCount} cards)`);
  }
  return result.files;
}
