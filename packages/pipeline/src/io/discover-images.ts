import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { IMAGE_FILE_REGEX } from "../constants.js";
import type { WarningHandler } from "../types.js";
import { findQuantityFile, parseQuantityFile, resolveQuantity } from "./quantity-file.js";

export interface DiscoverImagesOptions {
  folder: string;
  includeSubfolders: boolean;
  onWarning?: WarningHandler;
}

export async function discoverImages(options: DiscoverImagesOptions): Promise<string[]> {
  const onWarning = options.onWarning ?? (() => undefined);
  const discovered: string[] = [];
  await collectDirectory(options.folder, options.includeSubfolders, onWarning, discovered);
  return discovered;
}

async function collectDirectory(
  directory: string,
  recurse: boolean,
  onWarning: WarningHandler,
  discovered: string[]
): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });
  const fileNames: string[] = [];
  for (const entry of entries) {
    if (await isFileLike(directory, entry)) {
      fileNames.push(entry.name);
    }
  }
  fileNames.sort(compareFileNames);

  const quantityFileName = findQuantityFile(fileNames);
  const quantities = quantityFileName
    ? await parseQuantityFile(path.join(directory, quantityFileName), onWarning)
    : new Map<string, number>();

  for (const fileName of fileNames) {
    if (!IMAGE_FILE_REGEX.test(fileName)) {
      continue;
    }

    const imagePath = path.join(directory, fileName);
    const quantity = resolveQuantity(fileName, quantities);
    for (let copy = 0; copy < quantity; copy += 1) {
      discovered.push(imagePath);
    }
  }

  if (!recurse) {
    return;
  }

  const subdirectories = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort(compareFileNames);
  for (const subdirectory of subdirectories) {
    await collectDirectory(path.join(directory, subdirectory), recurse, onWarning, discovered);
  }
}

// Symlinks count as files unless they point at a directory; linked directories are not descended into.
async function isFileLike(directory: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }

  const target = await stat(path.join(directory, entry.name)).catch(() => null);
  return target === null || !target.isDirectory();
}

export function compareFileNames(left: string, right: string): number {
  const leftLower = left.toLowerCase();
  const rightLower = right.toLowerCase();
  if (leftLower !== rightLower) {
    return leftLower < rightLower ? -1 : 1;
  }
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
