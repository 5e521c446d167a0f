import { existsSync } from "node:fs";
import path from "node:path";

const ROOT_MARKERS = [".git", "package.json"];

export function findProjectRoot(startDirectory: string): string {
  let currentDir = path.resolve(startDirectory);
  while (true) {
    if (ROOT_MARKERS.some((marker) => existsSync(path.join(currentDir, marker)))) {
      return currentDir;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return path.resolve(startDirectory);
    }
    currentDir = parentDir;
  }
}
