import path from "node:path";
import { DEFAULT_OUTPUT_NAME, PART_SUFFIX } from "../constants.js";

export function defaultOutputPath(folder: string, cwd: string = process.cwd()): string {
  const relativePath = path.relative(cwd, path.resolve(cwd, folder));
  const segments = relativePath
    .split(/[\\/]+/)
    .filter((segment) => segment.length > 0 && segment !== "." && segment !== "..")
    .map((segment) => segment.replace(/ /g, ""))
    .filter((segment) => segment.length > 0);

  return `${segments.length > 0 ? segments.join("-") : DEFAULT_OUTPUT_NAME}.pdf`;
}

export function partOutputPath(outputPath: string, partNumber: number): string {
  const base = outputPath.replace(/\.pdf$/i, "");
  return `${base}${PART_SUFFIX}${partNumber}.pdf`;
}
