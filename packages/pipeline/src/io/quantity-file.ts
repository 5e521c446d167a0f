import { readFile } from "node:fs/promises";
import path from "node:path";
import { QuantityLineSchema, type Quantity } from "@cardsheet/schema";
import {
  FILENAME_QUANTITY_REGEX,
  QUANTITY_FILE_PREFIXES,
  QUANTITY_FILE_SUFFIX
} from "../constants.js";
import type { QuantityMap, WarningHandler } from "../types.js";

export function findQuantityFile(fileNames: readonly string[]): string | undefined {
  return fileNames.find((fileName) => {
    const lowered = fileName.toLowerCase();
    return (
      QUANTITY_FILE_PREFIXES.some((prefix) => lowered.startsWith(prefix)) && lowered.endsWith(QUANTITY_FILE_SUFFIX)
    );
  });
}

export async function parseQuantityFile(filePath: string, onWarning: WarningHandler): Promise<QuantityMap> {
  try {
    const contents = await readFile(filePath, "utf8");
    return parseQuantityText(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    onWarning(`Warning: Failed to parse quantity file ${filePath}: ${message}`);
    return new Map();
  }
}

export function parseQuantityText(contents: string): QuantityMap {
  const quantities: QuantityMap = new Map();

  for (const [index, line] of contents.split(/\r?\n/).entries()) {
    if (!line.includes(",")) {
      continue;
    }

    const parsed = QuantityLineSchema.safeParse(line.trim().split(","));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`line ${index + 1} "${line.trim()}": ${issue?.message ?? "invalid entry"}`);
    }

    quantities.set(parsed.data.name, parsed.data.quantity);
  }

  return quantities;
}

export function parseQuantityFromName(fileName: string): Quantity {
  const match = fileName.match(FILENAME_QUANTITY_REGEX);
  if (!match) {
    return 1;
  }

  const quantity = Number(match[1]);
  return Number.isInteger(quantity) && quantity >= 1 ? quantity : 1;
}

export function resolveQuantity(fileName: string, quantities: QuantityMap): Quantity {
  const baseName = path.parse(fileName).name;
  const strippedName = baseName.replace(FILENAME_QUANTITY_REGEX, "");
  return quantities.get(baseName) ?? quantities.get(strippedName) ?? parseQuantityFromName(fileName);
}
