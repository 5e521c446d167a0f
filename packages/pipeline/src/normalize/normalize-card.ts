import { randomUUID } from "node:crypto";
import { rm } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import { CARD_PIXEL_HEIGHT, CARD_PIXEL_WIDTH } from "@cardsheet/schema";
import { TEMP_ARTIFACT_SUFFIX } from "../constants.js";
import type { CardEntry, ProgressHandler } from "../types.js";

export interface NormalizeCardOptions {
  scaleImages: boolean;
  scratchDir: string;
}

export async function normalizeCard(sourceImagePath: string, options: NormalizeCardOptions): Promise<CardEntry> {
  const resolvedRenderPath = buildArtifactPath(sourceImagePath, options.scratchDir);

  try {
    const metadata = await sharp(sourceImagePath).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error("image has no readable dimensions");
    }

    let pipeline = sharp(sourceImagePath).removeAlpha().toColourspace("srgb");
    if (metadata.width > metadata.height) {
      pipeline = pipeline.rotate(270);
    }
    if (options.scaleImages) {
      pipeline = pipeline.resize(CARD_PIXEL_WIDTH, CARD_PIXEL_HEIGHT, { fit: "fill", kernel: "lanczos3" });
    }

    await pipeline.png().toFile(resolvedRenderPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to normalize card image "${sourceImagePath}": ${message}`);
  }

  return { sourceImagePath, resolvedRenderPath };
}

export async function normalizeDeck(
  imagePaths: readonly string[],
  options: NormalizeCardOptions,
  onProgress?: ProgressHandler
): Promise<CardEntry[]> {
  const cards: CardEntry[] = [];

  try {
    for (const [index, imagePath] of imagePaths.entries()) {
      cards.push(await normalizeCard(imagePath, options));
      onProgress?.(`Normalized ${index + 1}/${imagePaths.length}: ${path.basename(imagePath)}`);
    }
  } catch (error) {
    await removeArtifacts(cards);
    throw error;
  }

  return cards;
}

export async function removeArtifacts(cards: readonly CardEntry[]): Promise<void> {
  for (const card of cards) {
    await rm(card.resolvedRenderPath, { force: true });
  }
}

function buildArtifactPath(sourceImagePath: string, scratchDir: string): string {
  const baseName = path.parse(sourceImagePath).name;
  const suffix = randomUUID().replace(/-/g, "").slice(0, 8);
  return path.join(scratchDir, `${baseName}_${suffix}${TEMP_ARTIFACT_SUFFIX}`);
}
