import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { BYTES_PER_MEGABYTE } from "@cardsheet/schema";
import { SCRATCH_DIR_PREFIX } from "../constants.js";
import { partOutputPath } from "../io/output-path.js";
import { createGridGeometry } from "../layout/grid-geometry.js";
import { normalizeDeck, removeArtifacts } from "../normalize/normalize-card.js";
import { renderDeckPdf, type DeckRenderer } from "../render/render-pdf.js";
import type { CardEntry, EmitDeckResult, EmittedFile, GridGeometry, ProgressHandler, WarningHandler } from "../types.js";
import { planParts, sliceParts } from "./split-plan.js";

export interface EmitDeckOptions {
  outputPath: string;
  scaleImages: boolean;
  scratchDir: string;
  maxSizeBytes?: number;
  geometry?: GridGeometry;
  render?: DeckRenderer;
  onProgress?: ProgressHandler;
  onWarning?: WarningHandler;
}

export function megabytesToBytes(megabytes: number): number {
  return megabytes * BYTES_PER_MEGABYTE;
}

export async function emitDeck(imagePaths: readonly string[], options: EmitDeckOptions): Promise<EmitDeckResult> {
  if (imagePaths.length === 0) {
    throw new Error("Cannot emit an empty deck");
  }

  const geometry = options.geometry ?? createGridGeometry();
  const render = options.render ?? renderDeckPdf;
  const onProgress = options.onProgress ?? (() => undefined);
  const onWarning = options.onWarning ?? (() => undefined);

  await mkdir(options.scratchDir, { recursive: true });
  const runDir = await mkdtemp(path.join(options.scratchDir, SCRATCH_DIR_PREFIX));
  let pending: CardEntry[] = [];

  try {
    const cards = await normalizeDeck(imagePaths, { scaleImages: options.scaleImages, scratchDir: runDir }, onProgress);
    pending = [...cards];

    const fullRender = await render(cards, geometry);
    const measuredBytes = fullRender.byteLength;
    onProgress(`Measured ${cards.length} cards at ${formatMegabytes(measuredBytes)}`);

    if (options.maxSizeBytes === undefined || measuredBytes <= options.maxSizeBytes) {
      await writeOutput(options.outputPath, fullRender);
      await removeArtifacts(cards);
      pending = [];
      return {
        cardCount: cards.length,
        measuredBytes,
        split: false,
        files: [{ path: options.outputPath, bytes: measuredBytes, cardCount: cards.length }]
      };
    }

    const plan = planParts(measuredBytes, cards.length, options.maxSizeBytes);
    onProgress(
      `Splitting into ${plan.totalParts} parts of up to ${plan.cardsPerPart} cards ` +
        `(~${formatMegabytes(plan.averageCardBytes)} per card)`
    );

    const files: EmittedFile[] = [];
    for (const [index, partCards] of sliceParts(cards, plan.cardsPerPart).entries()) {
      const partPath = partOutputPath(options.outputPath, index + 1);
      const bytes = await render(partCards, geometry);
      await writeOutput(partPath, bytes);
      await removeArtifacts(partCards);
      pending = pending.slice(partCards.length);

      if (bytes.byteLength > options.maxSizeBytes) {
        onWarning(
          `Warning: ${partPath} is ${formatMegabytes(bytes.byteLength)}, over the ${formatMegabytes(options.maxSizeBytes)} cap`
        );
      }
      files.push({ path: partPath, bytes: bytes.byteLength, cardCount: partCards.length });
    }

    return { cardCount: cards.length, measuredBytes, split: true, files };
  } finally {
    await removeArtifacts(pending);
    await rm(runDir, { recursive: true, force: true });
  }
}

async function writeOutput(outputPath: string, bytes: Uint8Array): Promise<void> {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, bytes);
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / BYTES_PER_MEGABYTE).toFixed(2)} MB`;
}
