import { existsSync } from "node:fs";
import { readFile, readdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { PDFDocument } from "pdf-lib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { emitDeck } from "../src/emit/emit-deck.js";
import { discoverImages } from "../src/io/discover-images.js";
import type { DeckRenderer } from "../src/render/render-pdf.js";
import type { CardEntry } from "../src/types.js";
import { makeTempDir, writePng } from "./fixtures.js";

describe("emitDeck", () => {
  let sourceDir: string;
  let scratchDir: string;
  let outputDir: string;

  beforeEach(async () => {
    sourceDir = await makeTempDir("emit-src");
    scratchDir = await makeTempDir("emit-scratch");
    outputDir = await makeTempDir("emit-out");
  });

  afterEach(async () => {
    for (const dir of [sourceDir, scratchDir, outputDir]) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  async function writeDeck(names: string[]): Promise<string[]> {
    const paths: string[] = [];
    for (const name of names) {
      paths.push(await writePng(path.join(sourceDir, name), 4, 6));
    }
    return paths;
  }

  /** Fake renderer: 1000 bytes per card, 9000 for cards whose file name contains "big". */
  function sizedRenderer(calls: CardEntry[][]): DeckRenderer {
    return async (cards) => {
      calls.push([...cards]);
      for (const card of cards) {
        expect(existsSync(card.resolvedRenderPath)).toBe(true);
      }
      const size = cards.reduce(
        (total, card) => total + (path.basename(card.sourceImagePath).includes("big") ? 9000 : 1000),
        0
      );
      return new Uint8Array(size);
    };
  }

  it("writes a single two-page PDF for 13 cards and leaves no temporary files", async () => {
    const names = Array.from({ length: 13 }, (_, index) => `card-${String(index).padStart(2, "0")}.png`);
    await writeDeck(names);
    const imagePaths = await discoverImages({ folder: sourceDir, includeSubfolders: true });
    const outputPath = path.join(outputDir, "deck.pdf");

    const result = await emitDeck(imagePaths, { outputPath, scaleImages: true, scratchDir });

    const pdf = await PDFDocument.load(await readFile(outputPath));
    expect(pdf.getPageCount()).toBe(2);
    expect(pdf.getPage(0).getSize()).toEqual({ width: 612, height: 792 });
    expect(result.split).toBe(false);
    expect(result.cardCount).toBe(13);
    expect(result.files).toEqual([{ path: outputPath, bytes: result.measuredBytes, cardCount: 13 }]);
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it("keeps a single file when the render fits under the cap", async () => {
    const imagePaths = await writeDeck(["a.png", "b.png", "c.png"]);
    const outputPath = path.join(outputDir, "small.pdf");
    const calls: CardEntry[][] = [];

    const result = await emitDeck(imagePaths, {
      outputPath,
      scaleImages: false,
      scratchDir,
      maxSizeBytes: 3000,
      render: sizedRenderer(calls)
    });

    expect(calls).toHaveLength(1);
    expect(result.files).toEqual([{ path: outputPath, bytes: 3000, cardCount: 3 }]);
    expect((await readFile(outputPath)).byteLength).toBe(3000);
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it("splits an oversized deck into contiguous numbered parts", async () => {
    const names = Array.from({ length: 12 }, (_, index) => `c${String(index).padStart(2, "0")}.png`);
    const imagePaths = await writeDeck(names);
    const outputPath = path.join(outputDir, "deck.pdf");
    const calls: CardEntry[][] = [];
    const progress: string[] = [];

    const result = await emitDeck(imagePaths, {
      outputPath,
      scaleImages: false,
      scratchDir,
      maxSizeBytes: 5000,
      render: sizedRenderer(calls),
      onProgress: (message) => progress.push(message)
    });

    expect(result.split).toBe(true);
    expect(result.measuredBytes).toBe(12000);
    expect(result.files).toEqual([
      { path: path.join(outputDir, "deck-part1.pdf"), bytes: 5000, cardCount: 5 },
      { path: path.join(outputDir, "deck-part2.pdf"), bytes: 5000, cardCount: 5 },
      { path: path.join(outputDir, "deck-part3.pdf"), bytes: 2000, cardCount: 2 }
    ]);
    expect(existsSync(outputPath)).toBe(false);

    const [measured, ...parts] = calls;
    expect(measured?.map((card) => card.sourceImagePath)).toEqual(imagePaths);
    expect(parts.flat().map((card) => card.sourceImagePath)).toEqual(imagePaths);
    expect(parts.flat().map((card) => card.resolvedRenderPath)).toEqual(
      measured?.map((card) => card.resolvedRenderPath)
    );
    expect(progress).toContain("Splitting into 3 parts of up to 5 cards (~0.00 MB per card)");
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it("warns about a part that still exceeds the cap", async () => {
    const imagePaths = await writeDeck(["a-big.png", "b.png", "c.png", "d.png"]);
    const outputPath = path.join(outputDir, "uneven.pdf");
    const warnings: string[] = [];

    const result = await emitDeck(imagePaths, {
      outputPath,
      scaleImages: false,
      scratchDir,
      maxSizeBytes: 6000,
      render: sizedRenderer([]),
      onWarning: (message) => warnings.push(message)
    });

    expect(result.files.map((file) => file.bytes)).toEqual([10000, 2000]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.startsWith(`Warning: ${path.join(outputDir, "uneven-part1.pdf")} is `)).toBe(true);
  });

  it("cleans up temporary files when rendering fails", async () => {
    const imagePaths = await writeDeck(["a.png", "b.png"]);
    const failingRender: DeckRenderer = async () => {
      throw new Error("render exploded");
    };

    await expect(
      emitDeck(imagePaths, {
        outputPath: path.join(outputDir, "never.pdf"),
        scaleImages: false,
        scratchDir,
        render: failingRender
      })
    ).rejects.toThrow("render exploded");
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it("aborts on an undecodable image without writing output", async () => {
    const imagePaths = await writeDeck(["good.png"]);
    const bad = path.join(sourceDir, "bad.png");
    await writeFile(bad, "nope", "utf8");
    const outputPath = path.join(outputDir, "broken.pdf");

    await expect(emitDeck([...imagePaths, bad], { outputPath, scaleImages: false, scratchDir })).rejects.toThrow(
      `Failed to normalize card image "${bad}"`
    );
    expect(existsSync(outputPath)).toBe(false);
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it("refuses an empty deck", async () => {
    await expect(
      emitDeck([], { outputPath: path.join(outputDir, "empty.pdf"), scaleImages: false, scratchDir })
    ).rejects.toThrow("Cannot emit an empty deck");
  });
});
