import { readFile } from "node:fs/promises";
import { PDFDocument } from "pdf-lib";
import { paginate } from "../layout/grid-paginator.js";
import type { CardEntry, GridGeometry } from "../types.js";

export type DeckRenderer = (cards: readonly CardEntry[], geometry: GridGeometry) => Promise<Uint8Array>;

export const renderDeckPdf: DeckRenderer = async (cards, geometry) => {
  const pdf = await PDFDocument.create();

  for (const page of paginate(cards, geometry)) {
    const pdfPage = pdf.addPage([geometry.pageWidth, geometry.pageHeight]);
    for (const placement of page.placements) {
      const bytes = await readFile(placement.item.resolvedRenderPath);
      const image = await pdf.embedPng(bytes);
      pdfPage.drawImage(image, {
        x: placement.x,
        y: placement.y,
        width: placement.width,
        height: placement.height
      });
    }
  }

  return pdf.save();
};
