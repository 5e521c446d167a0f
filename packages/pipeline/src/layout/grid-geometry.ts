import { GridGeometryInputSchema, type GridGeometryInput } from "@cardsheet/schema";
import type { GridGeometry } from "../types.js";

export function createGridGeometry(input: GridGeometryInput = {}): GridGeometry {
  const parsed = GridGeometryInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid grid geometry: ${issue?.path.join(".") || "<root>"} ${issue?.message ?? "unknown error"}`);
  }

  const { cardWidth, cardHeight, pageWidth, pageHeight } = parsed.data;
  const cardsPerRow = Math.floor(pageWidth / cardWidth);
  const cardsPerColumn = Math.floor(pageHeight / cardHeight);

  return {
    cardWidth,
    cardHeight,
    pageWidth,
    pageHeight,
    cardsPerRow,
    cardsPerColumn,
    cardsPerPage: cardsPerRow * cardsPerColumn,
    marginX: (pageWidth - cardsPerRow * cardWidth) / 2,
    marginY: (pageHeight - cardsPerColumn * cardHeight) / 2
  };
}
