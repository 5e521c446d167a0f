import type { Quantity } from "@cardsheet/schema";

export type QuantityMap = Map<string, Quantity>;

export type WarningHandler = (message: string) => void;
export type ProgressHandler = (message: string) => void;

export interface CardEntry {
  sourceImagePath: string;
  resolvedRenderPath: string;
}

export interface GridGeometry {
  cardWidth: number;
  cardHeight: number;
  pageWidth: number;
  pageHeight: number;
  cardsPerRow: number;
  cardsPerColumn: number;
  cardsPerPage: number;
  marginX: number;
  marginY: number;
}

export interface GridCursor {
  pageIndex: number;
  rowIndex: number;
  colIndex: number;
}

export interface CardPlacement<T> {
  item: T;
  cursor: GridCursor;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PagePlan<T> {
  pageIndex: number;
  placements: CardPlacement<T>[];
}

export interface PartPlan {
  averageCardBytes: number;
  cardsPerPart: number;
  totalParts: number;
}

export interface EmittedFile {
  path: string;
  bytes: number;
  cardCount: number;
}

export interface EmitDeckResult {
  cardCount: number;
  measuredBytes: number;
  split: boolean;
  files: EmittedFile[];
}
