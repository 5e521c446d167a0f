import type { CardPlacement, GridCursor, GridGeometry, PagePlan } from "../types.js";

export const START_CURSOR: GridCursor = { pageIndex: 0, rowIndex: 0, colIndex: 0 };

export function cursorForIndex(index: number, geometry: GridGeometry): GridCursor {
  const slot = index % geometry.cardsPerPage;
  return {
    pageIndex: Math.floor(index / geometry.cardsPerPage),
    rowIndex: Math.floor(slot / geometry.cardsPerRow),
    colIndex: slot % geometry.cardsPerRow
  };
}

export function advanceCursor(cursor: GridCursor, geometry: GridGeometry): GridCursor {
  if (cursor.colIndex + 1 < geometry.cardsPerRow) {
    return { ...cursor, colIndex: cursor.colIndex + 1 };
  }
  if (cursor.rowIndex + 1 < geometry.cardsPerColumn) {
    return { ...cursor, rowIndex: cursor.rowIndex + 1, colIndex: 0 };
  }
  return { pageIndex: cursor.pageIndex + 1, rowIndex: 0, colIndex: 0 };
}

export function cellOrigin(cursor: GridCursor, geometry: GridGeometry): { x: number; y: number } {
  return {
    x: geometry.marginX + cursor.colIndex * geometry.cardWidth,
    y: geometry.pageHeight - geometry.marginY - (cursor.rowIndex + 1) * geometry.cardHeight
  };
}

export class GridPaginator<T> {
  private cursor: GridCursor = START_CURSOR;
  private readonly laidOut: PagePlan<T>[] = [];

  constructor(private readonly geometry: GridGeometry) {}

  get position(): GridCursor {
    return this.cursor;
  }

  place(item: T): CardPlacement<T> {
    const cursor = this.cursor;
    const { x, y } = cellOrigin(cursor, this.geometry);
    const placement: CardPlacement<T> = {
      item,
      cursor,
      x,
      y,
      width: this.geometry.cardWidth,
      height: this.geometry.cardHeight
    };

    let page = this.laidOut[this.laidOut.length - 1];
    if (!page || page.pageIndex !== cursor.pageIndex) {
      page = { pageIndex: cursor.pageIndex, placements: [] };
      this.laidOut.push(page);
    }
    page.placements.push(placement);

    this.cursor = advanceCursor(cursor, this.geometry);
    return placement;
  }

  pages(): PagePlan<T>[] {
    return this.laidOut.map((page) => ({ pageIndex: page.pageIndex, placements: [...page.placements] }));
  }
}

export function paginate<T>(items: readonly T[], geometry: GridGeometry): PagePlan<T>[] {
  const paginator = new GridPaginator<T>(geometry);
  for (const item of items) {
    paginator.place(item);
  }
  return paginator.pages();
}
