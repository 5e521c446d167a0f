import type { PartPlan } from "../types.js";

export function planParts(totalBytes: number, cardCount: number, capBytes: number): PartPlan {
  if (cardCount < 1) {
    throw new Error("Cannot plan parts for an empty deck");
  }
  if (capBytes <= 0) {
    throw new Error(`Size cap must be positive, got ${capBytes}`);
  }

  const averageCardBytes = totalBytes / cardCount;
  const cardsPerPart = Math.max(1, Math.floor(capBytes / averageCardBytes));
  return {
    averageCardBytes,
    cardsPerPart,
    totalParts: Math.ceil(cardCount / cardsPerPart)
  };
}

export function sliceParts<T>(items: readonly T[], cardsPerPart: number): T[][] {
  const parts: T[][] = [];
  for (let start = 0; start < items.length; start += cardsPerPart) {
    parts.push(items.slice(start, start + cardsPerPart));
  }
  return parts;
}
