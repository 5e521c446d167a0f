export { discoverImages, compareFileNames } from "./io/discover-images.js";
export type { DiscoverImagesOptions } from "./io/discover-images.js";
export {
  findQuantityFile,
  parseQuantityFile,
  parseQuantityFromName,
  parseQuantityText,
  resolveQuantity
} from "./io/quantity-file.js";
export { defaultOutputPath, partOutputPath } from "./io/output-path.js";
export { normalizeCard, normalizeDeck, removeArtifacts } from "./normalize/normalize-card.js";
export type { NormalizeCardOptions } from "./normalize/normalize-card.js";
export { createGridGeometry } from "./layout/grid-geometry.js";
export { GridPaginator, advanceCursor, cellOrigin, cursorForIndex, paginate } from "./layout/grid-paginator.js";
export { renderDeckPdf } from "./render/render-pdf.js";
export type { DeckRenderer } from "./render/render-pdf.js";
export { emitDeck, formatMegabytes, megabytesToBytes } from "./emit/emit-deck.js";
export type { EmitDeckOptions } from "./emit/emit-deck.js";
export { planParts, sliceParts } from "./emit/split-plan.js";
export { NO_IMAGES_WARNING, runCli } from "./run-cli.js";
export type { CliLogger } from "./run-cli.js";
export type * from "./types.js";
