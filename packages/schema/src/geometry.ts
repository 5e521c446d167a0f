import { z } from "zod";

export const POINTS_PER_INCH = 72;

export const DEFAULT_CARD_WIDTH = 2.5 * POINTS_PER_INCH;
export const DEFAULT_CARD_HEIGHT = 3.5 * POINTS_PER_INCH;

export const DEFAULT_PAGE_WIDTH = 8.5 * POINTS_PER_INCH;
export const DEFAULT_PAGE_HEIGHT = 11 * POINTS_PER_INCH;

export const CARD_PIXEL_WIDTH = 750;
export const CARD_PIXEL_HEIGHT = 1050;

export const GridGeometryInputSchema = z
  .object({
    cardWidth: z.number().positive().default(DEFAULT_CARD_WIDTH),
    cardHeight: z.number().positive().default(DEFAULT_CARD_HEIGHT),
    pageWidth: z.number().positive().default(DEFAULT_PAGE_WIDTH),
    pageHeight: z.number().positive().default(DEFAULT_PAGE_HEIGHT)
  })
  .strict()
  .refine((value) => value.cardWidth <= value.pageWidth && value.cardHeight <= value.pageHeight, {
    message: "card must fit on the page at least once"
  });
export type GridGeometryInput = z.input<typeof GridGeometryInputSchema>;
