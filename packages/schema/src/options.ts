import { z } from "zod";

export const BYTES_PER_MEGABYTE = 1024 * 1024;

export const RenderOptionsSchema = z
  .object({
    folder: z.string().min(1),
    outputPath: z.string().min(1),
    scaleImages: z.boolean().default(true),
    includeSubfolders: z.boolean().default(true),
    maxSizeMb: z.number().int().min(1).optional(),
    scratchDir: z.string().min(1)
  })
  .strict();
export type RenderOptions = z.infer<typeof RenderOptionsSchema>;
