import { z } from "zod";

export const QuantitySchema = z.number().int().min(1);
export type Quantity = z.infer<typeof QuantitySchema>;

export const QuantityTextSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "quantity must be a whole number")
  .transform((value) => Number(value))
  .pipe(QuantitySchema);

export const QuantityLineSchema = z
  .tuple([z.string().trim().min(1, "name must not be empty"), QuantityTextSchema])
  .transform(([name, quantity]) => ({ name, quantity }));
export type QuantityLine = z.infer<typeof QuantityLineSchema>;
