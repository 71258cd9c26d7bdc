import { z } from "zod";

import { pieceStateSchema } from "./schema";

export const setNoSchema = z
  .string()
  .regex(/^[0-9A-Za-z-]{2,20}$/, "set_no must be 2-20 letters, digits or dashes");

export const createSetBodySchema = z.object({
  set_no: setNoSchema,
  assembled: z.boolean().default(false),
});

export const updateInventoryBodySchema = z.object({
  part_no: z.string().regex(/^[0-9A-Za-z-]{1,20}$/, "part_no must be 1-20 letters, digits or dashes"),
  color_id: z.number().int().min(0).max(9999),
  qty: z.number().int().min(1).max(10000),
  state: pieceStateSchema,
  set_no: setNoSchema.optional(),
});

export const listInventoryQuerySchema = z.object({
  state: pieceStateSchema.optional(),
});

export const searchSetsQuerySchema = z.object({
  q: z.string().trim().min(1, "q is required"),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
