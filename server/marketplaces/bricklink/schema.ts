import { z } from "zod";

// ============================================================================
// Common
// ============================================================================

// BrickLink sometimes sends numbers as strings ("1250.00").
const numeric = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = typeof value === "number" ? value : Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

// ============================================================================
// GET /items/SET/{no}
// ============================================================================

const blDimensionsSchema = z
  .object({
    length: numeric.optional(),
    width: numeric.optional(),
    height: numeric.optional(),
  })
  .passthrough();

export const blCatalogItemResponseSchema = z
  .object({
    no: z.string().optional(),
    name: z.string().nullish(),
    type: z.string().optional(),
    year_released: z.number().int().nullish(),
    category_name: z.string().nullish(),
    image_url: z.string().nullish(),
    thumbnail_url: z.string().nullish(),
    weight: numeric.nullish(),
    dim: blDimensionsSchema.nullish(),
    dim_x: numeric.nullish(),
    dim_y: numeric.nullish(),
    dim_z: numeric.nullish(),
  })
  .passthrough();
export type BLCatalogItemResponse = z.infer<typeof blCatalogItemResponseSchema>;

// ============================================================================
// GET /items/SET/{no}/subsets
// ============================================================================

const blSubsetEntrySchema = z
  .object({
    item: z
      .object({
        no: z.string(),
        name: z.string().optional(),
        // Kept loose: unknown item types are filtered out rather than rejected.
        type: z.string(),
      })
      .passthrough(),
    color_id: z.number().int().optional(),
    quantity: z.number().int().positive().optional(),
    extra_quantity: z.number().int().optional(),
    is_alternate: z.boolean().optional(),
    is_counterpart: z.boolean().optional(),
  })
  .passthrough();
export type BLSubsetEntry = z.infer<typeof blSubsetEntrySchema>;

const blSubsetGroupSchema = z
  .object({
    match_no: z.number().optional(),
    entries: z.array(blSubsetEntrySchema).default([]),
  })
  .passthrough();

export const blSubsetsResponseSchema = z.array(blSubsetGroupSchema);
export type BLSubsetsResponse = z.infer<typeof blSubsetsResponseSchema>;

// ============================================================================
// GET /items/SET?type=SET
// ============================================================================

const blSearchItemSchema = z
  .object({
    no: z.string().optional(),
    name: z.string().nullish(),
    year_released: z.number().int().nullish(),
    category_name: z.string().nullish(),
    thumbnail_url: z.string().nullish(),
  })
  .passthrough();

export const blSearchResponseSchema = z.array(blSearchItemSchema);
export type BLSearchResponse = z.infer<typeof blSearchResponseSchema>;
