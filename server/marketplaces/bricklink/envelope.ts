// Helpers for validating the "meta + data" envelope that BrickLink returns.
import { z } from "zod";

import { CatalogApiError } from "../../catalog/errors";
import { catalogErrorForStatus } from "./errors";

const blResponseMetaSchema = z
  .object({
    code: z.number().optional(),
    message: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

// `meta` is optional on the wire; `data` is parsed per endpoint.
const blEnvelopeSchema = z
  .object({
    meta: blResponseMetaSchema.optional(),
    data: z.unknown(),
  })
  .passthrough();

export function parseBlResponse<S extends z.ZodTypeAny>(
  raw: unknown,
  dataSchema: S,
  ctx: { endpoint: string; correlationId?: string },
): z.output<S> {
  const envelope = blEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new CatalogApiError("Invalid BrickLink response: envelope did not match", {
      endpoint: ctx.endpoint,
      correlationId: ctx.correlationId,
      issues: envelope.error.flatten(),
    });
  }

  // BrickLink can answer 200 while reporting the failure in `meta.code`.
  const meta = envelope.data.meta;
  if (meta?.code !== undefined && meta.code >= 400) {
    throw catalogErrorForStatus(meta.code, meta.description ?? meta.message ?? "request failed", {
      endpoint: ctx.endpoint,
      correlationId: ctx.correlationId,
    });
  }

  const data = dataSchema.safeParse(envelope.data.data);
  if (!data.success) {
    throw new CatalogApiError("Invalid BrickLink response: data did not match", {
      endpoint: ctx.endpoint,
      correlationId: ctx.correlationId,
      issues: data.error.flatten(),
    });
  }

  return data.data;
}
