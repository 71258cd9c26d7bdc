import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import type { ZodError } from "zod";

import {
  CatalogApiError,
  CatalogAuthError,
  CatalogNotFoundError,
  CatalogRateLimitError,
  CatalogTimeoutError,
  InventoryItemNotFoundError,
  InventoryServiceError,
  SetNotFoundError,
} from "./catalog/errors";
import type { InventoryRecord, LegoSet } from "./inventory/schema";
import type { InventoryService } from "./inventory/service";
import {
  createSetBodySchema,
  listInventoryQuerySchema,
  searchSetsQuerySchema,
  updateInventoryBodySchema,
} from "./inventory/validators";
import { toApiError } from "./lib/external/types";

export type HttpAppDeps = {
  service: InventoryService;
};

const toSetResponse = (legoSet: LegoSet) => ({
  set_no: legoSet.setNo,
  name: legoSet.name,
  assembled: legoSet.assembled,
});

const toItemResponse = (record: InventoryRecord) => ({
  id: record.id,
  set_no: record.setNo,
  part_no: record.partNo,
  color_id: record.colorId,
  qty: record.qty,
  state: record.state,
  name: record.name,
});

const invalidInput = (res: Response, error: ZodError) =>
  res.status(400).json(
    toApiError("INVALID_INPUT", "Request validation failed", {
      issues: error.flatten().fieldErrors,
    }),
  );

// Express 4 does not forward rejected promises to the error middleware.
const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

function statusFor(error: InventoryServiceError): number {
  if (
    error instanceof SetNotFoundError ||
    error instanceof CatalogNotFoundError ||
    error instanceof InventoryItemNotFoundError
  ) {
    return 404;
  }
  if (error instanceof CatalogAuthError) {
    return 401;
  }
  if (error instanceof CatalogRateLimitError) {
    return 429;
  }
  if (error instanceof CatalogTimeoutError) {
    return 504;
  }
  if (error instanceof CatalogApiError) {
    return 502;
  }
  return 500;
}

const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  if (error instanceof SyntaxError && "body" in error) {
    res.status(400).json(toApiError("INVALID_INPUT", "Malformed JSON body"));
    return;
  }

  if (error instanceof InventoryServiceError) {
    const status = statusFor(error);
    if (error instanceof CatalogRateLimitError && error.retryAfterMs !== undefined) {
      res.setHeader("Retry-After", String(Math.ceil(error.retryAfterMs / 1000)));
    }
    if (status >= 500) {
      console.error(`[http] ${req.method} ${req.path} failed`, {
        code: error.code,
        message: error.message,
      });
    }
    res.status(status).json(toApiError(error.code, error.message));
    return;
  }

  console.error(`[http] ${req.method} ${req.path} failed unexpectedly`, error);
  res.status(500).json(toApiError("INTERNAL_ERROR", "Internal error"));
};

export function createHttpApp({ service }: HttpAppDeps): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get(
    "/health/catalog",
    asyncHandler(async (_req, res) => {
      const ok = await service.catalogHealthy();
      res.status(ok ? 200 : 503).json({ provider: "bricklink", ok });
    }),
  );

  app.post(
    "/sets",
    asyncHandler(async (req, res) => {
      const parsed = createSetBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return invalidInput(res, parsed.error);
      }

      const legoSet = await service.addSet(parsed.data.set_no, parsed.data.assembled);
      res.json({ ok: true, set: toSetResponse(legoSet) });
    }),
  );

  app.get(
    "/sets/search",
    asyncHandler(async (req, res) => {
      const parsed = searchSetsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return invalidInput(res, parsed.error);
      }

      const items = await service.searchSets(parsed.data.q, parsed.data.limit);
      res.json({ items, count: items.length });
    }),
  );

  app.get("/sets/:setNo", (req, res) => {
    res.json({ set: toSetResponse(service.getSet(req.params.setNo)) });
  });

  app.get("/inventory", (req, res) => {
    const parsed = listInventoryQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      invalidInput(res, parsed.error);
      return;
    }

    const items = service.listInventory(parsed.data.state).map(toItemResponse);
    res.json({ items, count: items.length });
  });

  app.patch("/inventory", (req, res) => {
    const parsed = updateInventoryBodySchema.safeParse(req.body);
    if (!parsed.success) {
      invalidInput(res, parsed.error);
      return;
    }

    const { part_no, color_id, qty, state, set_no } = parsed.data;
    const updated = service.updateItem({
      partNo: part_no,
      colorId: color_id,
      qty,
      state,
      setNo: set_no,
    });
    if (!updated) {
      throw new InventoryItemNotFoundError(part_no, color_id);
    }
    res.json({ ok: true });
  });

  app.use(errorHandler);
  return app;
}
