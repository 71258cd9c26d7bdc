import type { z } from "zod";

import type {
  CatalogService,
  InventoryPart,
  SetMetadata,
  SetSearchResult,
} from "../../catalog/types";
import { TtlCache } from "../../lib/cache";
import type { QueryParams } from "../../lib/external/httpClient";
import { recordMetric } from "../../lib/external/metrics";
import type { HealthCheckResult } from "../../lib/external/types";
import { parseBlResponse } from "./envelope";
import { toCatalogError } from "./errors";
import {
  blCatalogItemResponseSchema,
  blSearchResponseSchema,
  blSubsetsResponseSchema,
} from "./schema";
import type { SignedRequestClient } from "./signedClient";
import { mapSearchResults, mapSetMetadata, mapSubsetEntries } from "./transformers";

export const DEFAULT_BASE_URL = "https://api.bricklink.com/api/store/v1";
const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
const DEFAULT_CACHE_SIZE = 100;
const DEFAULT_SEARCH_LIMIT = 20;
const INVENTORY_TTL_MULTIPLIER = 7;
// Any long-lived catalog item works as a reachability probe.
const HEALTH_PROBE_SET = "75192";

// Cached values are shared across callers; freeze them.
function freezeMetadata(metadata: SetMetadata): SetMetadata {
  if (metadata.dimensions) {
    Object.freeze(metadata.dimensions);
  }
  return Object.freeze(metadata);
}

export type CatalogTransport = Pick<SignedRequestClient, "get">;

export type BricklinkCatalogOptions = {
  baseUrl?: string;
  cacheTtlMs?: number;
  cacheSize?: number;
};

/**
 * BrickLink-backed catalog. Metadata and inventories are cached separately; inventories
 * change less often, so they live seven times longer in a cache half the size.
 */
export class BricklinkCatalogService implements CatalogService {
  private readonly baseUrl: string;
  private readonly metadataCache: TtlCache<string, SetMetadata>;
  private readonly inventoryCache: TtlCache<string, readonly InventoryPart[]>;

  constructor(
    private readonly client: CatalogTransport,
    options: BricklinkCatalogOptions = {},
  ) {
    const ttlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    const size = options.cacheSize ?? DEFAULT_CACHE_SIZE;

    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.metadataCache = new TtlCache({ maxSize: size, ttlMs });
    this.inventoryCache = new TtlCache({
      maxSize: Math.max(1, Math.floor(size / 2)),
      ttlMs: ttlMs * INVENTORY_TTL_MULTIPLIER,
    });
  }

  async searchSets(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<SetSearchResult[]> {
    console.info("[catalog] searching sets", { query });
    // The endpoint has no text filter; `limit` is applied locally.
    const items = await this.fetchData("/items/SET", blSearchResponseSchema.default([]), {
      type: "SET",
    });
    return mapSearchResults(items, limit);
  }

  async fetchSetMetadata(setNo: string): Promise<SetMetadata> {
    const cached = this.metadataCache.get(setNo);
    if (cached) {
      recordMetric("catalog.cache.hit", { cache: "metadata", setNo });
      return cached;
    }
    recordMetric("catalog.cache.miss", { cache: "metadata", setNo });

    console.info("[catalog] fetching set metadata", { setNo });
    const item = await this.fetchData(
      `/items/SET/${encodeURIComponent(setNo)}`,
      blCatalogItemResponseSchema.default({}),
    );

    const metadata = freezeMetadata(mapSetMetadata(item, setNo));
    this.metadataCache.set(setNo, metadata);
    return metadata;
  }

  async fetchSetInventory(setNo: string): Promise<readonly InventoryPart[]> {
    const cached = this.inventoryCache.get(setNo);
    if (cached) {
      recordMetric("catalog.cache.hit", { cache: "inventory", setNo });
      return cached;
    }
    recordMetric("catalog.cache.miss", { cache: "inventory", setNo });

    console.info("[catalog] fetching set inventory", { setNo });
    const groups = await this.fetchData(
      `/items/SET/${encodeURIComponent(setNo)}/subsets`,
      blSubsetsResponseSchema.default([]),
      { break_minifigs: true, break_subsets: true },
    );

    const parts = Object.freeze(mapSubsetEntries(groups).map((part) => Object.freeze(part)));
    console.info("[catalog] retrieved set inventory", { setNo, parts: parts.length });
    this.inventoryCache.set(setNo, parts);
    return parts;
  }

  async healthCheck(): Promise<boolean> {
    const result = await this.checkHealth();
    return result.ok;
  }

  async checkHealth(): Promise<HealthCheckResult> {
    const started = Date.now();
    try {
      await this.client.get(`${this.baseUrl}/items/SET/${HEALTH_PROBE_SET}`);
      const durationMs = Date.now() - started;
      recordMetric("external.bricklink.health", { ok: true, durationMs });
      return { provider: "bricklink", ok: true, durationMs };
    } catch (error) {
      const durationMs = Date.now() - started;
      const catalogError = toCatalogError(error);
      recordMetric("external.bricklink.health", {
        ok: false,
        durationMs,
        errorCode: catalogError.code,
      });
      console.warn("[catalog] health check failed", { error: catalogError.message });
      return { provider: "bricklink", ok: false, durationMs, errorCode: catalogError.code };
    }
  }

  clearCache(): void {
    this.metadataCache.clear();
    this.inventoryCache.clear();
    console.info("[catalog] cache cleared");
  }

  private async fetchData<S extends z.ZodTypeAny>(
    path: string,
    dataSchema: S,
    query?: QueryParams,
  ): Promise<z.output<S>> {
    try {
      const raw = await this.client.get(`${this.baseUrl}${path}`, query);
      return parseBlResponse(raw, dataSchema, { endpoint: path });
    } catch (error) {
      const catalogError = toCatalogError(error);
      console.error("[catalog] request failed", {
        endpoint: path,
        code: catalogError.code,
        message: catalogError.message,
      });
      throw catalogError;
    }
  }
}
