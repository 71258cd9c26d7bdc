import { decode } from "he";

import type {
  InventoryPart,
  SetDimensions,
  SetMetadata,
  SetSearchResult,
} from "../../catalog/types";
import type {
  BLCatalogItemResponse,
  BLSearchResponse,
  BLSubsetEntry,
  BLSubsetsResponse,
} from "./schema";

export function decodeHtmlEntities(input: string): string {
  return decode(input, { isAttributeValue: false });
}

export function normalizeImageUrl(url: string | null | undefined): string | undefined {
  if (!url) {
    return undefined;
  }
  return url.startsWith("//") ? `https:${url}` : url;
}

function mapDimensions(raw: BLCatalogItemResponse): SetDimensions | undefined {
  const length = raw.dim?.length ?? raw.dim_x ?? undefined;
  const width = raw.dim?.width ?? raw.dim_y ?? undefined;
  const height = raw.dim?.height ?? raw.dim_z ?? undefined;

  if (length === undefined && width === undefined && height === undefined) {
    return undefined;
  }
  return { length, width, height };
}

export function mapSetMetadata(raw: BLCatalogItemResponse, requestedSetNo: string): SetMetadata {
  return {
    setNo: raw.no ?? requestedSetNo,
    name: raw.name ? decodeHtmlEntities(raw.name) : "",
    year: raw.year_released ?? undefined,
    theme: raw.category_name ? decodeHtmlEntities(raw.category_name) : undefined,
    // BrickLink's item endpoint does not report a piece count.
    numParts: undefined,
    imageUrl: normalizeImageUrl(raw.image_url),
    weight: raw.weight ?? undefined,
    dimensions: mapDimensions(raw),
  };
}

const toInventoryPart = (entry: BLSubsetEntry): InventoryPart => ({
  partNo: entry.item.no,
  colorId: entry.color_id ?? 0,
  qty: entry.quantity ?? 1,
  name: entry.item.name ? decodeHtmlEntities(entry.item.name) : "",
  isSpare: entry.is_alternate ?? false,
  isCounterpart: entry.is_counterpart ?? false,
});

// Minifigures and nested sets arrive already broken down; only PART rows are kept.
export function mapSubsetEntries(groups: BLSubsetsResponse): InventoryPart[] {
  return groups
    .flatMap((group) => group.entries)
    .filter((entry) => entry.item.type === "PART")
    .map(toInventoryPart);
}

export function mapSearchResults(items: BLSearchResponse, limit: number): SetSearchResult[] {
  return items.slice(0, limit).map((item) => ({
    setNo: item.no ?? "",
    name: item.name ? decodeHtmlEntities(item.name) : "",
    year: item.year_released ?? undefined,
    theme: item.category_name ? decodeHtmlEntities(item.category_name) : undefined,
    numParts: undefined,
    imageUrl: normalizeImageUrl(item.thumbnail_url),
  }));
}
