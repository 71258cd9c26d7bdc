// Provider-neutral catalog contract. BrickLink is the production implementation;
// tests use an in-memory double (test/utils/fake-catalog.ts).

export type SetDimensions = {
  length?: number;
  width?: number;
  height?: number;
};

export interface SetSearchResult {
  setNo: string;
  name: string;
  year?: number;
  theme?: string;
  numParts?: number;
  imageUrl?: string;
}

export interface SetMetadata extends SetSearchResult {
  /** Grams. */
  weight?: number;
  dimensions?: SetDimensions;
}

export interface InventoryPart {
  partNo: string;
  colorId: number;
  qty: number;
  name: string;
  isSpare: boolean;
  isCounterpart: boolean;
}

export interface CatalogService {
  /** Results are truncated to `limit` after the provider answers. */
  searchSets(query: string, limit?: number): Promise<SetSearchResult[]>;
  fetchSetMetadata(setNo: string): Promise<SetMetadata>;
  /** Parts only; minifigures and nested sets are broken down or dropped. */
  fetchSetInventory(setNo: string): Promise<readonly InventoryPart[]>;
  /** Never throws. */
  healthCheck(): Promise<boolean>;
}
