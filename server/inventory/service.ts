import { SetNotFoundError } from "../catalog/errors";
import type { CatalogService, SetSearchResult } from "../catalog/types";
import { recordMetric } from "../lib/external/metrics";
import type { InventoryRecord, LegoSet, PieceState } from "./schema";
import type { InventoryStore, ItemUpdate } from "./store";

/**
 * Coordinates the catalog and the local store. Catalog errors propagate unchanged; the
 * only error this layer raises itself is `SetNotFoundError` for an unnamed catalog record.
 */
export class InventoryService {
  constructor(
    private readonly store: InventoryStore,
    private readonly catalog: CatalogService,
  ) {}

  async addSet(setNo: string, assembled = false): Promise<LegoSet> {
    const metadata = await this.catalog.fetchSetMetadata(setNo);
    if (!metadata.name || !metadata.name.trim()) {
      throw new SetNotFoundError(setNo);
    }

    const catalogParts = await this.catalog.fetchSetInventory(setNo);
    const state: PieceState = assembled ? "OWNED_LOCKED" : "OWNED_FREE";

    // Synchronous from here on: no other request can interleave with these writes.
    const stored = this.store.transaction(() => {
      const legoSet = this.store.sets.add({ setNo, name: metadata.name, assembled });
      for (const part of catalogParts) {
        this.store.inventory.upsertPart(
          legoSet.setNo,
          { partNo: part.partNo, colorId: part.colorId, name: part.name },
          part.qty,
          state,
        );
      }
      return legoSet;
    });

    console.info("[inventory] set added", { setNo, parts: catalogParts.length, state });
    recordMetric("inventory.set.added", { setNo, parts: catalogParts.length, assembled });
    return stored;
  }

  getSet(setNo: string): LegoSet {
    const legoSet = this.store.sets.get(setNo);
    if (!legoSet) {
      throw new SetNotFoundError(setNo);
    }
    return legoSet;
  }

  listInventory(state?: PieceState): InventoryRecord[] {
    return this.store.inventory.list(state);
  }

  updateItem(update: ItemUpdate): boolean {
    const updated = this.store.inventory.updateItem(update);
    if (updated) {
      console.info("[inventory] item updated", {
        partNo: update.partNo,
        colorId: update.colorId,
        state: update.state,
      });
    }
    return updated;
  }

  async searchSets(query: string, limit?: number): Promise<SetSearchResult[]> {
    return this.catalog.searchSets(query, limit);
  }

  async catalogHealthy(): Promise<boolean> {
    return this.catalog.healthCheck();
  }
}
