import type { AppConfig } from "./lib/external/env";
import { openDatabase } from "./inventory/db";
import { InventoryService } from "./inventory/service";
import { SqliteInventoryStore } from "./inventory/store";
import { BricklinkCatalogService } from "./marketplaces/bricklink/catalogService";
import { SignedRequestClient } from "./marketplaces/bricklink/signedClient";

export type Container = {
  service: InventoryService;
  catalog: BricklinkCatalogService;
  close: () => void;
};

/** Builds the process-lifetime singletons: signed client, catalog caches and the store. */
export function createContainer(config: AppConfig): Container {
  const client = new SignedRequestClient(
    {
      consumerKey: config.bricklink.consumerKey,
      consumerSecret: config.bricklink.consumerSecret,
      accessToken: config.bricklink.accessToken,
      tokenSecret: config.bricklink.tokenSecret,
    },
    { timeoutMs: config.http.timeoutMs },
  );
  const catalog = new BricklinkCatalogService(client, {
    baseUrl: config.bricklink.baseUrl,
    cacheTtlMs: config.catalog.cacheTtlMs,
    cacheSize: config.catalog.cacheSize,
  });
  const database = openDatabase(config.dbPath);
  const service = new InventoryService(new SqliteInventoryStore(database.db), catalog);

  return {
    service,
    catalog,
    close: () => {
      client.close();
      database.close();
    },
  };
}
