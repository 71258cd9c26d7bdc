import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import * as schema from "./schema";

export type InventoryDatabase = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
  db: InventoryDatabase;
  close: () => void;
};

const DDL_URL = new URL("./schema.sql", import.meta.url);

export function openDatabase(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(readFileSync(DDL_URL, "utf8"));

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
