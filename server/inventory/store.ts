import { and, asc, eq, sql } from "drizzle-orm";

import type { InventoryDatabase } from "./db";
import { inventory, parts, sets, type InventoryRecord, type LegoSet, type PieceState } from "./schema";

export type PartInput = {
  partNo: string;
  colorId: number;
  name: string;
};

export type ItemUpdate = {
  partNo: string;
  colorId: number;
  qty: number;
  state: PieceState;
  setNo?: string;
};

export interface SetsRepository {
  /** Inserts the set unless its number is already recorded; returns the stored row. */
  add(set: LegoSet): LegoSet;
  get(setNo: string): LegoSet | undefined;
}

export interface InventoryRepository {
  /** Inserts the triple, or adds `qty` to the existing row and overwrites its state. */
  upsertPart(setNo: string, part: PartInput, qty: number, state: PieceState): void;
  list(state?: PieceState): InventoryRecord[];
  /** Sets qty/state on one matching row. False, with nothing written, when none match. */
  updateItem(update: ItemUpdate): boolean;
}

export interface InventoryStore {
  sets: SetsRepository;
  inventory: InventoryRepository;
  /** Runs `fn` in one transaction; a throw rolls back every write made inside it. */
  transaction<T>(fn: () => T): T;
}

class SqliteSetsRepository implements SetsRepository {
  constructor(private readonly db: InventoryDatabase) {}

  add(set: LegoSet): LegoSet {
    this.db
      .insert(sets)
      .values(set)
      .onConflictDoNothing({ target: sets.setNo })
      .run();

    const stored = this.get(set.setNo);
    if (!stored) {
      throw new Error(`Set '${set.setNo}' was not persisted`);
    }
    return stored;
  }

  get(setNo: string): LegoSet | undefined {
    return this.db
      .select({ setNo: sets.setNo, name: sets.name, assembled: sets.assembled })
      .from(sets)
      .where(eq(sets.setNo, setNo))
      .get();
  }
}

class SqliteInventoryRepository implements InventoryRepository {
  constructor(private readonly db: InventoryDatabase) {}

  upsertPart(setNo: string, part: PartInput, qty: number, state: PieceState): void {
    if (part.name) {
      this.db
        .insert(parts)
        .values({ partNo: part.partNo, colorId: part.colorId, name: part.name })
        .onConflictDoUpdate({
          target: [parts.partNo, parts.colorId],
          set: { name: sql`excluded.name` },
        })
        .run();
    }

    this.db
      .insert(inventory)
      .values({ setNo, partNo: part.partNo, colorId: part.colorId, qty, state })
      .onConflictDoUpdate({
        target: [inventory.setNo, inventory.partNo, inventory.colorId],
        set: {
          qty: sql`${inventory.qty} + excluded.qty`,
          state: sql`excluded.state`,
        },
      })
      .run();
  }

  list(state?: PieceState): InventoryRecord[] {
    return this.db
      .select({
        id: inventory.id,
        setNo: inventory.setNo,
        partNo: inventory.partNo,
        colorId: inventory.colorId,
        qty: inventory.qty,
        state: inventory.state,
        name: parts.name,
      })
      .from(inventory)
      .leftJoin(
        parts,
        and(eq(parts.partNo, inventory.partNo), eq(parts.colorId, inventory.colorId)),
      )
      .where(state ? eq(inventory.state, state) : undefined)
      .orderBy(asc(inventory.id))
      .all();
  }

  updateItem(update: ItemUpdate): boolean {
    const match = and(
      eq(inventory.partNo, update.partNo),
      eq(inventory.colorId, update.colorId),
      update.setNo === undefined ? undefined : eq(inventory.setNo, update.setNo),
    );

    const row = this.db
      .select({ id: inventory.id })
      .from(inventory)
      .where(match)
      .orderBy(asc(inventory.id))
      .limit(1)
      .get();
    if (!row) {
      return false;
    }

    this.db
      .update(inventory)
      .set({ qty: update.qty, state: update.state })
      .where(eq(inventory.id, row.id))
      .run();
    return true;
  }
}

export class SqliteInventoryStore implements InventoryStore {
  readonly sets: SetsRepository;
  readonly inventory: InventoryRepository;

  constructor(private readonly db: InventoryDatabase) {
    this.sets = new SqliteSetsRepository(db);
    this.inventory = new SqliteInventoryRepository(db);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(() => fn());
  }
}
