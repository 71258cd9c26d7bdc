import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { z } from "zod";

export const pieceStates = ["MISSING", "OWNED_LOCKED", "OWNED_FREE"] as const;
export const pieceStateSchema = z.enum(pieceStates);
export type PieceState = z.infer<typeof pieceStateSchema>;

// Keep in sync with schema.sql, which creates these tables at open.

export const sets = sqliteTable(
  "sets",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    setNo: text("set_no").notNull(),
    name: text("name").notNull().default(""),
    assembled: integer("assembled", { mode: "boolean" }).notNull().default(false),
  },
  (table) => ({
    setNoIdx: uniqueIndex("sets_set_no_idx").on(table.setNo),
  }),
);

/** Part names seen in any imported set, keyed by part number and color. */
export const parts = sqliteTable(
  "parts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    partNo: text("part_no").notNull(),
    colorId: integer("color_id").notNull(),
    name: text("name").notNull().default(""),
  },
  (table) => ({
    partColorIdx: uniqueIndex("parts_part_color_idx").on(table.partNo, table.colorId),
  }),
);

export const inventory = sqliteTable(
  "inventory",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    setNo: text("set_no").notNull(),
    partNo: text("part_no").notNull(),
    colorId: integer("color_id").notNull(),
    qty: integer("qty").notNull().default(0),
    state: text("state", { enum: pieceStates }).notNull(),
  },
  (table) => ({
    tripleIdx: uniqueIndex("inventory_triple_idx").on(table.setNo, table.partNo, table.colorId),
    partColorIdx: index("inventory_part_color_idx").on(table.partNo, table.colorId),
    stateIdx: index("inventory_state_idx").on(table.state),
  }),
);

export type LegoSet = Omit<typeof sets.$inferSelect, "id">;
export type InventoryRecord = typeof inventory.$inferSelect & { name: string | null };
