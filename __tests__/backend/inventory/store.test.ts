import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { SqliteInventoryStore } from "@/server/inventory/store";
import { createMemoryStore } from "@/test-utils/inventory-store";

const brick = { partNo: "3001", colorId: 5, name: "Brick 2 x 4" };
const plate = { partNo: "3023", colorId: 1, name: "Plate 1 x 2" };

describe("SqliteInventoryStore", () => {
  let store: SqliteInventoryStore;
  let close: () => void;

  beforeEach(() => {
    ({ store, close } = createMemoryStore());
  });

  afterEach(() => {
    close();
  });

  describe("sets", () => {
    it("stores and reads back a set", () => {
      const stored = store.sets.add({ setNo: "10270-1", name: "Bookshop", assembled: true });

      expect(stored).toEqual({ setNo: "10270-1", name: "Bookshop", assembled: true });
      expect(store.sets.get("10270-1")).toEqual(stored);
      expect(store.sets.get("nope")).toBeUndefined();
    });

    it("keeps the first row when a set number is added again", () => {
      store.sets.add({ setNo: "10270-1", name: "Bookshop", assembled: false });

      const again = store.sets.add({ setNo: "10270-1", name: "Renamed", assembled: true });

      expect(again).toEqual({ setNo: "10270-1", name: "Bookshop", assembled: false });
    });
  });

  describe("inventory", () => {
    it("inserts new triples and increments existing ones", () => {
      store.inventory.upsertPart("8888", brick, 4, "OWNED_FREE");
      store.inventory.upsertPart("8888", brick, 3, "OWNED_LOCKED");
      store.inventory.upsertPart("9999", brick, 1, "OWNED_FREE");

      expect(store.inventory.list()).toEqual([
        {
          id: expect.any(Number),
          setNo: "8888",
          partNo: "3001",
          colorId: 5,
          qty: 7,
          state: "OWNED_LOCKED",
          name: "Brick 2 x 4",
        },
        {
          id: expect.any(Number),
          setNo: "9999",
          partNo: "3001",
          colorId: 5,
          qty: 1,
          state: "OWNED_FREE",
          name: "Brick 2 x 4",
        },
      ]);
    });

    it("filters by state", () => {
      store.inventory.upsertPart("8888", brick, 4, "OWNED_FREE");
      store.inventory.upsertPart("8888", plate, 2, "MISSING");

      expect(store.inventory.list("MISSING").map((record) => record.partNo)).toEqual(["3023"]);
      expect(store.inventory.list("OWNED_LOCKED")).toEqual([]);
    });

    it("reports a null name for parts imported without one", () => {
      store.inventory.upsertPart("8888", { partNo: "x1", colorId: 0, name: "" }, 1, "OWNED_FREE");

      expect(store.inventory.list()[0]?.name).toBeNull();
    });

    it("updates the lowest-id match when no set is given", () => {
      store.inventory.upsertPart("8888", brick, 4, "OWNED_FREE");
      store.inventory.upsertPart("9999", brick, 1, "OWNED_FREE");

      expect(
        store.inventory.updateItem({ partNo: "3001", colorId: 5, qty: 9, state: "MISSING" }),
      ).toBe(true);

      expect(store.inventory.list().map((record) => [record.setNo, record.qty, record.state])).toEqual([
        ["8888", 9, "MISSING"],
        ["9999", 1, "OWNED_FREE"],
      ]);
    });

    it("restricts the update to one set when asked", () => {
      store.inventory.upsertPart("8888", brick, 4, "OWNED_FREE");
      store.inventory.upsertPart("9999", brick, 1, "OWNED_FREE");

      store.inventory.updateItem({
        partNo: "3001",
        colorId: 5,
        qty: 2,
        state: "OWNED_LOCKED",
        setNo: "9999",
      });

      expect(store.inventory.list().map((record) => [record.setNo, record.qty, record.state])).toEqual([
        ["8888", 4, "OWNED_FREE"],
        ["9999", 2, "OWNED_LOCKED"],
      ]);
    });

    it("returns false and writes nothing when no row matches", () => {
      store.inventory.upsertPart("8888", brick, 4, "OWNED_FREE");
      const before = store.inventory.list();

      expect(
        store.inventory.updateItem({ partNo: "3001", colorId: 6, qty: 1, state: "MISSING" }),
      ).toBe(false);
      expect(store.inventory.list()).toEqual(before);
    });
  });

  it("rolls back every write when the transaction throws", () => {
    expect(() =>
      store.transaction(() => {
        store.sets.add({ setNo: "8888", name: "Test Set", assembled: false });
        store.inventory.upsertPart("8888", brick, 4, "OWNED_FREE");
        throw new Error("disk full");
      }),
    ).toThrow("disk full");

    expect(store.sets.get("8888")).toBeUndefined();
    expect(store.inventory.list()).toEqual([]);
  });
});
