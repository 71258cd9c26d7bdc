import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  CatalogApiError,
  CatalogAuthError,
  CatalogRateLimitError,
  CatalogTimeoutError,
} from "@/server/catalog/errors";
import { createHttpApp } from "@/server/http";
import { InventoryService } from "@/server/inventory/service";
import { FakeCatalogService, part } from "@/test-utils/fake-catalog";
import { createMemoryStore } from "@/test-utils/inventory-store";

describe("HTTP routes", () => {
  let server: Server;
  let baseUrl: string;
  let catalog: FakeCatalogService;
  let closeStore: () => void;

  const request = (path: string, init: { method?: string; body?: unknown; raw?: string } = {}) =>
    fetch(`${baseUrl}${path}`, {
      method: init.method ?? "GET",
      headers: { "Content-Type": "application/json" },
      body: init.raw ?? (init.body === undefined ? undefined : JSON.stringify(init.body)),
    });

  beforeEach(async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    const { store, close } = createMemoryStore();
    closeStore = close;
    catalog = new FakeCatalogService().addSet({ setNo: "8888", name: "Test Set" }, [
      part({ partNo: "3001", colorId: 5, qty: 4, name: "Brick 2 x 4" }),
      part({ partNo: "3023", colorId: 1, qty: 2, name: "Plate 1 x 2" }),
    ]);
    const app = createHttpApp({ service: new InventoryService(store, catalog) });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    closeStore();
    vi.restoreAllMocks();
  });

  it("adds a set, lists its parts and updates one of them", async () => {
    const added = await request("/sets", { method: "POST", body: { set_no: "8888" } });
    expect(added.status).toBe(200);
    await expect(added.json()).resolves.toEqual({
      ok: true,
      set: { set_no: "8888", name: "Test Set", assembled: false },
    });

    const listed = await (await request("/inventory")).json();
    expect(listed).toEqual({
      items: [
        {
          id: expect.any(Number),
          set_no: "8888",
          part_no: "3001",
          color_id: 5,
          qty: 4,
          state: "OWNED_FREE",
          name: "Brick 2 x 4",
        },
        {
          id: expect.any(Number),
          set_no: "8888",
          part_no: "3023",
          color_id: 1,
          qty: 2,
          state: "OWNED_FREE",
          name: "Plate 1 x 2",
        },
      ],
      count: 2,
    });

    const patched = await request("/inventory", {
      method: "PATCH",
      body: { part_no: "3001", color_id: 5, qty: 5, state: "OWNED_LOCKED" },
    });
    await expect(patched.json()).resolves.toEqual({ ok: true });

    const after = await (await request("/inventory")).json();
    expect(
      after.items.map((item: { part_no: string; qty: number; state: string }) => [
        item.part_no,
        item.qty,
        item.state,
      ]),
    ).toEqual([
      ["3001", 5, "OWNED_LOCKED"],
      ["3023", 2, "OWNED_FREE"],
    ]);

    const locked = await (await request("/inventory?state=OWNED_LOCKED")).json();
    expect(locked.count).toBe(1);
  });

  it("reads back a stored set", async () => {
    await request("/sets", { method: "POST", body: { set_no: "8888", assembled: true } });

    const response = await request("/sets/8888");

    await expect(response.json()).resolves.toEqual({
      set: { set_no: "8888", name: "Test Set", assembled: true },
    });
  });

  it("searches the catalog", async () => {
    const response = await request("/sets/search?q=test&limit=5");

    await expect(response.json()).resolves.toEqual({
      items: [{ setNo: "8888", name: "Test Set" }],
      count: 1,
    });
  });

  describe("validation", () => {
    it("rejects a malformed set number with field errors", async () => {
      const response = await request("/sets", { method: "POST", body: { set_no: "!" } });

      expect(response.status).toBe(400);
      const body = await response.json();
      expect(body.error).toMatchObject({
        code: "INVALID_INPUT",
        message: "Request validation failed",
        details: { issues: { set_no: ["set_no must be 2-20 letters, digits or dashes"] } },
      });
      expect(catalog.calls.metadata).toBe(0);
    });

    it("rejects a body that is not JSON", async () => {
      const response = await request("/sets", { method: "POST", raw: "{set_no:" });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toMatchObject({
        error: { code: "INVALID_INPUT", message: "Malformed JSON body" },
      });
    });

    it("rejects an unknown state filter", async () => {
      const response = await request("/inventory?state=LOST");

      expect(response.status).toBe(400);
    });

    it("requires a search query", async () => {
      const response = await request("/sets/search?q=%20%20");

      expect(response.status).toBe(400);
    });

    it("rejects a zero quantity update", async () => {
      const response = await request("/inventory", {
        method: "PATCH",
        body: { part_no: "3001", color_id: 5, qty: 0, state: "MISSING" },
      });

      expect(response.status).toBe(400);
    });
  });

  describe("error mapping", () => {
    it("returns 404 for a set the catalog does not know", async () => {
      const response = await request("/sets", { method: "POST", body: { set_no: "0000" } });

      expect(response.status).toBe(404);
      await expect(response.json()).resolves.toMatchObject({ error: { code: "NOT_FOUND" } });
    });

    it("returns 404 for a set that was never stored", async () => {
      const response = await request("/sets/1234");

      expect(response.status).toBe(404);
      await expect(response.json()).resolves.toMatchObject({
        error: { code: "SET_NOT_FOUND", message: "Set '1234' not found" },
      });
    });

    it("returns 404 when no inventory item matches an update", async () => {
      const response = await request("/inventory", {
        method: "PATCH",
        body: { part_no: "3001", color_id: 5, qty: 1, state: "MISSING" },
      });

      expect(response.status).toBe(404);
      await expect(response.json()).resolves.toMatchObject({
        error: {
          code: "ITEM_NOT_FOUND",
          message: "No inventory item for part '3001' in color 5",
        },
      });
    });

    it.each([
      [new CatalogAuthError("BrickLink authentication failed: 401"), 401, "AUTHENTICATION_ERROR"],
      [new CatalogTimeoutError("BrickLink request timed out: slow"), 504, "TIMEOUT"],
      [new CatalogApiError("BrickLink API error (status 500): boom"), 502, "API_ERROR"],
    ])("maps %s to HTTP %i", async (error, status, code) => {
      catalog.failNextWith(error);

      const response = await request("/sets", { method: "POST", body: { set_no: "8888" } });

      expect(response.status).toBe(status);
      await expect(response.json()).resolves.toMatchObject({
        error: { code, message: error.message },
      });
    });

    it("passes the rate-limit delay on as Retry-After seconds", async () => {
      catalog.failNextWith(new CatalogRateLimitError("BrickLink rate limit exceeded: 429", 1_500));

      const response = await request("/sets", { method: "POST", body: { set_no: "8888" } });

      expect(response.status).toBe(429);
      expect(response.headers.get("Retry-After")).toBe("2");
    });

    it("hides unexpected failures behind a generic 500", async () => {
      catalog.failNextWith(new Error("socket hang up"));

      const response = await request("/sets", { method: "POST", body: { set_no: "8888" } });

      expect(response.status).toBe(500);
      await expect(response.json()).resolves.toMatchObject({
        error: { code: "INTERNAL_ERROR", message: "Internal error" },
      });
    });
  });

  describe("health", () => {
    it("reports liveness", async () => {
      await expect((await request("/health")).json()).resolves.toEqual({ status: "ok" });
    });

    it("returns 503 when the catalog is unreachable", async () => {
      catalog.healthy = false;

      const response = await request("/health/catalog");

      expect(response.status).toBe(503);
      await expect(response.json()).resolves.toEqual({ provider: "bricklink", ok: false });
    });
  });
});
