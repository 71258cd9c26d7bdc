import { describe, expect, it } from "vitest";

import { TtlCache } from "@/server/lib/cache";

const manualClock = (start = 0) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

describe("TtlCache", () => {
  it("returns stored values until they expire", () => {
    const clock = manualClock();
    const cache = new TtlCache<string, number>({ maxSize: 2, ttlMs: 1_000, now: clock.now });

    cache.set("a", 1);
    clock.advance(999);
    expect(cache.get("a")).toBe(1);

    clock.advance(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("evicts the least recently used entry when full", () => {
    const cache = new TtlCache<string, number>({ maxSize: 2, ttlMs: 60_000 });

    cache.set("a", 1);
    cache.set("b", 2);
    expect(cache.get("a")).toBe(1);
    cache.set("c", 3);

    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(cache.has("c")).toBe(true);
  });

  it("prefers dropping expired entries over live ones", () => {
    const clock = manualClock();
    const cache = new TtlCache<string, number>({ maxSize: 2, ttlMs: 1_000, now: clock.now });

    cache.set("old", 1);
    clock.advance(600);
    cache.set("fresh", 2);
    clock.advance(400);
    cache.set("new", 3);

    expect(cache.get("fresh")).toBe(2);
    expect(cache.get("new")).toBe(3);
    expect(cache.size).toBe(2);
  });

  it("overwrites an existing key and restarts its TTL", () => {
    const clock = manualClock();
    const cache = new TtlCache<string, string>({ maxSize: 1, ttlMs: 1_000, now: clock.now });

    cache.set("k", "first");
    clock.advance(800);
    cache.set("k", "second");
    clock.advance(800);

    expect(cache.get("k")).toBe("second");
  });

  it("clears and deletes entries", () => {
    const cache = new TtlCache<string, number>({ maxSize: 3, ttlMs: 1_000 });
    cache.set("a", 1);
    cache.set("b", 2);

    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it.each([
    [{ maxSize: 0, ttlMs: 1_000 }],
    [{ maxSize: 1.5, ttlMs: 1_000 }],
    [{ maxSize: 1, ttlMs: 0 }],
  ])("rejects invalid options %j", (options) => {
    expect(() => new TtlCache(options)).toThrow(RangeError);
  });
});
