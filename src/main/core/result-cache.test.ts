import { describe, expect, it } from "vitest";
import type { Intent } from "../../shared/contracts";
import { cacheKeyFor, ResultCache } from "./result-cache";

const makeIntent = (app: string): Intent => ({
  name: "open_app",
  entities: { app },
  confidence: 0.9,
  rawText: `open ${app}`
});

describe("ResultCache", () => {
  it("keys on normalized text and the previous intent", () => {
    expect(cacheKeyFor("  Fire UP   the Browser ", "open_app")).toBe("fire up the browser|open_app");
    expect(cacheKeyFor("fire up the browser", null)).toBe("fire up the browser|");
  });

  it("returns copies that callers cannot mutate", () => {
    const cache = new ResultCache({ maxEntries: 4, ttlMinutes: 5 });
    cache.set("k", makeIntent("safari"));

    const first = cache.get("k");
    expect(first?.entities.app).toBe("safari");
    if (first) {
      first.entities.app = "changed";
    }

    expect(cache.get("k")?.entities.app).toBe("safari");
  });

  it("evicts the least recently used entry when full", () => {
    const cache = new ResultCache({ maxEntries: 2, ttlMinutes: 5 });
    cache.set("a", makeIntent("a"));
    cache.set("b", makeIntent("b"));
    cache.get("a");
    cache.set("c", makeIntent("c"));

    expect(cache.size).toBe(2);
    expect(cache.get("b")).toBeNull();
    expect(cache.get("a")?.entities.app).toBe("a");
    expect(cache.get("c")?.entities.app).toBe("c");
  });

  it("drops entries once their time-to-live has passed", () => {
    let now = 1_000;
    const cache = new ResultCache({ maxEntries: 2, ttlMinutes: 1, now: () => now });
    cache.set("k", makeIntent("notes"));

    now += 59_000;
    expect(cache.get("k")).not.toBeNull();

    now += 1_000;
    expect(cache.get("k")).toBeNull();
    expect(cache.size).toBe(0);
  });
});
