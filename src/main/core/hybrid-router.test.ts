import { describe, expect, it, vi } from "vitest";
import type { Intent } from "../../shared/contracts";
import { BoundedPool } from "./bounded-pool";
import { HybridRouter, type HybridRouterOptions } from "./hybrid-router";
import type { FallbackBrain, FallbackContext } from "./llm-adapter";
import { Logger } from "./logger";
import { ResultCache } from "./result-cache";

const flush = (): Promise<void> => new Promise((done) => setImmediate(done));

const brainIntent = (intent: Omit<Intent, "rawText">) =>
  vi.fn(async (text: string, _context: FallbackContext, _signal?: AbortSignal): Promise<Intent> => ({
    ...intent,
    rawText: text
  }));

const makeRouter = (
  parse: FallbackBrain["parse"],
  overrides: Partial<HybridRouterOptions> = {}
): { router: HybridRouter; cache: ResultCache } => {
  const cache = new ResultCache({ maxEntries: 16, ttlMinutes: 10 });
  const router = new HybridRouter({
    brain: { parse },
    cache,
    pool: new BoundedPool(2),
    budgets: { text: 40, voice: 80 },
    logger: new Logger("router-test", "silent"),
    ...overrides
  });
  return { router, cache };
};

describe("HybridRouter", () => {
  it("never asks the fallback when the rule result is confident and complete", async () => {
    const parse = brainIntent({ name: "unknown", entities: {}, confidence: 0 });
    const { router } = makeRouter(parse);

    const routed = await router.parse("open notes");

    expect(routed.mode).toBe("rules");
    expect(routed.intent.entities).toEqual({ app: "notes" });
    expect(parse).not.toHaveBeenCalled();
  });

  it("uses the fallback when the rules find nothing", async () => {
    const parse = brainIntent({ name: "open_app", entities: { app: "Safari" }, confidence: 0.92 });
    const { router } = makeRouter(parse);

    const routed = await router.parse("get me the browser", { lastIntent: "type_text" });

    expect(routed.mode).toBe("llm_fallback");
    expect(routed.intent).toEqual({
      name: "open_app",
      entities: { app: "Safari" },
      confidence: 0.92,
      rawText: "get me the browser"
    });
    expect(parse.mock.calls[0][1]).toEqual({ lastIntent: "type_text", lastApp: undefined });
  });

  it("serves a repeated query from the cache with one remote call", async () => {
    const parse = brainIntent({ name: "open_app", entities: { app: "Safari" }, confidence: 0.92 });
    const { router } = makeRouter(parse);

    const first = await router.parse("get me the browser");
    const second = await router.parse("Get me   the browser");

    expect(second.mode).toBe("cache");
    expect(second.intent.name).toBe(first.intent.name);
    expect(second.intent.entities).toEqual(first.intent.entities);
    expect(parse).toHaveBeenCalledTimes(1);
  });

  it("does not share cache entries across different previous intents", async () => {
    const parse = brainIntent({ name: "open_app", entities: { app: "Safari" }, confidence: 0.92 });
    const { router } = makeRouter(parse);

    await router.parse("get me the browser", { lastIntent: "open_app" });
    await router.parse("get me the browser", { lastIntent: "close_app" });

    expect(parse).toHaveBeenCalledTimes(2);
  });

  it("fails closed on timeout and drops the late reply", async () => {
    let release: () => void = () => undefined;
    let seenSignal: AbortSignal | undefined;
    const parse = vi.fn(async (text: string, _context: FallbackContext, signal?: AbortSignal): Promise<Intent> => {
      seenSignal = signal;
      await new Promise<void>((done) => {
        release = done;
      });
      return { name: "open_app", entities: { app: "Safari" }, confidence: 0.95, rawText: text };
    });
    const { router, cache } = makeRouter(parse);

    const routed = await router.parse("get me the browser");

    expect(routed.mode).toBe("fallback_failed");
    expect(routed.intent.name).toBe("unknown");
    expect(routed.intent.confidence).toBe(0);
    expect(seenSignal?.aborted).toBe(true);

    release();
    await flush();
    expect(cache.size).toBe(0);
  });

  it("fails closed when the fallback throws", async () => {
    const parse = vi.fn(async (): Promise<Intent> => {
      throw new Error("model offline");
    });
    const { router } = makeRouter(parse);

    const routed = await router.parse("do the thing with the stuff");

    expect(routed.mode).toBe("fallback_failed");
    expect(routed.intent.name).toBe("unknown");
    expect(routed.intent.confidence).toBe(0);
  });

  it("keeps an incomplete rule result when the fallback fails", async () => {
    const parse = vi.fn(async (): Promise<Intent> => {
      throw new Error("model offline");
    });
    const { router } = makeRouter(parse);

    const routed = await router.parse("text john");

    expect(parse).toHaveBeenCalledTimes(1);
    expect(routed.mode).toBe("rules");
    expect(routed.intent.name).toBe("send_text");
    expect(routed.intent.clarification?.type).toBe("send_text_content");
  });

  it("keeps the rule result when the fallback is not more confident", async () => {
    const parse = brainIntent({ name: "type_text", entities: { content: "HELLO" }, confidence: 0.82 });
    const { router } = makeRouter(parse, { confidenceThreshold: 0.85 });

    const routed = await router.parse("type hello");

    expect(parse).toHaveBeenCalledTimes(1);
    expect(routed.mode).toBe("rules");
    expect(routed.intent.entities).toEqual({ content: "hello" });
  });

  it("ignores a fallback guess below the threshold for unrecognized text", async () => {
    const parse = brainIntent({ name: "close_app", entities: { app: "Finder" }, confidence: 0.5 });
    const { router, cache } = makeRouter(parse);

    const routed = await router.parse("get rid of the thing");

    expect(parse).toHaveBeenCalledTimes(1);
    expect(routed).toEqual({
      intent: { name: "unknown", entities: { text: "get rid of the thing" }, confidence: 0, rawText: "get rid of the thing" },
      mode: "rules"
    });
    expect(cache.size).toBe(1);
  });

  it("rejects fallback answers that miss required entities", async () => {
    const parse = brainIntent({ name: "open_app", entities: {}, confidence: 0.95 });
    const { router } = makeRouter(parse);

    const routed = await router.parse("get me something");

    expect(parse).toHaveBeenCalledTimes(1);
    expect(routed.mode).toBe("rules");
    expect(routed.intent.name).toBe("unknown");
  });

  it("returns rule results only when hybrid routing is disabled", async () => {
    const parse = brainIntent({ name: "open_app", entities: { app: "Safari" }, confidence: 0.92 });
    const { router } = makeRouter(parse, { enabled: false });

    const routed = await router.parse("get me the browser");

    expect(routed).toEqual({
      intent: { name: "unknown", entities: { text: "get me the browser" }, confidence: 0, rawText: "get me the browser" },
      mode: "rules"
    });
    expect(parse).not.toHaveBeenCalled();
  });
});
