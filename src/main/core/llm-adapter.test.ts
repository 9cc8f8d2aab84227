import { afterEach, describe, expect, it, vi } from "vitest";
import { FallbackReplyError, intentFromReply, LlmFallbackBrain } from "./llm-adapter";

const options = {
  enabled: true,
  endpoint: "http://127.0.0.1:11434/api/generate",
  model: "llama3.1:8b",
  timeoutMs: 4500
};

const replyWith = (body: unknown, ok = true, status = 200) =>
  vi.fn(async (_url: string, _init?: { body?: unknown }) => ({
    ok,
    status,
    json: async () => body
  }));

describe("intentFromReply", () => {
  it("clamps confidence and drops empty entities", () => {
    const intent = intentFromReply(
      '```json\n{"intent": "open_app", "entities": {"app": " Safari ", "extra": "", "gone": null}, "confidence": 1.4}\n```',
      "fire up the browser"
    );

    expect(intent).toEqual({
      name: "open_app",
      entities: { app: "Safari" },
      confidence: 1,
      rawText: "fire up the browser"
    });
  });

  it("maps unfamiliar intent names to unknown", () => {
    const intent = intentFromReply('{"intent": "order_pizza", "entities": {}, "confidence": 0.9}', "get me pizza");
    expect(intent.name).toBe("unknown");
    expect(intent.confidence).toBe(0);
  });

  it("rejects replies that are not JSON objects of the expected shape", () => {
    expect(() => intentFromReply("sure thing!", "x")).toThrow(FallbackReplyError);
    expect(() => intentFromReply('{"entities": {}}', "x")).toThrow(FallbackReplyError);
  });
});

describe("LlmFallbackBrain", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("posts to the generate endpoint and returns the parsed intent", async () => {
    const fetchMock = replyWith({
      response: JSON.stringify({ intent: "focus_app", entities: { app: "Notes" }, confidence: 0.91 })
    });
    vi.stubGlobal("fetch", fetchMock);

    const brain = new LlmFallbackBrain(options);
    const intent = await brain.parse("bring notes back", { lastIntent: "open_app" });

    expect(intent.name).toBe("focus_app");
    expect(intent.entities).toEqual({ app: "Notes" });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://127.0.0.1:11434/api/generate");
    const body = JSON.parse(String(init?.body)) as { model: string; format: string; prompt: string };
    expect(body.model).toBe("llama3.1:8b");
    expect(body.format).toBe("json");
    expect(body.prompt).toBe('Previous intent: open_app\nUser said: "bring notes back"');
  });

  it("rejects on HTTP failures", async () => {
    vi.stubGlobal("fetch", replyWith({}, false, 503));

    const brain = new LlmFallbackBrain(options);
    await expect(brain.parse("something", {})).rejects.toThrow("HTTP 503");
  });

  it("refuses remote endpoints in strict offline mode", async () => {
    const fetchMock = replyWith({ response: "{}" });
    vi.stubGlobal("fetch", fetchMock);

    const brain = new LlmFallbackBrain({ ...options, endpoint: "https://llm.example.com/api/generate" }, true);
    const intent = await brain.parse("hello", {});

    expect(intent.name).toBe("unknown");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("does not call the model when disabled", async () => {
    const fetchMock = replyWith({ response: "{}" });
    vi.stubGlobal("fetch", fetchMock);

    const brain = new LlmFallbackBrain({ ...options, enabled: false });
    expect((await brain.parse("hello", {})).name).toBe("unknown");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
