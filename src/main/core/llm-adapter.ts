import { z } from "zod";
import { INTENT_NAMES, type Intent, type IntentEntities, type IntentName, type LlmRuntimeOptions } from "../../shared/contracts";
import { llmIntentReplySchema } from "../../shared/schemas";
import { unknownIntent } from "./intent-parser";
import { isLoopbackHost } from "./offline-policy";

export interface FallbackContext {
  lastIntent?: IntentName | null;
  lastApp?: string | null;
}

/**
 * Second-opinion intent parser. Implementations may reject; callers own timeouts and
 * pass a signal so an abandoned call can stop.
 */
export interface FallbackBrain {
  parse(text: string, context: FallbackContext, signal?: AbortSignal): Promise<Intent>;
}

export class FallbackReplyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FallbackReplyError";
  }
}

const generateReplySchema = z.object({
  response: z.string()
});

const INTENT_GUIDE: Partial<Record<IntentName, string>> = {
  open_app: '{"app"} e.g. "fire up the browser", "I need Chrome"',
  focus_app: '{"app"} e.g. "switch to Safari", "go back to Notes"',
  close_app: '{"app"} e.g. "quit Notes"',
  open_website: '{"url"} e.g. "take me to github"',
  search_web: '{"query"} e.g. "how do I cook pasta"',
  search_youtube: '{"query"} e.g. "put on some jazz videos"',
  open_file: '{"path"}',
  search_file: '{"query"} e.g. "where did I save the budget spreadsheet"',
  type_text: '{"content"}',
  press_key: '{"key"}',
  click: '{"target"}',
  scroll: '{"direction", "amount"}',
  send_text: '{"target", "content", "app"}',
  send_email: '{"target", "content"}',
  reply_email: '{"content"}',
  login: '{"service"}',
  create_reminder: '{"name", "list"?}',
  create_note: '{"title", "folder"?}',
  get_events: '{"range"}',
  confirm: "{}",
  cancel: "{}",
  exit: "{}"
};

export const buildSystemPrompt = (): string => {
  const lines = Object.entries(INTENT_GUIDE).map(([name, guide]) => `- "${name}": entities ${guide}`);
  return [
    "You turn requests for a desktop assistant into JSON.",
    'Reply with only a JSON object: {"intent": string, "entities": object, "confidence": number between 0 and 1}.',
    "Known intents:",
    ...lines,
    '- "unknown": use when the request fits none of the above.',
    "Extract the actual app, person or text the user means, not the literal filler words.",
    "Use a confidence of 0.9 or more only when you are sure."
  ].join("\n");
};

const clampTimeoutMs = (value: unknown, fallback: number): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(500, Math.min(30_000, Math.round(parsed)));
};

const clampConfidence = (value: number): number => Math.max(0, Math.min(1, value));

const isIntentName = (value: string): value is IntentName => INTENT_NAMES.some((name) => name === value);

const stripCodeFence = (value: string): string => {
  const trimmed = value.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced ? fenced[1] : trimmed;
};

/** Turns the model's JSON text into an Intent, or throws FallbackReplyError. */
export const intentFromReply = (raw: string, rawText: string): Intent => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFence(raw));
  } catch {
    throw new FallbackReplyError("Fallback model reply was not valid JSON.");
  }

  const reply = llmIntentReplySchema.safeParse(decoded);
  if (!reply.success) {
    throw new FallbackReplyError(`Fallback model reply has the wrong shape: ${reply.error.issues[0]?.message ?? "invalid"}`);
  }

  const name = reply.data.intent.toLowerCase();
  if (!isIntentName(name) || name === "unknown") {
    return unknownIntent(rawText);
  }

  const entities: IntentEntities = {};
  for (const [key, value] of Object.entries(reply.data.entities)) {
    if (value === null) {
      continue;
    }
    if (typeof value === "string") {
      const trimmed = value.trim();
      if (trimmed) {
        entities[key] = trimmed;
      }
      continue;
    }
    entities[key] = value;
  }

  return {
    name,
    entities,
    confidence: clampConfidence(reply.data.confidence),
    rawText
  };
};

/**
 * Fallback brain backed by an Ollama-style generate endpoint. With strictOffline set,
 * endpoints off this machine are refused and parse() answers unknown without a request.
 */
export class LlmFallbackBrain implements FallbackBrain {
  private readonly endpoint: URL | null;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly enabled: boolean;
  private readonly systemPrompt = buildSystemPrompt();

  constructor(
    options: LlmRuntimeOptions,
    private readonly strictOffline = false
  ) {
    this.model = options.model.trim();
    this.timeoutMs = clampTimeoutMs(options.timeoutMs, 4500);
    this.enabled = options.enabled;
    this.endpoint = this.toEndpoint(options.endpoint.trim());
  }

  async parse(text: string, context: FallbackContext, signal?: AbortSignal): Promise<Intent> {
    if (!this.enabled || !this.endpoint || !text.trim()) {
      return unknownIntent(text);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const contextLine = context.lastIntent ? `Previous intent: ${context.lastIntent}\n` : "";

    try {
      const response = await fetch(this.endpoint.toString(), {
        method: "POST",
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          model: this.model,
          system: this.systemPrompt,
          prompt: `${contextLine}User said: ${JSON.stringify(text)}`,
          format: "json",
          stream: false,
          options: { temperature: 0.1 }
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        throw new FallbackReplyError(`Fallback model responded with HTTP ${response.status}.`);
      }

      const payload = generateReplySchema.safeParse(await response.json());
      if (!payload.success) {
        throw new FallbackReplyError("Fallback model response is missing its text.");
      }

      return intentFromReply(payload.data.response, text);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private toEndpoint(rawEndpoint: string): URL | null {
    try {
      const parsed = new URL(rawEndpoint);
      if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
        return null;
      }
      if (this.strictOffline && !isLoopbackHost(parsed.hostname)) {
        return null;
      }
      return parsed;
    } catch {
      return null;
    }
  }
}
