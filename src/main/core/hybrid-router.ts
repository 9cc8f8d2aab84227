import type { InputSource, Intent, RoutedIntent } from "../../shared/contracts";
import type { BoundedPool } from "./bounded-pool";
import { IntentParser, unknownIntent, type ParseContext } from "./intent-parser";
import type { FallbackBrain } from "./llm-adapter";
import { Logger } from "./logger";
import { hasRequiredEntities } from "./required-entities";
import { cacheKeyFor, type ResultCache } from "./result-cache";

export interface HybridRouterOptions {
  brain: FallbackBrain;
  cache: ResultCache;
  pool: BoundedPool;
  parser?: IntentParser;
  enabled?: boolean;
  confidenceThreshold?: number;
  budgets?: Partial<Record<InputSource, number>>;
  logger?: Logger;
}

type FallbackOutcome =
  | { ok: true; intent: Intent }
  | { ok: false; reason: "timeout" | "error"; error?: unknown };

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Rules first; the fallback brain is asked only when the rules are unsure or incomplete.
 * The fallback runs under a per-source budget and fails closed: a timeout or error never
 * produces an action, and a reply that arrives after the budget is dropped uncached.
 */
export class HybridRouter {
  private readonly parser: IntentParser;
  private readonly brain: FallbackBrain;
  private readonly cache: ResultCache;
  private readonly pool: BoundedPool;
  private readonly logger: Logger;
  private readonly budgets: Record<InputSource, number>;
  private readonly enabled: boolean;
  private readonly confidenceThreshold: number;

  constructor(options: HybridRouterOptions) {
    this.parser = options.parser ?? new IntentParser();
    this.brain = options.brain;
    this.cache = options.cache;
    this.pool = options.pool;
    this.logger = options.logger ?? new Logger("router");
    this.enabled = options.enabled ?? true;
    this.confidenceThreshold = options.confidenceThreshold ?? 0.78;
    this.budgets = {
      text: options.budgets?.text ?? 450,
      voice: options.budgets?.voice ?? 700
    };
  }

  async parse(text: string, context: ParseContext = {}, source: InputSource = "text"): Promise<RoutedIntent> {
    const ruleIntent = this.parser.parse(text, context);
    if (!this.enabled || !this.shouldFallback(ruleIntent)) {
      return { intent: ruleIntent, mode: "rules" };
    }

    const key = cacheKeyFor(text, context.lastIntent);
    const cached = this.cache.get(key);
    if (cached) {
      if (this.isBetterFallback(ruleIntent, cached)) {
        return { intent: { ...cached, rawText: text }, mode: "cache" };
      }
      return { intent: ruleIntent, mode: "rules" };
    }

    const outcome = await this.callWithBudget(text, context, this.budgets[source]);
    if (outcome.ok) {
      this.cache.set(key, outcome.intent);
      if (this.isBetterFallback(ruleIntent, outcome.intent)) {
        return { intent: outcome.intent, mode: "llm_fallback" };
      }
      return { intent: ruleIntent, mode: "rules" };
    }

    this.logger.warn(`Fallback ${outcome.reason}; keeping rule result`, {
      ruleIntent: ruleIntent.name,
      error: outcome.error === undefined ? undefined : describeError(outcome.error)
    });

    if (ruleIntent.name === "unknown") {
      return { intent: unknownIntent(text), mode: "fallback_failed" };
    }
    return { intent: ruleIntent, mode: "rules" };
  }

  shouldFallback(intent: Intent): boolean {
    if (intent.name === "unknown") {
      return true;
    }
    if (intent.confidence < this.confidenceThreshold) {
      return true;
    }
    return !hasRequiredEntities(intent);
  }

  private isBetterFallback(ruleIntent: Intent, fallback: Intent): boolean {
    if (fallback.name === "unknown" || !hasRequiredEntities(fallback)) {
      return false;
    }
    return fallback.confidence >= Math.max(ruleIntent.confidence, this.confidenceThreshold);
  }

  private async callWithBudget(text: string, context: ParseContext, budgetMs: number): Promise<FallbackOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timedOut = new Promise<FallbackOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, reason: "timeout" });
      }, budgetMs);
    });

    const call = this.pool
      .run((signal) => this.brain.parse(text, { lastIntent: context.lastIntent, lastApp: context.lastApp }, signal), controller.signal)
      .then(
        (intent): FallbackOutcome => ({ ok: true, intent: { ...intent, rawText: text } }),
        (error: unknown): FallbackOutcome => ({ ok: false, reason: "error", error })
      );

    try {
      const outcome = await Promise.race([call, timedOut]);
      if (outcome.ok && controller.signal.aborted) {
        return { ok: false, reason: "timeout" };
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }
}
