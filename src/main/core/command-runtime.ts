import type {
  ActionStep,
  ClarificationRequest,
  ClarificationTicket,
  ClarificationType,
  ExecutionResult,
  InputSource,
  Intent,
  PipelineState,
  Plan,
  PreferencesUpdate,
  ResponseStatus,
  RuntimeMetrics,
  RuntimeResponse,
  RuntimeStateSnapshot
} from "../../shared/contracts";
import { UNKNOWN_INPUT_SUGGESTIONS } from "../../shared/defaults";
import { createTraceId } from "../../shared/id";
import { ActionPlanner } from "./action-planner";
import { BoundedPool } from "./bounded-pool";
import { ExecutionEngine } from "./execution-engine";
import {
  DesktopExecutor,
  DryRunExecutor,
  type CredentialFiller,
  type ExecutorBackend,
  type InputDriver,
  type Sleep
} from "./executor-backend";
import { describeFileMatches, FileLocator } from "./file-locator";
import { HybridRouter } from "./hybrid-router";
import { cleanRecipient, IntentParser } from "./intent-parser";
import { KillSwitch } from "./kill-switch";
import { LlmFallbackBrain, type FallbackBrain } from "./llm-adapter";
import { Logger } from "./logger";
import type { HostPlatform } from "./platform-keys";
import { PluginToolRegistry } from "./plugin-tools";
import { clarificationPromptFor, missingEntities } from "./required-entities";
import { ResultCache } from "./result-cache";
import { loadRuntimeConfig, type RuntimeConfig } from "./runtime-config";
import { SafetyGuard } from "./safety-guard";
import { SessionContext } from "./session-context";

export interface CommandRuntimeOptions {
  config?: RuntimeConfig;
  brain?: FallbackBrain;
  backend?: ExecutorBackend;
  tools?: PluginToolRegistry;
  killSwitch?: KillSwitch;
  fileLocator?: FileLocator;
  input?: InputDriver;
  credentials?: CredentialFiller;
  platform?: HostPlatform;
  sleep?: Sleep;
  logger?: Logger;
}

interface Outcome {
  status: ResponseStatus;
  message: string;
  intent?: Intent | null;
  steps?: Plan;
  suggestions?: readonly string[];
}

const clone = <T>(value: T): T => JSON.parse(JSON.stringify(value)) as T;

const normalizeSpaces = (value: string): string => value.trim().replace(/\s+/g, " ");

const round = (value: number): number => Math.round(value * 1000) / 1000;

const CLARIFIED_CONFIDENCE = 0.9;

const emptyMetrics = (): RuntimeMetrics => ({ parseMs: 0, planMs: 0, executeMs: 0, totalMs: 0, nluMode: null });

/**
 * Pipeline state machine. One request at a time: idle, processing, executing, responding.
 * Everything that can go wrong while handling input comes back as a response, never a throw.
 */
export class CommandRuntime {
  private readonly logger: Logger;
  private readonly config: RuntimeConfig;
  private readonly parser = new IntentParser();
  private readonly router: HybridRouter;
  private readonly planner: ActionPlanner;
  private readonly guard = new SafetyGuard();
  private readonly engine: ExecutionEngine;
  private readonly backend: ExecutorBackend;
  private readonly killSwitch: KillSwitch;
  private readonly tools: PluginToolRegistry;
  private readonly fileLocator: FileLocator;
  private readonly session: SessionContext;
  private pipelineState: PipelineState = "idle";

  constructor(options: CommandRuntimeOptions = {}) {
    this.logger = options.logger ?? new Logger("runtime");
    this.config = options.config ?? loadRuntimeConfig();
    this.killSwitch = options.killSwitch ?? new KillSwitch(this.logger.child("kill-switch"));
    this.tools =
      options.tools ?? new PluginToolRegistry({ logger: this.logger.child("plugins"), offline: this.config.strictOffline });
    this.fileLocator = options.fileLocator ?? new FileLocator({ roots: this.config.searchRoots });
    this.session = new SessionContext(this.config.historyLimit);
    this.planner = new ActionPlanner(options.platform);

    this.router = new HybridRouter({
      brain: options.brain ?? new LlmFallbackBrain(this.config.llm, this.config.strictOffline),
      cache: new ResultCache({ maxEntries: this.config.cacheSize, ttlMinutes: this.config.cacheTtlMinutes }),
      pool: new BoundedPool(this.config.fallbackConcurrency),
      parser: this.parser,
      enabled: this.config.hybridEnabled,
      confidenceThreshold: this.config.confidenceThreshold,
      budgets: { text: this.config.textBudgetMs, voice: this.config.voiceBudgetMs },
      logger: this.logger.child("router")
    });

    this.backend =
      options.backend ??
      (this.config.dryRun
        ? new DryRunExecutor(this.logger.child("dry-run"))
        : new DesktopExecutor({
            platform: options.platform,
            input: options.input,
            credentials: options.credentials,
            tools: this.tools,
            strictOffline: this.config.strictOffline,
            sleep: options.sleep,
            logger: this.logger.child("desktop")
          }));

    this.engine = new ExecutionEngine({
      backend: this.backend,
      killSwitch: this.killSwitch,
      stepDelayMs: this.config.stepDelayMs,
      speed: this.config.speed,
      sleep: options.sleep,
      logger: this.logger.child("engine")
    });
  }

  init(): void {
    if (this.config.pluginsDir) {
      this.tools.loadDirectory(this.config.pluginsDir);
    }
    if (this.config.killSwitch.enabled) {
      this.killSwitch.start(this.config.killSwitch.signal);
    }
  }

  destroy(): void {
    this.killSwitch.stop();
  }

  get state(): PipelineState {
    return this.pipelineState;
  }

  getState(): RuntimeStateSnapshot {
    return {
      session: this.session.snapshot(),
      pipelineState: this.pipelineState,
      killSwitchTriggered: this.killSwitch.isTriggered(),
      speed: this.engine.speed,
      dryRun: this.backend instanceof DryRunExecutor,
      allowedActions: this.guard.allowedActions(),
      tools: this.tools.list()
    };
  }

  setPreferences(update: PreferencesUpdate): RuntimeStateSnapshot {
    if (update.speed !== undefined) {
      this.engine.setSpeed(update.speed);
    }
    if (update.permissionProfile !== undefined) {
      this.guard.setAllowedActions(update.permissionProfile);
    }
    return this.getState();
  }

  kill(reason = "request"): void {
    this.killSwitch.trigger(reason);
  }

  resetKillSwitch(): void {
    this.killSwitch.reset();
  }

  async handleInput(rawText: string, source: InputSource = "text"): Promise<RuntimeResponse> {
    const traceId = createTraceId();
    const metrics = emptyMetrics();

    if (this.pipelineState !== "idle") {
      return this.respond({ status: "busy", message: "Still working on the previous request." }, metrics, traceId);
    }

    const startedAt = performance.now();
    this.pipelineState = "processing";
    const text = normalizeSpaces(rawText);
    let outcome: Outcome;

    try {
      outcome = text ? await this.process(text, source, metrics) : { status: "error", message: "No input provided." };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error("Input handling failed", reason);
      this.session.resetDialogue();
      outcome = { status: "error", message: `Something went wrong: ${reason}` };
    }

    this.pipelineState = "responding";
    if (text) {
      this.session.recordHistory({ text, intentName: outcome.intent?.name ?? "unknown", status: outcome.status });
    }
    metrics.totalMs = round(performance.now() - startedAt);
    const response = this.respond(outcome, metrics, traceId);

    this.logger.info("runtime.handle_input", {
      traceId,
      source,
      intent: response.intent?.name ?? null,
      status: response.status,
      metrics
    });
    this.pipelineState = "idle";
    return response;
  }

  private async process(text: string, source: InputSource, metrics: RuntimeMetrics): Promise<Outcome> {
    const dialogue = this.session.dialogueState;
    if (dialogue.kind === "awaiting_clarification") {
      metrics.nluMode = "dialogue";
      return this.continueClarification(dialogue.ticket, text, metrics);
    }
    if (dialogue.kind === "awaiting_confirmation") {
      metrics.nluMode = "dialogue";
      return this.continueConfirmation(dialogue.plan, dialogue.intent, text, metrics);
    }

    const parseStart = performance.now();
    const routed = await this.router.parse(
      text,
      { lastIntent: this.session.lastIntent?.name ?? null, lastApp: this.session.lastApp },
      source
    );
    metrics.parseMs = round(performance.now() - parseStart);
    metrics.nluMode = routed.mode;

    const intent = routed.intent;
    this.session.recordIntent(intent);

    switch (intent.name) {
      case "unknown":
        return { status: "unknown", message: "Sorry, I didn't understand that.", intent, suggestions: UNKNOWN_INPUT_SUGGESTIONS };
      case "exit":
        return { status: "exit", message: "Goodbye.", intent };
      case "confirm":
        return { status: "completed", message: "There is nothing waiting for confirmation.", intent };
      case "cancel":
        return { status: "canceled", message: "Nothing to cancel.", intent };
      default:
        break;
    }

    const clarification = this.clarificationFor(intent);
    if (clarification) {
      return this.openClarification(intent, clarification, text);
    }

    if (intent.name === "search_file") {
      const query = String(intent.entities.query ?? "");
      const matches = await this.fileLocator.search(query);
      return { status: "completed", message: describeFileMatches(query, matches), intent };
    }

    return this.executeIntent(intent, metrics);
  }

  private clarificationFor(intent: Intent): ClarificationRequest | null {
    if (intent.clarification) {
      return intent.clarification;
    }
    const [missing] = missingEntities(intent.name, intent.entities);
    if (!missing) {
      return null;
    }
    let type: ClarificationType = "missing_entity";
    if (intent.name === "send_text" && missing === "target") {
      type = "send_text_target";
    } else if (intent.name === "send_text" && missing === "content") {
      type = "send_text_content";
    }
    return { type, missingEntity: missing, prompt: clarificationPromptFor(intent.name, missing, intent.entities) };
  }

  private openClarification(intent: Intent, request: ClarificationRequest, originalText: string): Outcome {
    const ticket: ClarificationTicket = {
      intentName: intent.name,
      clarificationType: request.type,
      missingEntity: request.missingEntity,
      partialEntities: { ...intent.entities },
      prompt: request.prompt,
      originalText
    };
    this.session.awaitClarification(ticket);
    return { status: "awaiting_clarification", message: request.prompt, intent };
  }

  private async continueClarification(ticket: ClarificationTicket, text: string, metrics: RuntimeMetrics): Promise<Outcome> {
    if (this.parser.parse(text).name === "cancel") {
      this.session.resetDialogue();
      return { status: "canceled", message: "Clarification canceled." };
    }

    const value = ticket.clarificationType === "send_text_target" ? cleanRecipient(text) : text;
    if (!value) {
      return { status: "awaiting_clarification", message: ticket.prompt };
    }

    this.session.resetDialogue();
    const intent: Intent = {
      name: ticket.intentName,
      entities: { ...ticket.partialEntities, [ticket.missingEntity]: value },
      confidence: CLARIFIED_CONFIDENCE,
      rawText: `${ticket.originalText} | ${text}`
    };
    this.session.recordIntent(intent);

    const next = this.clarificationFor(intent);
    if (next) {
      return this.openClarification(intent, next, ticket.originalText);
    }

    if (intent.name === "search_file") {
      const query = String(intent.entities.query ?? "");
      return { status: "completed", message: describeFileMatches(query, await this.fileLocator.search(query)), intent };
    }
    return this.executeIntent(intent, metrics);
  }

  private async continueConfirmation(plan: Plan, intent: Intent, text: string, metrics: RuntimeMetrics): Promise<Outcome> {
    const reply = this.parser.parse(text).name;

    if (reply === "cancel") {
      this.session.resetDialogue();
      return { status: "canceled", message: "Pending actions canceled.", intent };
    }

    if (reply !== "confirm") {
      return { status: "awaiting_confirmation", message: "Type confirm or cancel to continue.", intent, steps: plan };
    }

    this.session.resetDialogue();
    const safety = this.guard.validate(plan);
    if (!safety.allowed) {
      return { status: "blocked", message: safety.reason, intent, steps: plan };
    }
    const result = await this.runPlan(plan, metrics);
    return this.describeExecution(intent, plan, result, "Confirmed and completed.");
  }

  private async executeIntent(intent: Intent, metrics: RuntimeMetrics): Promise<Outcome> {
    const planStart = performance.now();
    const plan = this.planner.plan(intent, { lastApp: this.session.lastApp });
    metrics.planMs = round(performance.now() - planStart);

    if (plan.length === 0) {
      return { status: "completed", message: "Nothing to do for that request.", intent };
    }

    const safety = this.guard.validate(plan);
    if (!safety.allowed) {
      return { status: "blocked", message: safety.reason, intent, steps: plan };
    }

    const result = await this.runPlan(plan, metrics);
    return this.describeExecution(intent, plan, result, "Task completed successfully.");
  }

  private async runPlan(plan: Plan, metrics: RuntimeMetrics): Promise<ExecutionResult> {
    this.pipelineState = "executing";
    const executeStart = performance.now();
    try {
      const result = await this.engine.execute(plan);
      const executed = plan.slice(0, result.executedSteps);
      this.session.recordLastAppFrom(executed);
      this.session.recordBrowsing(executed);
      return result;
    } finally {
      metrics.executeMs = round(metrics.executeMs + (performance.now() - executeStart));
    }
  }

  private describeExecution(intent: Intent, plan: Plan, result: ExecutionResult, doneMessage: string): Outcome {
    const steps: ActionStep[] = [...plan];

    switch (result.status) {
      case "completed": {
        const detail = result.results
          .map((entry) => entry.message)
          .filter((message) => message.length > 0)
          .pop();
        return { status: "completed", message: detail ?? doneMessage, intent, steps };
      }
      case "awaiting_confirmation":
        this.session.awaitConfirmation(result.pendingSteps, intent);
        return { status: "awaiting_confirmation", message: this.confirmationPrompt(intent, result.pendingSteps), intent, steps };
      case "killed":
        return { status: "killed", message: "Stopped by the kill switch; remaining steps were discarded.", intent, steps };
      case "failed":
        return { status: "error", message: `Task did not complete: ${result.error ?? "unknown error"}`, intent, steps };
    }
  }

  private confirmationPrompt(intent: Intent, pending: readonly ActionStep[]): string {
    const next = pending[0];
    if (next?.action === "autofill_login") {
      return `Ready to fill saved credentials for ${String(next.params.service ?? "this service")}. Credentials are never shown. Type confirm or cancel.`;
    }
    if (next?.action === "send_email") {
      return intent.name === "reply_email"
        ? "Reply is ready to send. Type confirm or cancel."
        : "Email is ready to send. Type confirm or cancel.";
    }
    return "Awaiting confirmation to proceed.";
  }

  private respond(outcome: Outcome, metrics: RuntimeMetrics, traceId: string): RuntimeResponse {
    const dialogue = this.session.dialogueState;
    const ticket = this.session.pendingClarification;
    return {
      status: outcome.status,
      message: outcome.message,
      intent: outcome.intent ? clone(outcome.intent) : null,
      steps: outcome.steps ? clone([...outcome.steps]) : [],
      pendingConfirmation: dialogue.kind === "awaiting_confirmation",
      pendingClarification: dialogue.kind === "awaiting_clarification",
      clarificationPrompt: ticket ? ticket.prompt : null,
      lastApp: this.session.lastApp,
      historyCount: this.session.historyCount,
      suggestions: outcome.suggestions ? [...outcome.suggestions] : [],
      metrics: { ...metrics },
      traceId
    };
  }
}
