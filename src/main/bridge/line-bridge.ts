import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type {
  ActionStep,
  BridgeErrorCode,
  Intent,
  RuntimeMetrics,
  RuntimeResponse,
  RuntimeStateSnapshot
} from "../../shared/contracts";
import { bridgeEnvelopeSchema, bridgeRequestSchema, isBridgeAction, type BridgeRequest } from "../../shared/schemas";
import type { CommandRuntime } from "../core/command-runtime";
import { Logger } from "../core/logger";
import type { SpeechInput } from "../core/speech-input";

export interface LineBridgeOptions {
  runtime: CommandRuntime;
  input: Readable;
  output: Writable;
  speech?: SpeechInput;
  logger?: Logger;
}

type WirePayload = Record<string, unknown>;

type RequestId = string | number | undefined;

const intentToWire = (intent: Intent | null): WirePayload | null =>
  intent
    ? { name: intent.name, entities: intent.entities, confidence: intent.confidence, raw_text: intent.rawText }
    : null;

const stepToWire = (step: ActionStep): WirePayload => ({
  action: step.action,
  params: step.params,
  requires_confirmation: step.requiresConfirmation,
  description: step.description
});

const metricsToWire = (metrics: RuntimeMetrics): WirePayload => ({
  parse_ms: metrics.parseMs,
  plan_ms: metrics.planMs,
  execute_ms: metrics.executeMs,
  total_ms: metrics.totalMs,
  nlu_mode: metrics.nluMode
});

export const responseToWire = (response: RuntimeResponse): WirePayload => ({
  status: response.status,
  message: response.message,
  intent: intentToWire(response.intent),
  steps: response.steps.map(stepToWire),
  pending_confirmation: response.pendingConfirmation,
  pending_clarification: response.pendingClarification,
  clarification_prompt: response.clarificationPrompt,
  last_app: response.lastApp,
  history_count: response.historyCount,
  suggestions: response.suggestions,
  metrics: metricsToWire(response.metrics),
  trace_id: response.traceId
});

export const stateToWire = (state: RuntimeStateSnapshot): WirePayload => ({
  pipeline_state: state.pipelineState,
  dialogue: state.session.dialogue,
  last_intent: state.session.lastIntent?.name ?? null,
  last_app: state.session.lastApp,
  pending_steps: state.session.pendingSteps.map(stepToWire),
  clarification_prompt: state.session.pendingClarification?.prompt ?? null,
  history_count: state.session.history.length,
  browsing_count: state.session.browsingCount,
  kill_switch_triggered: state.killSwitchTriggered,
  speed: state.speed,
  dry_run: state.dryRun,
  allowed_actions: state.allowedActions,
  tools: state.tools
});

const errorPayload = (code: BridgeErrorCode, message: string, details?: string): WirePayload => ({
  status: "error",
  message,
  error: { code, details: details ?? null }
});

const describeIssues = (issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string =>
  issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");

/**
 * Line-delimited JSON boundary over a pair of streams. Every request line gets exactly one
 * response line; lines are dispatched without waiting for earlier ones so `kill` lands while a
 * plan is still running.
 */
export class LineBridge {
  private readonly runtime: CommandRuntime;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly speech: SpeechInput | null;
  private readonly logger: Logger;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly closed: Promise<void>;
  private resolveClosed: () => void = () => undefined;
  private readline: Interface | null = null;

  constructor(options: LineBridgeOptions) {
    this.runtime = options.runtime;
    this.input = options.input;
    this.output = options.output;
    this.speech = options.speech ?? null;
    this.logger = options.logger ?? new Logger("bridge");
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  /** Announces readiness and resolves once input ends or `shutdown` arrives and in-flight lines finish. */
  start(): Promise<void> {
    if (this.readline) {
      return this.closed;
    }

    const state = this.runtime.getState();
    this.write({
      status: "ready",
      message: "Bridge online.",
      dry_run: state.dryRun,
      speed: state.speed,
      tools: state.tools
    });

    const readline = createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });
    this.readline = readline;
    readline.on("line", (line) => {
      this.track(this.handleLine(line));
    });
    readline.once("close", () => {
      void Promise.allSettled([...this.inFlight]).then(() => this.resolveClosed());
    });
    return this.closed;
  }

  close(): void {
    this.readline?.close();
  }

  async handleLine(line: string): Promise<void> {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(trimmed);
    } catch (error) {
      this.write(errorPayload("INVALID_JSON", "Invalid JSON input.", error instanceof Error ? error.message : String(error)));
      return;
    }

    const envelope = bridgeEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      this.write(errorPayload("INVALID_PAYLOAD", "Invalid request payload.", describeIssues(envelope.error.issues)));
      return;
    }

    const requestId = envelope.data.request_id;
    const action = envelope.data.action;
    if (!isBridgeAction(action)) {
      this.reply(requestId, errorPayload("UNKNOWN_ACTION", `Unknown action: ${action}`));
      return;
    }

    const request = bridgeRequestSchema.safeParse(payload);
    if (!request.success) {
      this.reply(requestId, errorPayload("INVALID_PAYLOAD", "Invalid request payload.", describeIssues(request.error.issues)));
      return;
    }

    const startedAt = performance.now();
    const response = await this.dispatch(request.data);
    this.reply(requestId, response);
    this.logger.info("bridge.request", {
      action,
      requestId: requestId ?? null,
      status: response.status,
      elapsedMs: Math.round((performance.now() - startedAt) * 1000) / 1000
    });
  }

  private async dispatch(request: BridgeRequest): Promise<WirePayload> {
    switch (request.action) {
      case "process_input":
        return this.processInput(request.text, request.source);
      case "capture_voice_input":
        return this.captureVoice(request.prompt);
      case "update_preferences": {
        const state = this.runtime.setPreferences({
          speed: request.speed,
          permissionProfile: request.permission_profile
        });
        return {
          status: "updated",
          message: "Preferences updated.",
          speed: state.speed,
          allowed_actions: state.allowedActions
        };
      }
      case "get_state":
        return { status: "state", ...stateToWire(this.runtime.getState()) };
      case "kill":
        this.runtime.kill("bridge");
        return { status: "killed", message: "Kill switch triggered." };
      case "reset_kill_switch":
        this.runtime.resetKillSwitch();
        return { status: "reset", message: "Kill switch reset." };
      case "shutdown":
        this.close();
        return { status: "bye", message: "Shutting down bridge." };
    }
  }

  private async processInput(text: string, source: "text" | "voice"): Promise<WirePayload> {
    try {
      return responseToWire(await this.runtime.handleInput(text, source));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error("process_input failed", reason);
      return errorPayload("PROCESS_INPUT_FAILED", "Failed to process input.", reason);
    }
  }

  private async captureVoice(prompt: string | undefined): Promise<WirePayload> {
    if (!this.speech) {
      return errorPayload("VOICE_INPUT_UNAVAILABLE", "Voice input is unavailable.");
    }

    let transcript: string;
    try {
      transcript = (await this.speech.listen(prompt)).trim();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn("Voice capture failed", reason);
      return errorPayload("VOICE_INPUT_FAILED", "Voice input failed.", reason);
    }

    if (!transcript) {
      return { ...errorPayload("VOICE_INPUT_EMPTY", "No speech detected. Please try again."), transcript: "" };
    }

    return { ...(await this.processInput(transcript, "voice")), transcript };
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        this.logger.error("Bridge line failed", error instanceof Error ? error.message : String(error));
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  private reply(requestId: RequestId, payload: WirePayload): void {
    this.write(requestId === undefined ? payload : { ...payload, request_id: requestId });
  }

  private write(payload: WirePayload): void {
    this.output.write(`${JSON.stringify(payload)}\n`);
  }
}
