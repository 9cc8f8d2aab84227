import type {
  ActionStep,
  BrowsingEntry,
  ClarificationTicket,
  DialogueState,
  HistoryEntry,
  Intent,
  Plan,
  SessionSnapshot
} from "../../shared/contracts";

const clone = <T>(value: T): T => JSON.parse(JSON.stringify(value)) as T;

const BROWSING_LIMIT = 200;

/**
 * Conversation memory for one user. The dialogue field is the only place a pending plan or
 * clarification lives, so the two sub-flows can never be open at once.
 */
export class SessionContext {
  private dialogue: DialogueState = { kind: "idle" };
  private lastIntentValue: Intent | null = null;
  private lastAppValue: string | null = null;
  private readonly historyEntries: HistoryEntry[] = [];
  private readonly browsing: BrowsingEntry[] = [];

  constructor(private readonly historyLimit = 50) {}

  get lastIntent(): Intent | null {
    return this.lastIntentValue;
  }

  get lastApp(): string | null {
    return this.lastAppValue;
  }

  get dialogueState(): DialogueState {
    return this.dialogue;
  }

  get pendingSteps(): ActionStep[] {
    return this.dialogue.kind === "awaiting_confirmation" ? clone([...this.dialogue.plan]) : [];
  }

  get pendingClarification(): ClarificationTicket | null {
    return this.dialogue.kind === "awaiting_clarification" ? clone(this.dialogue.ticket) : null;
  }

  get history(): HistoryEntry[] {
    return this.historyEntries.map((entry) => ({ ...entry }));
  }

  get historyCount(): number {
    return this.historyEntries.length;
  }

  recordIntent(intent: Intent): void {
    this.lastIntentValue = clone(intent);
  }

  recordHistory(entry: Omit<HistoryEntry, "atIso">, at: Date = new Date()): void {
    this.historyEntries.push({ ...entry, atIso: at.toISOString() });
    if (this.historyEntries.length > this.historyLimit) {
      this.historyEntries.splice(0, this.historyEntries.length - this.historyLimit);
    }
  }

  setLastApp(app: string): void {
    const trimmed = app.trim();
    if (trimmed) {
      this.lastAppValue = trimmed;
    }
  }

  /** Remembers the first app a plan opened or focused. */
  recordLastAppFrom(steps: Plan): void {
    const step = steps.find((candidate) => candidate.action === "open_app" || candidate.action === "focus_app");
    const app = step?.params.app;
    if (typeof app === "string") {
      this.setLastApp(app);
    }
  }

  recordBrowsing(steps: Plan, at: Date = new Date()): void {
    for (const step of steps) {
      if (step.action !== "open_url" || typeof step.params.url !== "string") {
        continue;
      }
      const entry: BrowsingEntry = { url: step.params.url, atIso: at.toISOString() };
      if (typeof step.params.query === "string" && step.params.query) {
        entry.query = step.params.query;
      }
      this.browsing.push(entry);
    }
    if (this.browsing.length > BROWSING_LIMIT) {
      this.browsing.splice(0, this.browsing.length - BROWSING_LIMIT);
    }
  }

  awaitConfirmation(plan: Plan, intent: Intent): void {
    this.dialogue = { kind: "awaiting_confirmation", plan: clone([...plan]), intent: clone(intent) };
  }

  awaitClarification(ticket: ClarificationTicket): void {
    this.dialogue = { kind: "awaiting_clarification", ticket: clone(ticket) };
  }

  resetDialogue(): void {
    this.dialogue = { kind: "idle" };
  }

  snapshot(): SessionSnapshot {
    return {
      lastIntent: this.lastIntentValue ? clone(this.lastIntentValue) : null,
      lastApp: this.lastAppValue,
      dialogue: this.dialogue.kind,
      pendingSteps: this.pendingSteps,
      pendingClarification: this.pendingClarification,
      history: this.history,
      browsingCount: this.browsing.length
    };
  }
}
