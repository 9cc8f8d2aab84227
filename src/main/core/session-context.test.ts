import { describe, expect, it } from "vitest";
import type { ActionStep, ClarificationTicket, Intent } from "../../shared/contracts";
import { SessionContext } from "./session-context";

const intent: Intent = { name: "send_email", entities: { target: "sam", content: "hi" }, confidence: 0.88, rawText: "email sam saying hi" };

const sendStep: ActionStep = { action: "send_email", params: { keys: "ctrl+enter" }, requiresConfirmation: false, description: "Send email" };

const ticket: ClarificationTicket = {
  intentName: "send_text",
  clarificationType: "send_text_content",
  missingEntity: "content",
  partialEntities: { target: "john", app: "Messages" },
  prompt: "What message should I send to john?",
  originalText: "text john"
};

describe("SessionContext", () => {
  it("holds at most one pending sub-flow", () => {
    const session = new SessionContext();
    session.awaitConfirmation([sendStep], intent);
    expect(session.pendingSteps).toEqual([sendStep]);
    expect(session.pendingClarification).toBeNull();

    session.awaitClarification(ticket);
    expect(session.pendingSteps).toEqual([]);
    expect(session.pendingClarification).toEqual(ticket);

    session.resetDialogue();
    expect(session.dialogueState).toEqual({ kind: "idle" });
  });

  it("hands out copies of pending state", () => {
    const session = new SessionContext();
    session.awaitConfirmation([sendStep], intent);

    const pending = session.pendingSteps;
    pending[0].params.keys = "changed";
    expect(session.pendingSteps[0].params.keys).toBe("ctrl+enter");
  });

  it("keeps history bounded to the newest entries", () => {
    const session = new SessionContext(2);
    const at = new Date("2026-01-02T03:04:05.000Z");
    session.recordHistory({ text: "one", intentName: "open_app", status: "completed" }, at);
    session.recordHistory({ text: "two", intentName: "open_app", status: "completed" }, at);
    session.recordHistory({ text: "three", intentName: "unknown", status: "unknown" }, at);

    expect(session.historyCount).toBe(2);
    expect(session.history).toEqual([
      { text: "two", intentName: "open_app", status: "completed", atIso: "2026-01-02T03:04:05.000Z" },
      { text: "three", intentName: "unknown", status: "unknown", atIso: "2026-01-02T03:04:05.000Z" }
    ]);
  });

  it("remembers the first opened or focused app", () => {
    const session = new SessionContext();
    session.recordLastAppFrom([
      { action: "wait", params: { seconds: 1 }, requiresConfirmation: false, description: "Wait" },
      { action: "focus_app", params: { app: "Mail" }, requiresConfirmation: false, description: "Focus" },
      { action: "open_app", params: { app: "Notes" }, requiresConfirmation: false, description: "Open" }
    ]);
    expect(session.lastApp).toBe("Mail");

    session.recordLastAppFrom([{ action: "type_text", params: { content: "x" }, requiresConfirmation: false, description: "Type" }]);
    expect(session.lastApp).toBe("Mail");
  });

  it("counts only steps that open a url", () => {
    const session = new SessionContext();
    session.recordBrowsing([
      { action: "open_url", params: { url: "https://example.com" }, requiresConfirmation: false, description: "Open" },
      { action: "open_app", params: { app: "Safari" }, requiresConfirmation: false, description: "Open" },
      { action: "open_url", params: { url: "https://www.google.com/search?q=cats", query: "cats" }, requiresConfirmation: false, description: "Search" },
      { action: "open_url", params: {}, requiresConfirmation: false, description: "Open" }
    ]);

    expect(session.snapshot().browsingCount).toBe(2);
  });

  it("snapshots the dialogue kind and last intent", () => {
    const session = new SessionContext();
    session.recordIntent(intent);
    session.awaitClarification(ticket);

    const snapshot = session.snapshot();
    expect(snapshot.dialogue).toBe("awaiting_clarification");
    expect(snapshot.lastIntent).toEqual(intent);
    expect(snapshot.pendingClarification?.prompt).toBe("What message should I send to john?");
  });
});
