import { describe, expect, it, vi } from "vitest";
import type { ActionName, ActionStep, IntentEntities } from "../../shared/contracts";
import { ExecutionEngine } from "./execution-engine";
import type { ExecutorBackend } from "./executor-backend";
import { KillSwitch } from "./kill-switch";
import { Logger } from "./logger";

const quiet = new Logger("engine-test", "silent");

const step = (action: ActionName, params: IntentEntities = {}, requiresConfirmation = false): ActionStep => ({
  action,
  params,
  requiresConfirmation,
  description: action
});

const recordingBackend = (onExecute?: (action: string, index: number) => void) => {
  const calls: string[] = [];
  const backend: ExecutorBackend = {
    async execute(action) {
      onExecute?.(action, calls.length);
      calls.push(action);
      return action === "tool:notes_list_notes" ? "2 notes" : undefined;
    }
  };
  return { backend, calls };
};

const createEngine = (backend: ExecutorBackend, killSwitch = new KillSwitch(quiet), speed = 1) => {
  const sleep = vi.fn(async () => undefined);
  const engine = new ExecutionEngine({ backend, killSwitch, stepDelayMs: 200, speed, sleep, logger: quiet });
  return { engine, sleep, killSwitch };
};

describe("ExecutionEngine", () => {
  it("runs every step in order", async () => {
    const { backend, calls } = recordingBackend();
    const { engine, sleep } = createEngine(backend);

    const result = await engine.execute([step("open_app", { app: "Notes" }), step("wait"), step("tool:notes_list_notes")]);

    expect(result).toMatchObject({ status: "completed", completed: true, executedSteps: 3, pendingSteps: [] });
    expect(result.results.map((entry) => entry.message)).toEqual(["", "", "2 notes"]);
    expect(calls).toEqual(["open_app", "wait", "tool:notes_list_notes"]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(200);
  });

  it("stops before the next step once the kill switch fires", async () => {
    const killSwitch = new KillSwitch(quiet);
    const { backend, calls } = recordingBackend((_action, index) => {
      if (index === 1) {
        killSwitch.trigger("test");
      }
    });
    const { engine } = createEngine(backend, killSwitch);

    const result = await engine.execute([step("open_app"), step("wait"), step("type_text"), step("press_key")]);

    expect(calls).toEqual(["open_app", "wait"]);
    expect(result).toMatchObject({ status: "killed", completed: false, executedSteps: 2, pendingSteps: [] });
  });

  it("runs nothing while the kill switch is triggered", async () => {
    const killSwitch = new KillSwitch(quiet);
    killSwitch.trigger();
    const { backend, calls } = recordingBackend();
    const { engine } = createEngine(backend, killSwitch);

    expect((await engine.execute([step("open_app")])).status).toBe("killed");
    expect(calls).toEqual([]);
  });

  it("parks the plan at the first step that needs confirmation", async () => {
    const { backend, calls } = recordingBackend();
    const { engine } = createEngine(backend);

    const result = await engine.execute([step("focus_app"), step("send_email", { keys: "command+shift+d" }, true), step("wait")]);

    expect(calls).toEqual(["focus_app"]);
    expect(result.status).toBe("awaiting_confirmation");
    expect(result.completed).toBe(false);
    expect(result.pendingSteps).toEqual([step("send_email", { keys: "command+shift+d" }), step("wait")]);
  });

  it("runs a confirmed plan to completion", async () => {
    const { backend, calls } = recordingBackend();
    const { engine } = createEngine(backend);

    const parked = await engine.execute([step("send_email", {}, true), step("wait"), step("autofill_login", {}, true)]);
    expect(parked.pendingSteps.map((entry) => entry.requiresConfirmation)).toEqual([false, false, false]);

    const resumed = await engine.execute(parked.pendingSteps);
    expect(resumed.status).toBe("completed");
    expect(calls).toEqual(["send_email", "wait", "autofill_login"]);
  });

  it("aborts the remainder after a failing step", async () => {
    const backend: ExecutorBackend = {
      execute: vi.fn(async (action: string) => {
        if (action === "wait") {
          throw new Error("window vanished");
        }
        return "ok";
      })
    };
    const { engine } = createEngine(backend);

    const result = await engine.execute([step("open_app"), step("wait"), step("type_text")]);

    expect(result).toMatchObject({ status: "failed", completed: false, executedSteps: 1, error: "window vanished" });
    expect(backend.execute).toHaveBeenCalledTimes(2);
  });

  it("treats a tool reply that reports a failure as a failed step", async () => {
    const backend: ExecutorBackend = {
      execute: vi.fn(async () => ({ ok: false, error: "Reminders access denied" }))
    };
    const { engine } = createEngine(backend);

    const result = await engine.execute([step("tool:reminders_create_reminder"), step("wait")]);

    expect(result).toEqual({
      status: "failed",
      completed: false,
      executedSteps: 0,
      pendingSteps: [],
      results: [],
      error: "Reminders access denied"
    });
    expect(backend.execute).toHaveBeenCalledTimes(1);
  });

  it("scales the step delay by the clamped speed", async () => {
    const { backend } = recordingBackend();
    const { engine, sleep } = createEngine(backend, new KillSwitch(quiet), 2);

    await engine.execute([step("open_app"), step("wait")]);
    expect(sleep).toHaveBeenLastCalledWith(100);

    expect(engine.setSpeed(10)).toBe(4);
    expect(engine.setSpeed(0.01)).toBe(0.25);
    expect(engine.setSpeed("fast")).toBe(0.25);
    await engine.execute([step("open_app"), step("wait")]);
    expect(sleep).toHaveBeenLastCalledWith(800);
  });
});
