import { describe, expect, it } from "vitest";
import type { ActionName, ActionStep } from "../../shared/contracts";
import { requiresConfirmation, SafetyGuard } from "./safety-guard";

const step = (action: ActionName): ActionStep => ({
  action,
  params: {},
  requiresConfirmation: false,
  description: action
});

describe("SafetyGuard", () => {
  it("accepts plans made only of allowed actions", () => {
    const guard = new SafetyGuard();
    expect(guard.validate([step("open_app"), step("wait"), step("type_text")])).toEqual({ allowed: true, reason: "ok" });
    expect(guard.validate([])).toEqual({ allowed: true, reason: "ok" });
  });

  it("rejects the whole plan for a single unlisted action", () => {
    const guard = new SafetyGuard(["open_app", "wait"]);
    const result = guard.validate([step("open_app"), step("wait"), step("type_text")]);

    expect(result.allowed).toBe(false);
    expect(result.reason).toBe("Action not permitted by current safety profile: type_text");
  });

  it("checks the deny-list before the allow-list", () => {
    const guard = new SafetyGuard(["open_app", "delete_file"]);
    const plan: ActionStep[] = [step("type_text"), { ...step("open_app"), action: "tool:x" }];
    expect(guard.validate(plan).reason).toBe("Action not permitted by current safety profile: type_text");

    expect(guard.validate([step("open_app"), { action: "delete_file" }])).toEqual({ allowed: false, reason: "Blocked unsafe action: delete_file" });
  });

  it("replaces the allow-list with enabled profile entries", () => {
    const guard = new SafetyGuard();
    const allowed = guard.setAllowedActions({ wait: true, type_text: true, open_app: false, shutdown_system: true });

    expect(allowed).toEqual(["type_text", "wait"]);
    expect(guard.validate([step("open_app")]).reason).toBe("Action not permitted by current safety profile: open_app");
  });

  it("ignores empty profiles", () => {
    const guard = new SafetyGuard(["open_app"]);
    expect(guard.setAllowedActions({})).toEqual(["open_app"]);
    expect(guard.setAllowedActions({ open_app: false })).toEqual(["open_app"]);
    expect(guard.setAllowedActions(undefined)).toEqual(["open_app"]);
  });

  it("requires confirmation for email sends and credential autofill only", () => {
    expect(requiresConfirmation("send_email")).toBe(true);
    expect(requiresConfirmation("autofill_login")).toBe(true);
    expect(requiresConfirmation("send_message")).toBe(false);
    expect(requiresConfirmation("open_app")).toBe(false);
  });
});
