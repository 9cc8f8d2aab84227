import { BLOCKED_ACTIONS, type PermissionProfile, type SafetyResult } from "../../shared/contracts";
import { DEFAULT_ALLOWED_ACTIONS } from "../../shared/defaults";

const CONFIRMATION_ACTIONS = new Set<string>(["send_email", "autofill_login"]);

const blocked = new Set<string>(BLOCKED_ACTIONS);

export const requiresConfirmation = (action: string): boolean => CONFIRMATION_ACTIONS.has(action);

export class SafetyGuard {
  private allowed: Set<string>;

  constructor(allowedActions: Iterable<string> = DEFAULT_ALLOWED_ACTIONS) {
    this.allowed = new Set([...allowedActions].filter((action) => !blocked.has(action)));
  }

  /** All-or-nothing: the first blocked or unlisted action rejects the whole plan. */
  validate(plan: ReadonlyArray<{ action: string }>): SafetyResult {
    for (const step of plan) {
      if (blocked.has(step.action)) {
        return { allowed: false, reason: `Blocked unsafe action: ${step.action}` };
      }
    }

    for (const step of plan) {
      if (!this.allowed.has(step.action)) {
        return { allowed: false, reason: `Action not permitted by current safety profile: ${step.action}` };
      }
    }

    return { allowed: true, reason: "ok" };
  }

  /**
   * Replaces the allow-list with the enabled entries of `profile`.
   * A missing profile, or one that enables nothing, leaves the current list in place.
   */
  setAllowedActions(profile: PermissionProfile | null | undefined): string[] {
    if (!profile) {
      return this.allowedActions();
    }

    const enabled = Object.entries(profile)
      .filter(([action, on]) => on && !blocked.has(action))
      .map(([action]) => action);

    if (enabled.length > 0) {
      this.allowed = new Set(enabled);
    }
    return this.allowedActions();
  }

  allowedActions(): string[] {
    return [...this.allowed].sort();
  }
}
