import type { ActionResult, ActionStep, ExecutionResult, Plan } from "../../shared/contracts";
import { sleep as defaultSleep, type ExecutorBackend, type Sleep } from "./executor-backend";
import type { KillSwitch } from "./kill-switch";
import { Logger } from "./logger";
import { toActionResult } from "./plugin-tools";
import { clampSpeed } from "./runtime-config";

export interface ExecutionEngineOptions {
  backend: ExecutorBackend;
  killSwitch: KillSwitch;
  stepDelayMs?: number;
  speed?: number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Runs a validated plan step by step. The kill switch is checked before every step,
 * a step that needs confirmation parks the rest of the plan, and the first failure
 * aborts the remainder.
 */
export class ExecutionEngine {
  private readonly backend: ExecutorBackend;
  private readonly killSwitch: KillSwitch;
  private readonly stepDelayMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private currentSpeed: number;

  constructor(options: ExecutionEngineOptions) {
    this.backend = options.backend;
    this.killSwitch = options.killSwitch;
    this.stepDelayMs = Math.max(0, options.stepDelayMs ?? 150);
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? new Logger("engine");
    this.currentSpeed = clampSpeed(options.speed);
  }

  get speed(): number {
    return this.currentSpeed;
  }

  setSpeed(value: unknown): number {
    this.currentSpeed = clampSpeed(value, this.currentSpeed);
    return this.currentSpeed;
  }

  async execute(plan: Plan): Promise<ExecutionResult> {
    const results: ActionResult[] = [];

    for (let index = 0; index < plan.length; index += 1) {
      const step = plan[index];

      if (this.killSwitch.isTriggered()) {
        this.logger.warn(`Kill switch stopped the plan before step ${index + 1}/${plan.length}`);
        return { status: "killed", completed: false, executedSteps: index, pendingSteps: [], results };
      }

      if (step.requiresConfirmation) {
        // One confirmation covers everything parked behind it.
        const pendingSteps: ActionStep[] = plan
          .slice(index)
          .map((rest) => ({ ...rest, params: { ...rest.params }, requiresConfirmation: false }));
        return { status: "awaiting_confirmation", completed: false, executedSteps: index, pendingSteps, results };
      }

      let result: ActionResult;
      try {
        result = toActionResult(await this.backend.execute(step.action, step.params), "");
      } catch (error) {
        return this.fail(step, index, results, error instanceof Error ? error.message : String(error));
      }
      if (!result.ok) {
        return this.fail(step, index, results, result.message || `${step.action} reported a failure`);
      }
      results.push(result);

      if (index < plan.length - 1 && this.stepDelayMs > 0) {
        await this.sleep(this.stepDelayMs / this.currentSpeed);
      }
    }

    return { status: "completed", completed: true, executedSteps: plan.length, pendingSteps: [], results };
  }

  private fail(step: ActionStep, index: number, results: ActionResult[], message: string): ExecutionResult {
    this.logger.error(`Step ${index + 1} (${step.action}) failed`, message);
    return { status: "failed", completed: false, executedSteps: index, pendingSteps: [], results, error: message };
  }
}
