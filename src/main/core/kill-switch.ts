import type { EventEmitter } from "node:events";
import { Logger } from "./logger";

export class KillSwitchTriggeredError extends Error {
  constructor(reason: string) {
    super(`Kill switch triggered: ${reason}`);
    this.name = "KillSwitchTriggeredError";
  }
}

/**
 * Global abort token for running plans. Once triggered it stays triggered until reset();
 * the execution engine polls it between steps, so a started step always finishes.
 */
export class KillSwitch {
  private controller = new AbortController();
  private source?: { emitter: EventEmitter; event: string; listener: () => void };

  constructor(private readonly logger: Logger = new Logger("kill-switch")) {}

  isTriggered(): boolean {
    return this.controller.signal.aborted;
  }

  trigger(reason = "manual"): void {
    if (this.isTriggered()) {
      return;
    }
    this.logger.warn(`Kill switch triggered (${reason})`);
    this.controller.abort(new KillSwitchTriggeredError(reason));
  }

  reset(): void {
    if (!this.isTriggered()) {
      return;
    }
    this.controller = new AbortController();
    this.logger.info("Kill switch reset");
  }

  /** Listens for `event` on `emitter` (a process signal by default) and triggers on it. */
  start(event: string = "SIGUSR2", emitter: EventEmitter = process): void {
    this.stop();
    const listener = (): void => this.trigger(event);
    emitter.on(event, listener);
    this.source = { emitter, event, listener };
  }

  stop(): void {
    if (!this.source) {
      return;
    }
    this.source.emitter.off(this.source.event, this.source.listener);
    this.source = undefined;
  }
}
