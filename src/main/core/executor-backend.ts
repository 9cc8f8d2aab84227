import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";
import { PRIMITIVE_ACTIONS, type ActionName, type EntityValue, type IntentEntities, type PrimitiveAction } from "../../shared/contracts";
import { Logger } from "./logger";
import { isOfflineSafeUrl } from "./offline-policy";
import { splitKeys, type HostPlatform } from "./platform-keys";
import type { PluginToolRegistry } from "./plugin-tools";

const execFileAsync = promisify(execFile);

export class UnknownActionError extends Error {
  constructor(readonly action: string) {
    super(`Unknown action: ${action}`);
    this.name = "UnknownActionError";
  }
}

export interface ExecutorBackend {
  execute(action: string, params: IntentEntities): Promise<unknown>;
}

export type ClickKind = "click" | "double_click" | "right_click";

/** Keyboard and mouse synthesis supplied by the host. */
export interface InputDriver {
  typeText(text: string): Promise<void>;
  pressKey(key: string): Promise<void>;
  hotkey(keys: string[]): Promise<void>;
  click(kind: ClickKind, target?: string): Promise<void>;
  scroll(direction: string, amount: number): Promise<void>;
}

/** Looks up and types stored credentials; returns false when none are stored for the service. */
export interface CredentialFiller {
  fill(service: string): Promise<boolean>;
}

export type CommandRunner = (file: string, args: string[]) => Promise<void>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const TOOL_PREFIX = "tool:";

export const isKnownAction = (action: string): action is ActionName => {
  if (action.startsWith(TOOL_PREFIX)) {
    return action.length > TOOL_PREFIX.length;
  }
  return PRIMITIVE_ACTIONS.some((known) => known === action);
};

const str = (value: EntityValue | undefined): string => (value === undefined ? "" : String(value).trim());

const num = (value: EntityValue | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value === undefined || !Number.isFinite(parsed) ? fallback : parsed;
};

const required = (params: IntentEntities, key: string, action: string): string => {
  const value = str(params[key]);
  if (!value) {
    throw new Error(`${action} needs a ${key}.`);
  }
  return value;
};

/** Quotes a value for an AppleScript string literal. */
const appleString = (value: string): string => `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

const runDetached: CommandRunner = async (file, args) => {
  await new Promise<void>((resolve, reject) => {
    const child = spawn(file, args, { detached: true, stdio: "ignore", windowsHide: true });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
};

const runToCompletion: CommandRunner = async (file, args) => {
  await execFileAsync(file, args, { windowsHide: true });
};

/** Records every step instead of touching the desktop. */
export class DryRunExecutor implements ExecutorBackend {
  private readonly calls: Array<{ action: ActionName; params: IntentEntities }> = [];

  constructor(private readonly logger: Logger = new Logger("dry-run")) {}

  async execute(action: string, params: IntentEntities): Promise<unknown> {
    if (!isKnownAction(action)) {
      throw new UnknownActionError(action);
    }
    this.calls.push({ action, params: { ...params } });
    this.logger.info(`dry-run ${action}`, params);
    return undefined;
  }

  get executed(): ReadonlyArray<{ action: ActionName; params: IntentEntities }> {
    return this.calls;
  }
}

export interface DesktopExecutorOptions {
  platform?: HostPlatform;
  input?: InputDriver;
  credentials?: CredentialFiller;
  tools?: PluginToolRegistry;
  strictOffline?: boolean;
  launch?: CommandRunner;
  run?: CommandRunner;
  sleep?: Sleep;
  logger?: Logger;
}

type ActionHandler = (params: IntentEntities) => Promise<unknown>;

/**
 * Drives the real desktop. OS-level actions go through platform commands; keyboard and mouse
 * go through the host's InputDriver; `tool:` steps go to the plugin registry.
 */
export class DesktopExecutor implements ExecutorBackend {
  private readonly platform: HostPlatform;
  private readonly launch: CommandRunner;
  private readonly run: CommandRunner;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly handlers: Record<PrimitiveAction, ActionHandler>;

  constructor(private readonly options: DesktopExecutorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.launch = options.launch ?? runDetached;
    this.run = options.run ?? runToCompletion;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? new Logger("desktop");
    this.handlers = {
      open_app: (params) => this.openApp(required(params, "app", "open_app")),
      focus_app: (params) => this.focusApp(required(params, "app", "focus_app")),
      close_app: (params) => this.closeApp(required(params, "app", "close_app")),
      open_url: (params) => this.openUrl(required(params, "url", "open_url")),
      open_file: (params) => this.openTarget(required(params, "path", "open_file")),
      type_text: (params) => this.input("type_text").typeText(str(params.content)),
      press_key: (params) => this.input("press_key").pressKey(required(params, "key", "press_key")),
      hotkey: (params) => this.input("hotkey").hotkey(splitKeys(required(params, "keys", "hotkey"))),
      click: (params) => this.click("click", params),
      double_click: (params) => this.click("double_click", params),
      right_click: (params) => this.click("right_click", params),
      scroll: (params) => this.input("scroll").scroll(str(params.direction) || "down", num(params.amount, 3)),
      wait: (params) => this.sleep(Math.max(0, num(params.seconds, 1)) * 1000),
      send_text_native: (params) => this.sendTextNative(params),
      send_message: (params) => this.input("send_message").hotkey(splitKeys(str(params.keys) || "enter")),
      send_email: (params) => this.input("send_email").hotkey(splitKeys(required(params, "keys", "send_email"))),
      autofill_login: (params) => this.autofill(required(params, "service", "autofill_login"))
    };
  }

  async execute(action: string, params: IntentEntities): Promise<unknown> {
    if (action.startsWith(TOOL_PREFIX) && action.length > TOOL_PREFIX.length) {
      return this.callTool(action.slice(TOOL_PREFIX.length), params);
    }

    const handler = PRIMITIVE_ACTIONS.find((known) => known === action);
    if (!handler) {
      throw new UnknownActionError(action);
    }
    this.logger.debug(`execute ${action}`, params);
    return this.handlers[handler](params);
  }

  private async callTool(name: string, params: IntentEntities): Promise<unknown> {
    if (!this.options.tools) {
      throw new UnknownActionError(`${TOOL_PREFIX}${name}`);
    }
    return this.options.tools.call(name, params);
  }

  private input(action: string): InputDriver {
    if (!this.options.input) {
      throw new Error(`No input driver configured for ${action}.`);
    }
    return this.options.input;
  }

  private async click(kind: ClickKind, params: IntentEntities): Promise<void> {
    const target = str(params.target);
    await this.input(kind).click(kind, target || undefined);
  }

  private async openApp(app: string): Promise<void> {
    if (this.platform === "darwin") {
      await this.run("open", ["-a", app]);
      return;
    }
    if (this.platform === "win32") {
      await this.run("cmd", ["/d", "/s", "/c", "start", "", app]);
      return;
    }
    await this.launch(app.toLowerCase().replace(/\s+/g, "-"), []);
  }

  private async focusApp(app: string): Promise<void> {
    if (this.platform === "darwin") {
      await this.run("osascript", ["-e", `tell application ${appleString(app)} to activate`]);
      return;
    }
    if (this.platform === "win32") {
      await this.run("powershell", [
        "-NoProfile",
        "-Command",
        `(New-Object -ComObject WScript.Shell).AppActivate('${app.replace(/'/g, "''")}') | Out-Null`
      ]);
      return;
    }
    await this.run("wmctrl", ["-a", app]);
  }

  private async closeApp(app: string): Promise<void> {
    if (this.platform === "darwin") {
      await this.run("osascript", ["-e", `tell application ${appleString(app)} to quit`]);
      return;
    }
    if (this.platform === "win32") {
      const image = app.toLowerCase().endsWith(".exe") ? app : `${app}.exe`;
      await this.run("taskkill", ["/IM", image, "/F"]);
      return;
    }
    await this.run("pkill", ["-i", "-f", app]);
  }

  private async openUrl(url: string): Promise<void> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new Error(`Invalid URL: ${url}`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new Error("Only http/https URLs are allowed.");
    }
    if (this.options.strictOffline && !isOfflineSafeUrl(parsed.toString())) {
      throw new Error("Strict offline mode blocked remote URL launch.");
    }
    await this.openTarget(parsed.toString());
  }

  private async openTarget(target: string): Promise<void> {
    if (this.platform === "darwin") {
      await this.run("open", [target]);
      return;
    }
    if (this.platform === "win32") {
      await this.run("cmd", ["/d", "/s", "/c", "start", "", target]);
      return;
    }
    await this.launch("xdg-open", [target]);
  }

  private async sendTextNative(params: IntentEntities): Promise<void> {
    if (this.platform !== "darwin") {
      throw new Error("Native messaging is only available on macOS.");
    }
    const target = required(params, "target", "send_text_native");
    const content = required(params, "content", "send_text_native");
    const app = str(params.app) || "Messages";
    const script =
      app === "Messages"
        ? [
            'tell application "Messages"',
            "set targetService to 1st account whose service type = iMessage",
            `set targetBuddy to participant ${appleString(target)} of targetService`,
            `send ${appleString(content)} to targetBuddy`,
            "end tell"
          ]
        : [`tell application ${appleString(app)} to activate`];
    await this.run("osascript", script.flatMap((line) => ["-e", line]));
    if (app !== "Messages") {
      const input = this.input("send_text_native");
      await this.sleep(1000);
      await input.typeText(target);
      await input.pressKey("tab");
      await input.typeText(content);
      await input.pressKey("enter");
    }
  }

  private async autofill(service: string): Promise<string> {
    if (!this.options.credentials) {
      throw new Error("No credential store configured.");
    }
    const filled = await this.options.credentials.fill(service);
    if (!filled) {
      throw new Error(`No saved credentials for ${service}.`);
    }
    return `Credentials filled for ${service}.`;
  }
}
