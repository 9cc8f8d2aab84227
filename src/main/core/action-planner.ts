import type { ActionName, ActionStep, EntityValue, Intent, IntentEntities, IntentName } from "../../shared/contracts";
import {
  clipboardKeys,
  composeEmailKeys,
  defaultMailApp,
  joinKeys,
  replyEmailKeys,
  sendEmailKeys,
  sendMessageKeys,
  supportsNativeMessaging,
  tabKeys,
  windowKeys,
  type HostPlatform
} from "./platform-keys";
import { requiresConfirmation } from "./safety-guard";

export interface PlanningContext {
  lastApp: string | null;
}

type PlanHandler = (intent: Intent, context: PlanningContext) => ActionStep[];

const APP_SETTLE_SECONDS = 1;

const text = (value: EntityValue | undefined): string => (value === undefined ? "" : String(value).trim());

const step = (action: ActionName, params: IntentEntities, description: string): ActionStep => ({
  action,
  params,
  requiresConfirmation: requiresConfirmation(action),
  description
});

const resolveApp = (value: EntityValue | undefined, context: PlanningContext): string => {
  const app = text(value);
  if ((app.toLowerCase() === "last" || app.toLowerCase() === "previous") && context.lastApp) {
    return context.lastApp;
  }
  return app;
};

const searchUrl = (base: string, param: string, query: string): string => {
  const url = new URL(base);
  url.searchParams.set(param, query);
  return url.toString();
};

const optional = (entities: Record<string, EntityValue | undefined>): IntentEntities => {
  const result: IntentEntities = {};
  for (const [key, value] of Object.entries(entities)) {
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }
  return result;
};

/**
 * Pure mapping from an intent to ordered steps. Platform differences live in platform-keys;
 * nothing here touches the desktop.
 */
export class ActionPlanner {
  private readonly handlers: Partial<Record<IntentName, PlanHandler>>;

  constructor(private readonly platform: HostPlatform = process.platform) {
    this.handlers = {
      open_app: (intent, context) => {
        const app = resolveApp(intent.entities.app, context);
        return [step("open_app", { app }, `Open ${app}`)];
      },
      focus_app: (intent, context) => {
        const app = resolveApp(intent.entities.app, context);
        return [step("focus_app", { app }, `Focus ${app}`)];
      },
      close_app: (intent, context) => {
        const app = resolveApp(intent.entities.app, context);
        return [step("close_app", { app }, `Close ${app}`)];
      },
      open_website: (intent) => {
        const url = text(intent.entities.url);
        return [step("open_url", { url }, `Open ${url}`)];
      },
      search_web: (intent) => {
        const query = text(intent.entities.query);
        const url = searchUrl("https://www.google.com/search", "q", query);
        return [step("open_url", { url, query }, `Search the web for "${query}"`)];
      },
      search_youtube: (intent) => {
        const query = text(intent.entities.query);
        const url = searchUrl("https://www.youtube.com/results", "search_query", query);
        return [step("open_url", { url, query }, `Search YouTube for "${query}"`)];
      },
      open_file: (intent) => {
        const path = text(intent.entities.path);
        return [step("open_file", { path }, `Open file ${path}`)];
      },
      type_text: (intent) => [step("type_text", { content: text(intent.entities.content) }, "Type text")],
      press_key: (intent) => {
        const key = text(intent.entities.key);
        if (key.includes("+")) {
          return [step("hotkey", { keys: key }, `Press ${key}`)];
        }
        return [step("press_key", { key }, `Press ${key}`)];
      },
      clipboard: (intent) => this.hotkeyPlan(clipboardKeys(text(intent.entities.operation), this.platform), intent),
      tab: (intent) => this.hotkeyPlan(tabKeys(text(intent.entities.operation), this.platform), intent),
      window: (intent) => this.hotkeyPlan(windowKeys(text(intent.entities.operation), this.platform), intent),
      scroll: (intent) => {
        const direction = text(intent.entities.direction) || "down";
        const amount = Number(intent.entities.amount ?? 3);
        return [step("scroll", { direction, amount: Number.isFinite(amount) ? amount : 3 }, `Scroll ${direction}`)];
      },
      click: (intent) => [step("click", optional({ target: intent.entities.target }), "Click")],
      double_click: (intent) => [step("double_click", optional({ target: intent.entities.target }), "Double click")],
      right_click: (intent) => [step("right_click", optional({ target: intent.entities.target }), "Right click")],
      wait: (intent) => {
        const seconds = Number(intent.entities.seconds ?? 1);
        return [step("wait", { seconds: Number.isFinite(seconds) ? seconds : 1 }, "Wait")];
      },
      send_text: (intent) => this.planTextMessage(intent),
      send_email: (intent) => this.planEmail(intent),
      reply_email: (intent) => this.planReply(intent),
      login: (intent) => {
        const service = text(intent.entities.service);
        return [step("autofill_login", { service }, `Autofill credentials for ${service}`)];
      },
      create_reminder: (intent) => [
        step(
          "tool:reminders_create_reminder",
          optional({ name: intent.entities.name, list_name: intent.entities.list }),
          "Create reminder"
        )
      ],
      create_note: (intent) => [
        step(
          "tool:notes_create_note",
          optional({ title: intent.entities.title, body: intent.entities.body, folder_name: intent.entities.folder }),
          "Create note"
        )
      ],
      list_reminders: () => [step("tool:reminders_list_reminders", {}, "List reminders")],
      list_notes: () => [step("tool:notes_list_notes", {}, "List notes")],
      get_events: (intent) => [
        step("tool:calendar_get_events", { range: text(intent.entities.range) || "today" }, "Get calendar events")
      ]
    };
  }

  plan(intent: Intent, context: PlanningContext): ActionStep[] {
    const handler = this.handlers[intent.name];
    return handler ? handler(intent, context) : [];
  }

  private hotkeyPlan(keys: string[] | null, intent: Intent): ActionStep[] {
    if (!keys) {
      return [];
    }
    const operation = text(intent.entities.operation).replace(/_/g, " ");
    return [step("hotkey", { keys: joinKeys(keys) }, `${intent.name} ${operation}`.trim())];
  }

  private planTextMessage(intent: Intent): ActionStep[] {
    const app = text(intent.entities.app) || "Messages";
    const target = text(intent.entities.target);
    const content = text(intent.entities.content);

    if (supportsNativeMessaging(this.platform)) {
      return [step("send_text_native", { app, target, content }, `Text ${target}`)];
    }

    return [
      step("focus_app", { app }, `Focus ${app}`),
      step("wait", { seconds: APP_SETTLE_SECONDS }, "Wait for app"),
      step("type_text", { content: target }, "Type recipient"),
      step("press_key", { key: "tab" }, "Move to message field"),
      step("type_text", { content }, "Type message"),
      step("send_message", { app, keys: joinKeys(sendMessageKeys(this.platform)) }, `Send message to ${target}`)
    ];
  }

  private planEmail(intent: Intent): ActionStep[] {
    const app = text(intent.entities.app) || defaultMailApp(this.platform);
    const target = text(intent.entities.target);
    return [
      step("focus_app", { app }, "Focus email app"),
      step("wait", { seconds: APP_SETTLE_SECONDS }, "Wait for app"),
      step("hotkey", { keys: joinKeys(composeEmailKeys(this.platform)) }, "New message"),
      step("type_text", { content: target }, "Type recipient"),
      step("press_key", { key: "tab" }, "Move to message body"),
      step("type_text", { content: text(intent.entities.content) }, "Type email"),
      step("send_email", { app, to: target, keys: joinKeys(sendEmailKeys(this.platform)) }, `Send email to ${target}`)
    ];
  }

  private planReply(intent: Intent): ActionStep[] {
    const app = text(intent.entities.app) || defaultMailApp(this.platform);
    return [
      step("focus_app", { app }, "Focus email app"),
      step("wait", { seconds: APP_SETTLE_SECONDS }, "Wait for app"),
      step("hotkey", { keys: joinKeys(replyEmailKeys(this.platform)) }, "Open reply"),
      step("type_text", { content: text(intent.entities.content) }, "Type reply"),
      step("send_email", { app, keys: joinKeys(sendEmailKeys(this.platform)) }, "Send email")
    ];
  }
}
