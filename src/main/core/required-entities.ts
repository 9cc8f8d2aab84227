import type { EntityValue, Intent, IntentEntities, IntentName } from "../../shared/contracts";

export const REQUIRED_ENTITIES: Partial<Record<IntentName, readonly string[]>> = {
  open_app: ["app"],
  focus_app: ["app"],
  close_app: ["app"],
  open_website: ["url"],
  search_web: ["query"],
  search_youtube: ["query"],
  open_file: ["path"],
  type_text: ["content"],
  press_key: ["key"],
  search_file: ["query"],
  login: ["service"],
  send_text: ["target", "content"],
  send_email: ["target", "content"],
  reply_email: ["content"],
  create_reminder: ["name"],
  create_note: ["title"]
};

const PROMPTS: Record<string, string> = {
  "open_app.app": "Which app should I open?",
  "focus_app.app": "Which app should I switch to?",
  "close_app.app": "Which app should I close?",
  "open_website.url": "Which website should I open?",
  "search_web.query": "What should I search for?",
  "search_youtube.query": "What should I search for on YouTube?",
  "open_file.path": "Which file should I open?",
  "type_text.content": "What should I type?",
  "press_key.key": "Which key should I press?",
  "search_file.query": "Which file are you looking for?",
  "login.service": "Which service should I log in to?",
  "send_text.target": "Who should receive this text message?",
  "send_email.target": "Who should I send the email to?",
  "reply_email.content": "What should the reply say?",
  "create_reminder.name": "What should the reminder say?",
  "create_note.title": "What should the note be called?"
};

export const isMissingValue = (value: EntityValue | undefined): boolean =>
  value === undefined || (typeof value === "string" && value.trim().length === 0);

export const missingEntities = (name: IntentName, entities: IntentEntities): string[] =>
  (REQUIRED_ENTITIES[name] ?? []).filter((key) => isMissingValue(entities[key]));

export const hasRequiredEntities = (intent: Pick<Intent, "name" | "entities">): boolean =>
  missingEntities(intent.name, intent.entities).length === 0;

export const clarificationPromptFor = (name: IntentName, entity: string, entities: IntentEntities): string => {
  if (name === "send_text" && entity === "content") {
    return `What message should I send to ${String(entities.target ?? "them")}?`;
  }
  if (name === "send_email" && entity === "content") {
    return `What should the email to ${String(entities.target ?? "them")} say?`;
  }
  return PROMPTS[`${name}.${entity}`] ?? `Could you tell me the ${entity.replace(/_/g, " ")}?`;
};
