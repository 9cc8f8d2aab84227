export const INTENT_NAMES = [
  "confirm",
  "cancel",
  "exit",
  "open_app",
  "focus_app",
  "close_app",
  "open_website",
  "search_web",
  "search_youtube",
  "open_file",
  "search_file",
  "type_text",
  "press_key",
  "clipboard",
  "tab",
  "window",
  "scroll",
  "click",
  "double_click",
  "right_click",
  "wait",
  "send_text",
  "send_email",
  "reply_email",
  "login",
  "create_reminder",
  "create_note",
  "list_reminders",
  "list_notes",
  "get_events",
  "unknown"
] as const;

export type IntentName = (typeof INTENT_NAMES)[number];

export const PRIMITIVE_ACTIONS = [
  "open_app",
  "focus_app",
  "close_app",
  "open_url",
  "open_file",
  "type_text",
  "click",
  "double_click",
  "right_click",
  "scroll",
  "press_key",
  "hotkey",
  "wait",
  "send_text_native",
  "send_message",
  "send_email",
  "autofill_login"
] as const;

export type PrimitiveAction = (typeof PRIMITIVE_ACTIONS)[number];

export type ToolAction = `tool:${string}`;

export type ActionName = PrimitiveAction | ToolAction;

/** Names that can never be allowed, whatever the active safety profile says. */
export const BLOCKED_ACTIONS = ["delete_file", "shutdown_system", "format_drive"] as const;

export type EntityValue = string | number | boolean;

export type IntentEntities = Record<string, EntityValue>;

export type ClarificationType = "missing_entity" | "send_text_target" | "send_text_content";

export interface ClarificationRequest {
  type: ClarificationType;
  missingEntity: string;
  prompt: string;
}

export interface Intent {
  name: IntentName;
  entities: IntentEntities;
  confidence: number;
  rawText: string;
  clarification?: ClarificationRequest;
}

export interface ActionStep {
  action: ActionName;
  params: IntentEntities;
  requiresConfirmation: boolean;
  description: string;
}

export type Plan = readonly ActionStep[];

export interface SafetyResult {
  allowed: boolean;
  reason: string;
}

export interface ClarificationTicket {
  intentName: IntentName;
  clarificationType: ClarificationType;
  missingEntity: string;
  partialEntities: IntentEntities;
  prompt: string;
  originalText: string;
}

export type DialogueState =
  | { kind: "idle" }
  | { kind: "awaiting_confirmation"; plan: Plan; intent: Intent }
  | { kind: "awaiting_clarification"; ticket: ClarificationTicket };

export type PipelineState = "idle" | "processing" | "executing" | "responding";

export type InputSource = "text" | "voice";

export type NluMode = "rules" | "cache" | "llm_fallback" | "fallback_failed" | "dialogue";

export interface RoutedIntent {
  intent: Intent;
  mode: NluMode;
}

export type ExecutionStatus = "completed" | "awaiting_confirmation" | "killed" | "failed";

export interface ExecutionResult {
  status: ExecutionStatus;
  completed: boolean;
  executedSteps: number;
  pendingSteps: ActionStep[];
  results: ActionResult[];
  error?: string;
}

export type ResponseStatus =
  | "completed"
  | "awaiting_confirmation"
  | "awaiting_clarification"
  | "canceled"
  | "blocked"
  | "error"
  | "killed"
  | "unknown"
  | "busy"
  | "exit";

export interface RuntimeMetrics {
  parseMs: number;
  planMs: number;
  executeMs: number;
  totalMs: number;
  nluMode: NluMode | null;
}

export interface RuntimeResponse {
  status: ResponseStatus;
  message: string;
  intent: Intent | null;
  steps: ActionStep[];
  pendingConfirmation: boolean;
  pendingClarification: boolean;
  clarificationPrompt: string | null;
  lastApp: string | null;
  historyCount: number;
  suggestions: string[];
  metrics: RuntimeMetrics;
  traceId: string;
}

export interface HistoryEntry {
  text: string;
  intentName: IntentName;
  status: ResponseStatus;
  atIso: string;
}

export interface BrowsingEntry {
  url: string;
  query?: string;
  atIso: string;
}

export interface SessionSnapshot {
  lastIntent: Intent | null;
  lastApp: string | null;
  dialogue: DialogueState["kind"];
  pendingSteps: ActionStep[];
  pendingClarification: ClarificationTicket | null;
  history: HistoryEntry[];
  browsingCount: number;
}

export interface RuntimeStateSnapshot {
  session: SessionSnapshot;
  pipelineState: PipelineState;
  killSwitchTriggered: boolean;
  speed: number;
  dryRun: boolean;
  allowedActions: string[];
  tools: string[];
}

export type PermissionProfile = Record<string, boolean>;

export interface PreferencesUpdate {
  speed?: number;
  permissionProfile?: PermissionProfile;
}

export interface ActionResult {
  ok: boolean;
  message: string;
  data?: unknown;
}

export interface PluginManifest {
  id: string;
  name: string;
  version: string;
  description: string;
  entry: string;
  tools: string[];
}

export interface LlmRuntimeOptions {
  enabled: boolean;
  endpoint: string;
  model: string;
  timeoutMs: number;
}

export type BridgeErrorCode =
  | "INVALID_JSON"
  | "INVALID_PAYLOAD"
  | "UNKNOWN_ACTION"
  | "PROCESS_INPUT_FAILED"
  | "VOICE_INPUT_UNAVAILABLE"
  | "VOICE_INPUT_EMPTY"
  | "VOICE_INPUT_FAILED";

export const BRIDGE_ACTIONS = [
  "process_input",
  "capture_voice_input",
  "update_preferences",
  "get_state",
  "kill",
  "reset_kill_switch",
  "shutdown"
] as const;

export type BridgeAction = (typeof BRIDGE_ACTIONS)[number];
