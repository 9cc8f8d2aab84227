export const DEFAULT_ALLOWED_ACTIONS: readonly string[] = [
  "open_app",
  "focus_app",
  "close_app",
  "open_url",
  "open_file",
  "send_text_native",
  "type_text",
  "click",
  "right_click",
  "double_click",
  "scroll",
  "press_key",
  "hotkey",
  "send_email",
  "send_message",
  "wait",
  "autofill_login",
  "tool:reminders_create_reminder",
  "tool:reminders_list_reminders",
  "tool:notes_create_note",
  "tool:notes_list_notes",
  "tool:calendar_get_events"
];

export const UNKNOWN_INPUT_SUGGESTIONS: readonly string[] = [
  "open Notes",
  "type Hello world",
  "reply email saying I'll send the file tomorrow",
  "create reminder Buy milk",
  "create note Meeting notes in Work",
  "browse for machine learning tutorials",
  "find file report.pdf",
  "login to github"
];
