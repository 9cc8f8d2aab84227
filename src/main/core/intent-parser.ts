import type { ClarificationRequest, Intent, IntentEntities, IntentName } from "../../shared/contracts";
import { clarificationPromptFor } from "./required-entities";

export interface ParseContext {
  lastIntent?: IntentName | null;
  lastApp?: string | null;
}

type RuleMatcher = (text: string, context: ParseContext) => RuleHit | null;

interface RuleHit {
  name: IntentName;
  confidence: number;
  entities: IntentEntities;
  clarification?: ClarificationRequest;
}

const CONFIRM_WORDS = new Set(["yes", "y", "yep", "yeah", "confirm", "ok", "okay", "sure", "do it", "go ahead", "proceed", "send it"]);
const CANCEL_WORDS = new Set(["cancel", "stop", "no", "nope", "abort", "nevermind", "never mind", "forget it"]);
const EXIT_WORDS = new Set(["bye", "goodbye", "good bye", "exit", "quit", "quit assistant", "that's all", "i'm done"]);

const FILE_EXTENSIONS =
  "pdf|txt|md|doc|docx|xls|xlsx|csv|ppt|pptx|png|jpe?g|gif|zip|json|log|rtf|pages|numbers|key";

const FILE_EXTENSION_PATTERN = new RegExp(`\\.(?:${FILE_EXTENSIONS})$`);

const POLITE_PREFIX = /^(?:(?:please|hey|ok(?:ay)?|can you|could you|would you|will you|i want to|i'd like to|i need to)\s+)+/;

export const normalizeUtterance = (value: string): string => value.trim().replace(/\s+/g, " ").toLowerCase();

const stripPoliteness = (value: string): string =>
  value.replace(POLITE_PREFIX, "").replace(/\s+please[.!?]?$/, "").trim();

const bare = (value: string): string => value.replace(/[.!?,]+$/, "").trim();

/** Trims wrapping quotes and trailing punctuation from a keyword-anchored entity. */
const cleanEntity = (value: string | undefined): string =>
  (value ?? "")
    .trim()
    .replace(/^["'“‘]+/, "")
    .replace(/["'”’.!?,;:]+$/, "")
    .trim();

/** Content keeps its own punctuation; only wrapping quotes go. */
const cleanContent = (value: string | undefined): string => {
  const trimmed = (value ?? "").trim();
  const quoted = trimmed.match(/^["'“‘](.*)["'”’]$/);
  return (quoted ? quoted[1] : trimmed).trim();
};

const cleanAppName = (value: string | undefined): string =>
  cleanEntity(value)
    .replace(/^(?:the|my)\s+/, "")
    .replace(/\s+(?:app|application|window)$/, "")
    .trim();

export const isConfirmPhrase = (value: string): boolean => CONFIRM_WORDS.has(bare(normalizeUtterance(value)));

export const isCancelPhrase = (value: string): boolean => CANCEL_WORDS.has(bare(normalizeUtterance(value)));

const hit = (name: IntentName, confidence: number, entities: IntentEntities = {}): RuleHit => ({
  name,
  confidence,
  entities
});

const resolveAppReference = (app: string, context: ParseContext): string => {
  if (/^(?:it|that|this|last|previous|the last one|the previous one)$/.test(app)) {
    return context.lastApp ?? "";
  }
  return app;
};

const withoutEmpty = (entities: Record<string, string | number | undefined>): IntentEntities => {
  const result: IntentEntities = {};
  for (const [key, value] of Object.entries(entities)) {
    if (value === undefined || value === "") {
      continue;
    }
    result[key] = value;
  }
  return result;
};

const matchLiteral: RuleMatcher = (text) => {
  const word = bare(text);
  if (CONFIRM_WORDS.has(word)) {
    return hit("confirm", 1);
  }
  if (CANCEL_WORDS.has(word)) {
    return hit("cancel", 1);
  }
  if (EXIT_WORDS.has(word)) {
    return hit("exit", 0.95);
  }
  return null;
};

const matchFileSearch: RuleMatcher = (text) => {
  const match = text.match(
    /^(?:find|search(?: for)?|locate|look for|where is)\s+(?:the\s+|a\s+|my\s+)?(?:file|document)s?(?:\s+(?:named|called))?(?:\s+(.+))?$/
  );
  if (!match) {
    return null;
  }
  return hit("search_file", 0.9, withoutEmpty({ query: cleanEntity(match[1]) }));
};

const cleanService = (value: string | undefined): string =>
  cleanEntity(value)
    .replace(/^(?:my\s+)/, "")
    .replace(/\s+account$/, "")
    .trim();

const matchLogin: RuleMatcher = (text) => {
  const anchored = text.match(/^(?:log ?in|sign ?in|authenticate)(?:\s+(?:to|on|into|at|with))?\s+(.+)$/);
  if (anchored) {
    return hit("login", 0.9, withoutEmpty({ service: cleanService(anchored[1]) }));
  }
  const trailing = text.match(/^([a-z0-9.-]+)\s+(?:log ?in|sign ?in)$/);
  if (trailing) {
    return hit("login", 0.9, { service: trailing[1] });
  }
  if (/^(?:log ?in|sign ?in)$/.test(bare(text))) {
    return hit("login", 0.9);
  }
  return null;
};

const matchReplyEmail: RuleMatcher = (text) => {
  const match = text.match(
    /^reply(?:\s+to)?(?:\s+(?:the|this|that|an?))?(?:\s+(?:e-?mail|mail))?(?:\s+(?:saying|with|that says)\s+(.+))?$/
  );
  if (!match) {
    return null;
  }
  return hit("reply_email", 0.9, withoutEmpty({ content: cleanContent(match[1]) }));
};

const matchSendEmail: RuleMatcher = (text) => {
  const match =
    text.match(/^(?:send|write|compose)\s+(?:an?\s+)?e-?mail\s+to\s+(.+?)(?:\s+(?:saying|about|that says)\s+(.+))?$/) ??
    text.match(/^e-?mail\s+(.+?)(?:\s+(?:saying|about|that says)\s+(.+))?$/);
  if (!match) {
    return null;
  }
  return hit("send_email", 0.88, withoutEmpty({ target: cleanEntity(match[1]), content: cleanContent(match[2]) }));
};

const messagingApp = (text: string): string => (/\bwhatsapp\b/.test(text) ? "WhatsApp" : "Messages");

/** Drops "to " and a trailing "on whatsapp" / "via imessage" from a recipient. */
export const cleanRecipient = (value: string | undefined): string =>
  cleanEntity(value)
    .replace(/^to\s+/, "")
    .replace(/\s+(?:in|on|via|using|through)\s+(?:imessage|messages|whatsapp|sms)$/, "")
    .trim();

const textClarification = (target: string): ClarificationRequest =>
  target
    ? {
        type: "send_text_content",
        missingEntity: "content",
        prompt: clarificationPromptFor("send_text", "content", { target })
      }
    : {
        type: "send_text_target",
        missingEntity: "target",
        prompt: clarificationPromptFor("send_text", "target", {})
      };

const matchSendText: RuleMatcher = (text) => {
  const app = messagingApp(text);
  const complete = text.match(
    /^(?:send\s+)?(?:an?\s+)?(?:text|message|imessage|sms|whatsapp)(?:\s+message)?\s+(?:to\s+)?(.+?)\s+(?:saying|that says|with)\s+(.+)$/
  );
  if (complete) {
    const target = cleanRecipient(complete[1]);
    const content = cleanContent(complete[2]);
    if (target && content) {
      return hit("send_text", 0.9, { target, content, app });
    }
  }

  const partial =
    text.match(/^send\s+(?:an?\s+)?(?:text|message|imessage|sms|whatsapp)(?:\s+message)?(?:\s+to\s+(.+))?$/) ??
    text.match(/^(?:text|message|imessage|whatsapp)\s+(.+)$/);
  if (!partial) {
    return null;
  }

  const target = cleanRecipient(partial[1]);
  return {
    ...hit("send_text", 0.85, withoutEmpty({ target, app })),
    clarification: textClarification(target)
  };
};

const matchProductivity: RuleMatcher = (text) => {
  const reminder =
    text.match(/^(?:create|add|make|set)(?:\s+an?|\s+new)?\s+reminder\s*(.*)$/) ?? text.match(/^remind me\s+(.*)$/);
  if (reminder) {
    const rest = reminder[1].trim();
    const leadingList = rest.match(/^to\s+(?:the\s+|my\s+)?(.+?)\s+list\s+(.+)$/);
    if (leadingList) {
      return hit("create_reminder", 0.9, withoutEmpty({ name: cleanContent(leadingList[2]), list: cleanEntity(leadingList[1]) }));
    }
    const trailingList = rest.match(/^(.+?)\s+(?:in|on|to)\s+(?:the\s+|my\s+)?(.+?)\s+list$/);
    if (trailingList) {
      return hit("create_reminder", 0.9, withoutEmpty({ name: cleanContent(trailingList[1].replace(/^to\s+/, "")), list: cleanEntity(trailingList[2]) }));
    }
    return hit("create_reminder", 0.9, withoutEmpty({ name: cleanContent(rest.replace(/^(?:to|that)\s+/, "")) }));
  }

  const note = text.match(/^(?:create|add|make|write|take)(?:\s+an?|\s+new)?\s+note\s*(.*)$/);
  if (note) {
    const rest = note[1].trim();
    const inFolder = rest.match(/^(.+?)\s+in\s+(?:the\s+|my\s+)?(.+?)(?:\s+folder)?$/);
    if (inFolder) {
      return hit("create_note", 0.88, withoutEmpty({ title: cleanContent(inFolder[1]), folder: cleanEntity(inFolder[2]) }));
    }
    return hit("create_note", 0.88, withoutEmpty({ title: cleanContent(rest.replace(/^(?:called|titled|named)\s+/, "")) }));
  }

  if (/^(?:list|show|read)(?:\s+me)?(?:\s+(?:my|all|all my|the))?\s+reminders$/.test(bare(text))) {
    return hit("list_reminders", 0.9);
  }

  if (/^(?:list|show|read)(?:\s+me)?(?:\s+(?:my|all|all my|the))?\s+notes$/.test(bare(text))) {
    return hit("list_notes", 0.9);
  }

  const events = bare(text).match(
    /^(?:show|list|get|check|what'?s|what is)(?:\s+(?:me|on))?(?:\s+(?:my|the))?\s+(?:schedule|calendar|events|agenda)(?:\s+for)?(?:\s+(today|tomorrow|this week))?$/
  );
  if (events) {
    return hit("get_events", 0.88, { range: events[1] ?? "today" });
  }

  return null;
};

const matchYoutube: RuleMatcher = (text) => {
  const match =
    text.match(/^(?:search|find|look up)\s+(?:on\s+)?youtube\s+(?:for\s+)?(.+)$/) ??
    text.match(/^(?:play|search for|search|find|watch)\s+(.+?)\s+on\s+youtube$/) ??
    text.match(/^youtube\s+(.+)$/);
  if (!match) {
    return null;
  }
  return hit("search_youtube", 0.9, withoutEmpty({ query: cleanEntity(match[1]) }));
};

const matchWebSearch: RuleMatcher = (text) => {
  const match = text.match(
    /^(?:browse for|search (?:the\s+)?(?:internet|web|online)(?:\s+for)?|search online for|find online|look online for|look up|google|search for|search)\s+(.+)$/
  );
  if (!match) {
    return null;
  }
  const query = cleanEntity(match[1]).replace(/\s+(?:online|on the (?:web|internet))$/, "");
  return hit("search_web", 0.85, withoutEmpty({ query }));
};

const toUrl = (token: string): string => (/^https?:\/\//.test(token) ? token : `https://${token}`);

const looksLikeDomain = (token: string): boolean =>
  /^(?:https?:\/\/)?[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,}(?::\d+)?(?:\/\S*)?$/.test(token) &&
  !FILE_EXTENSION_PATTERN.test(token);

const matchWebsite: RuleMatcher = (text) => {
  const anchored = text.match(
    /^(?:open|go to|visit|navigate to|browse to|load|show)\s+(?:the\s+)?(?:website\s+|site\s+|page\s+)?(\S+)$/
  );
  const token = cleanEntity(anchored ? anchored[1] : text);
  if (!looksLikeDomain(token)) {
    return null;
  }
  if (!anchored && !/^(?:https?:\/\/|www\.)/.test(token)) {
    return null;
  }
  return hit("open_website", 0.9, { url: toUrl(token) });
};

const matchOpenFile: RuleMatcher = (text) => {
  const explicit = text.match(/^(?:open|show|view)\s+(?:the\s+|my\s+)?file\s+(.+)$/);
  if (explicit) {
    return hit("open_file", 0.85, withoutEmpty({ path: cleanEntity(explicit[1]) }));
  }
  const implicit = text.match(/^(?:open|show|view)\s+(?:the\s+|my\s+)?(\S+)$/);
  if (implicit) {
    const path = cleanEntity(implicit[1]);
    if (FILE_EXTENSION_PATTERN.test(path) || /^(?:~|\/|\.{1,2}\/)/.test(path)) {
      return hit("open_file", 0.85, { path });
    }
  }
  return null;
};

const matchScroll: RuleMatcher = (text) => {
  const match = bare(text).match(
    /^scroll(?:\s+(up|down|left|right))?(?:\s+(?:by\s+)?(\d+))?(?:\s+(?:times|lines|steps|clicks))?$/
  );
  if (!match) {
    return null;
  }
  return hit("scroll", 0.9, {
    direction: match[1] ?? "down",
    amount: match[2] ? Number(match[2]) : 3
  });
};

const matchPressKey: RuleMatcher = (text) => {
  const match = bare(text).match(/^(?:press|hit|tap)\s+(?:the\s+)?(.+?)(?:\s+(?:key|button))?$/);
  if (!match) {
    return null;
  }
  const key = cleanEntity(match[1]).replace(/\s*\+\s*/g, "+");
  return hit("press_key", 0.9, withoutEmpty({ key }));
};

const matchClipboard: RuleMatcher = (text) => {
  const match = bare(text).match(/^(copy|paste|cut|select all|undo|redo)(?:\s+(?:that|this|it|everything|all|the text|text))?$/);
  if (!match) {
    return null;
  }
  return hit("clipboard", 0.95, { operation: match[1].replace(" ", "_") });
};

const matchTab: RuleMatcher = (text) => {
  const word = bare(text);
  if (/^(?:open\s+(?:a\s+)?new|new)\s+tab$/.test(word)) {
    return hit("tab", 0.92, { operation: "new" });
  }
  if (/^close\s+(?:this\s+|the\s+|current\s+)?tab$/.test(word)) {
    return hit("tab", 0.92, { operation: "close" });
  }
  if (/^(?:next|switch)\s+tab$/.test(word)) {
    return hit("tab", 0.92, { operation: "next" });
  }
  if (/^(?:previous|prev|last)\s+tab$/.test(word)) {
    return hit("tab", 0.92, { operation: "previous" });
  }
  if (/^reopen(?:\s+(?:the\s+)?(?:closed|last))?\s+tab$/.test(word)) {
    return hit("tab", 0.92, { operation: "reopen" });
  }
  return null;
};

const matchWindow: RuleMatcher = (text) => {
  const word = bare(text);
  if (/^(?:switch|next|change)\s+windows?$/.test(word)) {
    return hit("window", 0.9, { operation: "switch" });
  }
  if (/^minimi[sz]e(?:\s+(?:this|the|current))?\s+window$/.test(word)) {
    return hit("window", 0.9, { operation: "minimize" });
  }
  if (/^close\s+(?:this|the|current)\s+window$/.test(word)) {
    return hit("window", 0.9, { operation: "close" });
  }
  return null;
};

const matchClick: RuleMatcher = (text) => {
  const word = bare(text);
  const double = word.match(/^double[\s-]?click(?:\s+on)?(?:\s+(?:the\s+)?(.+))?$/);
  if (double) {
    return hit("double_click", 0.85, withoutEmpty({ target: cleanEntity(double[1]) }));
  }
  const right = word.match(/^right[\s-]?click(?:\s+on)?(?:\s+(?:the\s+)?(.+))?$/);
  if (right) {
    return hit("right_click", 0.85, withoutEmpty({ target: cleanEntity(right[1]) }));
  }
  const single = word.match(/^click(?:\s+on)?(?:\s+(?:the\s+)?(.+))?$/);
  if (single) {
    return hit("click", 0.85, withoutEmpty({ target: cleanEntity(single[1]) }));
  }
  return null;
};

const matchWait: RuleMatcher = (text) => {
  const word = bare(text);
  const timed = word.match(/^(?:wait|pause|sleep|hold on)(?:\s+for)?\s+(\d+(?:\.\d+)?)\s*(?:s|secs?|seconds?)?$/);
  if (timed) {
    return hit("wait", 0.9, { seconds: Number(timed[1]) });
  }
  if (/^(?:wait|pause|hold on)(?:\s+(?:a\s+)?(?:second|sec|moment))?$/.test(word)) {
    return hit("wait", 0.9, { seconds: 1 });
  }
  return null;
};

const matchType: RuleMatcher = (text) => {
  const match = text.match(/^(?:type|write|enter|dictate|input)\s+(?:out\s+)?(.+)$/);
  if (!match) {
    return null;
  }
  return hit("type_text", 0.8, withoutEmpty({ content: cleanContent(match[1]) }));
};

const matchCloseApp: RuleMatcher = (text, context) => {
  const match = text.match(/^(?:close|quit|exit|kill)\s+(.+)$/);
  if (!match) {
    return null;
  }
  const app = resolveAppReference(cleanAppName(match[1]), context);
  return hit("close_app", 0.85, withoutEmpty({ app }));
};

const matchFocusApp: RuleMatcher = (text, context) => {
  const match = text.match(/^(?:switch to|focus(?:\s+on)?|go to|go back to|bring up|activate)\s+(.+)$/);
  if (!match) {
    return null;
  }
  const app = resolveAppReference(cleanAppName(match[1]), context);
  return hit("focus_app", 0.85, withoutEmpty({ app }));
};

const matchOpenApp: RuleMatcher = (text, context) => {
  const match = text.match(/^(?:open(?:\s+up)?|launch|start|run|fire up|load)\s+(.+)$/);
  if (!match) {
    return null;
  }
  const app = resolveAppReference(cleanAppName(match[1]), context);
  return hit("open_app", 0.8, withoutEmpty({ app }));
};

/**
 * Deterministic first pass. Rules run most-specific first and the first hit wins;
 * each rule carries a fixed confidence so results only depend on the normalized text.
 */
export class IntentParser {
  private readonly rules: readonly RuleMatcher[] = [
    matchLiteral,
    matchFileSearch,
    matchLogin,
    matchReplyEmail,
    matchSendEmail,
    matchSendText,
    matchProductivity,
    matchYoutube,
    matchWebSearch,
    matchWebsite,
    matchOpenFile,
    matchScroll,
    matchPressKey,
    matchClipboard,
    matchTab,
    matchWindow,
    matchClick,
    matchWait,
    matchType,
    matchCloseApp,
    matchFocusApp,
    matchOpenApp
  ];

  parse(rawText: string, context: ParseContext = {}): Intent {
    const text = stripPoliteness(normalizeUtterance(rawText));

    if (!text) {
      return unknownIntent(rawText);
    }

    for (const rule of this.rules) {
      const result = rule(text, context);
      if (!result) {
        continue;
      }

      const intent: Intent = {
        name: result.name,
        entities: result.entities,
        confidence: result.confidence,
        rawText
      };
      if (result.clarification) {
        intent.clarification = result.clarification;
      }
      return intent;
    }

    return unknownIntent(rawText, text);
  }
}

export const unknownIntent = (rawText: string, text: string = normalizeUtterance(rawText)): Intent => ({
  name: "unknown",
  entities: text ? { text } : {},
  confidence: 0,
  rawText
});
