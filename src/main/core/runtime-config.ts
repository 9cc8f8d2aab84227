import { homedir } from "node:os";
import { delimiter, resolve } from "node:path";
import type { LlmRuntimeOptions } from "../../shared/contracts";

export const SPEED_MIN = 0.25;
export const SPEED_MAX = 4;

const KILL_SIGNALS = ["SIGUSR1", "SIGUSR2", "SIGHUP", "SIGBREAK"] as const;

export type KillSignal = (typeof KILL_SIGNALS)[number];

export interface RuntimeConfig {
  hybridEnabled: boolean;
  confidenceThreshold: number;
  textBudgetMs: number;
  voiceBudgetMs: number;
  cacheSize: number;
  cacheTtlMinutes: number;
  fallbackConcurrency: number;
  llm: LlmRuntimeOptions;
  strictOffline: boolean;
  dryRun: boolean;
  speed: number;
  stepDelayMs: number;
  killSwitch: {
    enabled: boolean;
    signal: KillSignal;
  };
  historyLimit: number;
  searchRoots: string[];
  pluginsDir?: string;
  speech: SpeechConfig;
}

export interface SpeechConfig {
  recorderPath: string;
  whisperCliPath?: string;
  whisperModelPath?: string;
  recordSeconds: number;
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

/** Recognized on/off spellings; anything else keeps the fallback. */
export const parseEnvBoolean = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = (value ?? "").trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return fallback;
};

export const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

export const toFiniteOr = (value: unknown, fallback: number): number => {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const clampSpeed = (value: unknown, fallback = 1): number =>
  clamp(toFiniteOr(value, fallback), SPEED_MIN, SPEED_MAX);

const normalizeText = (value: string): string => value.trim().replace(/\s+/g, " ");

const toOptional = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const toKillSignal = (value: string | undefined): KillSignal => {
  const normalized = (value ?? "").trim().toUpperCase();
  return KILL_SIGNALS.find((signal) => signal === normalized) ?? "SIGUSR2";
};

const toSearchRoots = (value: string | undefined): string[] => {
  const raw = toOptional(value);
  if (!raw) {
    return [homedir()];
  }
  return raw
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => resolve(entry.replace(/^~(?=$|[\\/])/, homedir())));
};

/**
 * Reads DESKHAND_* variables. Unset or malformed values fall back to defaults, numbers are clamped.
 */
export const loadRuntimeConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const pluginsDir = toOptional(env.DESKHAND_PLUGINS_DIR);

  return {
    hybridEnabled: parseEnvBoolean(env.DESKHAND_HYBRID_NLU, true),
    confidenceThreshold: clamp(toFiniteOr(env.DESKHAND_NLU_CONFIDENCE_THRESHOLD, 0.78), 0, 1),
    textBudgetMs: clamp(Math.round(toFiniteOr(env.DESKHAND_LLM_BUDGET_MS_TEXT, 450)), 50, 30_000),
    voiceBudgetMs: clamp(Math.round(toFiniteOr(env.DESKHAND_LLM_BUDGET_MS_VOICE, 700)), 50, 30_000),
    cacheSize: clamp(Math.round(toFiniteOr(env.DESKHAND_NLU_CACHE_SIZE, 256)), 1, 10_000),
    cacheTtlMinutes: clamp(toFiniteOr(env.DESKHAND_NLU_CACHE_TTL_MINUTES, 10), 0.1, 24 * 60),
    fallbackConcurrency: clamp(Math.round(toFiniteOr(env.DESKHAND_LLM_CONCURRENCY, 2)), 1, 8),
    llm: {
      enabled: parseEnvBoolean(env.DESKHAND_LLM_ENABLED, true),
      endpoint: normalizeText(env.DESKHAND_LLM_ENDPOINT ?? "http://127.0.0.1:11434/api/generate"),
      model: normalizeText(env.DESKHAND_LLM_MODEL ?? "llama3.1:8b"),
      timeoutMs: clamp(Math.round(toFiniteOr(env.DESKHAND_LLM_TIMEOUT_MS, 4500)), 500, 30_000)
    },
    strictOffline: parseEnvBoolean(env.DESKHAND_STRICT_OFFLINE, false),
    dryRun: parseEnvBoolean(env.DESKHAND_DRY_RUN, true),
    speed: clampSpeed(env.DESKHAND_SPEED),
    stepDelayMs: clamp(Math.round(toFiniteOr(env.DESKHAND_STEP_DELAY_MS, 150)), 0, 5_000),
    killSwitch: {
      enabled: parseEnvBoolean(env.DESKHAND_KILL_SWITCH, true),
      signal: toKillSignal(env.DESKHAND_KILL_SIGNAL)
    },
    historyLimit: clamp(Math.round(toFiniteOr(env.DESKHAND_HISTORY_LIMIT, 50)), 1, 1_000),
    searchRoots: toSearchRoots(env.DESKHAND_SEARCH_ROOTS),
    pluginsDir: pluginsDir ? resolve(pluginsDir) : undefined,
    speech: {
      recorderPath: toOptional(env.DESKHAND_RECORDER) ?? "rec",
      whisperCliPath: toOptional(env.DESKHAND_WHISPER_CLI),
      whisperModelPath: toOptional(env.DESKHAND_WHISPER_MODEL),
      recordSeconds: clamp(Math.round(toFiniteOr(env.DESKHAND_RECORD_SECONDS, 5)), 1, 30)
    }
  };
};
