import { homedir } from "node:os";
import { delimiter, resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { clampSpeed, loadRuntimeConfig, parseEnvBoolean } from "./runtime-config";

describe("loadRuntimeConfig", () => {
  it("uses defaults when nothing is set", () => {
    const config = loadRuntimeConfig({});

    expect(config.hybridEnabled).toBe(true);
    expect(config.confidenceThreshold).toBe(0.78);
    expect(config.textBudgetMs).toBe(450);
    expect(config.voiceBudgetMs).toBe(700);
    expect(config.cacheSize).toBe(256);
    expect(config.cacheTtlMinutes).toBe(10);
    expect(config.fallbackConcurrency).toBe(2);
    expect(config.strictOffline).toBe(false);
    expect(config.dryRun).toBe(true);
    expect(config.speed).toBe(1);
    expect(config.killSwitch).toEqual({ enabled: true, signal: "SIGUSR2" });
    expect(config.historyLimit).toBe(50);
    expect(config.searchRoots).toEqual([homedir()]);
    expect(config.pluginsDir).toBeUndefined();
    expect(config.llm.endpoint).toBe("http://127.0.0.1:11434/api/generate");
    expect(config.speech).toEqual({
      recorderPath: "rec",
      whisperCliPath: undefined,
      whisperModelPath: undefined,
      recordSeconds: 5
    });
  });

  it("reads and clamps overrides", () => {
    const config = loadRuntimeConfig({
      DESKHAND_HYBRID_NLU: "off",
      DESKHAND_NLU_CONFIDENCE_THRESHOLD: "1.7",
      DESKHAND_LLM_BUDGET_MS_TEXT: "10",
      DESKHAND_NLU_CACHE_SIZE: "abc",
      DESKHAND_SPEED: "9",
      DESKHAND_DRY_RUN: "false",
      DESKHAND_KILL_SIGNAL: "sighup",
      DESKHAND_HISTORY_LIMIT: "5",
      DESKHAND_SEARCH_ROOTS: ["/tmp/docs", "/tmp/work"].join(delimiter),
      DESKHAND_LLM_MODEL: "  qwen2.5:7b  ",
      DESKHAND_WHISPER_CLI: "/opt/whisper/main",
      DESKHAND_RECORD_SECONDS: "90"
    });

    expect(config.hybridEnabled).toBe(false);
    expect(config.confidenceThreshold).toBe(1);
    expect(config.textBudgetMs).toBe(50);
    expect(config.cacheSize).toBe(256);
    expect(config.speed).toBe(4);
    expect(config.dryRun).toBe(false);
    expect(config.killSwitch.signal).toBe("SIGHUP");
    expect(config.historyLimit).toBe(5);
    expect(config.searchRoots).toEqual([resolve("/tmp/docs"), resolve("/tmp/work")]);
    expect(config.llm.model).toBe("qwen2.5:7b");
    expect(config.speech.whisperCliPath).toBe("/opt/whisper/main");
    expect(config.speech.recordSeconds).toBe(30);
  });

  it("falls back to SIGUSR2 for unsupported kill signals", () => {
    expect(loadRuntimeConfig({ DESKHAND_KILL_SIGNAL: "SIGKILL" }).killSwitch.signal).toBe("SIGUSR2");
  });
});

describe("parseEnvBoolean", () => {
  it("reads on/off spellings and keeps the fallback otherwise", () => {
    expect(parseEnvBoolean(" ON ", false)).toBe(true);
    expect(parseEnvBoolean("0", true)).toBe(false);
    expect(parseEnvBoolean(undefined, true)).toBe(true);
    expect(parseEnvBoolean("maybe", false)).toBe(false);
  });

  it("turns strict offline on only when asked", () => {
    expect(loadRuntimeConfig({ DESKHAND_STRICT_OFFLINE: "yes" }).strictOffline).toBe(true);
    expect(loadRuntimeConfig({ DESKHAND_STRICT_OFFLINE: "sometimes" }).strictOffline).toBe(false);
  });
});

describe("clampSpeed", () => {
  it("keeps speed inside the supported range", () => {
    expect(clampSpeed(0.01)).toBe(0.25);
    expect(clampSpeed(2)).toBe(2);
    expect(clampSpeed(12)).toBe(4);
    expect(clampSpeed("fast", 1.5)).toBe(1.5);
  });
});
