#!/usr/bin/env node
import { LineBridge } from "./bridge/line-bridge";
import { CommandRuntime } from "./core/command-runtime";
import { Logger } from "./core/logger";
import { loadRuntimeConfig } from "./core/runtime-config";
import { createSpeechInput } from "./core/speech-input";

const logger = new Logger();

const main = async (): Promise<void> => {
  const config = loadRuntimeConfig();
  const runtime = new CommandRuntime({ config, logger: logger.child("runtime") });
  runtime.init();

  const bridge = new LineBridge({
    runtime,
    input: process.stdin,
    output: process.stdout,
    speech: createSpeechInput(config.speech, logger.child("speech")),
    logger: logger.child("bridge")
  });

  const shutdown = (): void => {
    bridge.close();
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);

  logger.info("Starting", {
    dryRun: config.dryRun,
    strictOffline: config.strictOffline,
    hybrid: config.hybridEnabled,
    killSignal: config.killSwitch.enabled ? config.killSwitch.signal : null
  });

  try {
    await bridge.start();
  } finally {
    process.off("SIGTERM", shutdown);
    process.off("SIGINT", shutdown);
    runtime.destroy();
  }
};

main().then(
  () => {
    process.exitCode = 0;
  },
  (error: unknown) => {
    logger.error("Fatal error", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
);
