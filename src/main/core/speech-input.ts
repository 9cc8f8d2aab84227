import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { promisify } from "node:util";
import type { CommandRunner } from "./executor-backend";
import { Logger } from "./logger";
import type { SpeechConfig } from "./runtime-config";

const execFileAsync = promisify(execFile);

/** Speech-to-text source used by `capture_voice_input`. */
export interface SpeechInput {
  listen(prompt?: string): Promise<string>;
}

export interface WhisperSpeechInputOptions {
  recorderPath: string;
  whisperCliPath: string;
  whisperModelPath: string;
  recordSeconds: number;
  run?: CommandRunner;
  logger?: Logger;
}

const normalizeText = (value: string): string => value.trim().replace(/\s+/g, " ");

const runToCompletion: CommandRunner = async (file, args) => {
  await execFileAsync(file, args, { windowsHide: true });
};

/**
 * Records a fixed-length mono clip with a sox-compatible recorder and transcribes it with the
 * whisper.cpp CLI. An empty string means nothing intelligible was heard.
 */
export class WhisperSpeechInput implements SpeechInput {
  private readonly recorderPath: string;
  private readonly whisperCliPath: string;
  private readonly whisperModelPath: string;
  private readonly recordSeconds: number;
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(options: WhisperSpeechInputOptions) {
    this.recorderPath = options.recorderPath;
    this.whisperCliPath = options.whisperCliPath;
    this.whisperModelPath = options.whisperModelPath;
    this.recordSeconds = options.recordSeconds;
    this.run = options.run ?? runToCompletion;
    this.logger = options.logger ?? new Logger("speech");
  }

  async listen(prompt?: string): Promise<string> {
    if (prompt) {
      this.logger.info(`Listening: ${prompt}`);
    }

    const tempDir = await mkdtemp(join(tmpdir(), "deskhand-voice-"));
    const audioPath = join(tempDir, "clip.wav");
    const outputBasePath = join(tempDir, "result");

    try {
      await this.run(this.recorderPath, [
        "-q",
        "-c",
        "1",
        "-r",
        "16000",
        "-b",
        "16",
        audioPath,
        "trim",
        "0",
        String(this.recordSeconds)
      ]);
      await this.run(this.whisperCliPath, ["-m", this.whisperModelPath, "-f", audioPath, "-nt", "-of", outputBasePath]);

      const textPath = `${outputBasePath}.txt`;
      if (!existsSync(textPath)) {
        return "";
      }
      return normalizeText(await readFile(textPath, "utf8"));
    } finally {
      await this.disposeTempDir(tempDir);
    }
  }

  private async disposeTempDir(tempDir: string): Promise<void> {
    try {
      await rm(tempDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn("Unable to remove temporary voice files.", error);
    }
  }
}

/** Voice capture is only available once both the whisper binary and its model are configured. */
export const createSpeechInput = (config: SpeechConfig, logger?: Logger): SpeechInput | undefined => {
  if (!config.whisperCliPath || !config.whisperModelPath || !existsSync(config.whisperCliPath)) {
    return undefined;
  }
  return new WhisperSpeechInput({
    recorderPath: config.recorderPath,
    whisperCliPath: config.whisperCliPath,
    whisperModelPath: config.whisperModelPath,
    recordSeconds: config.recordSeconds,
    logger
  });
};
