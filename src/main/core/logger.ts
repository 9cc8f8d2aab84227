export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(levelRank, value);

export const resolveLogLevel = (value: string | undefined, fallback: LogLevel = "info"): LogLevel => {
  const normalized = (value ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
};

/**
 * Console logger. Everything goes to stderr: stdout is reserved for the line bridge.
 */
export class Logger {
  private readonly prefix: string;

  constructor(
    scope?: string,
    private readonly minLevel: LogLevel = resolveLogLevel(process.env.DESKHAND_LOG_LEVEL)
  ) {
    this.prefix = scope ? `[deskhand:${scope}]` : "[deskhand]";
  }

  child(scope: string): Logger {
    return new Logger(scope, this.minLevel);
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, data?: unknown): void {
    if (levelRank[level] < levelRank[this.minLevel]) {
      return;
    }

    const line = `${this.prefix} ${level.toUpperCase()} ${message}`;
    if (data === undefined) {
      console.error(line);
      return;
    }
    console.error(line, data);
  }
}
