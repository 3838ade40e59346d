export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export class Logger {
  constructor(private readonly prefix: string = "", private level: LogLevel = "info") {}

  setLevel(level: LogLevel) {
    this.level = level;
  }

  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.level);
  }

  private log(level: Exclude<LogLevel, "silent">, args: unknown[]) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const timestamp = new Date().toISOString();
    const fullPrefix = this.prefix ? `[${this.prefix}]` : "";
    console[level](`[${timestamp}]${fullPrefix}`, ...args);
  }

  debug(...args: unknown[]) {
    this.log("debug", args);
  }

  info(...args: unknown[]) {
    this.log("info", args);
  }

  warn(...args: unknown[]) {
    this.log("warn", args);
  }

  error(...args: unknown[]) {
    this.log("error", args);
  }
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error" || raw === "silent" ? raw : "info";
}

export function createLogger(prefix: string, level: LogLevel = envLevel()): Logger {
  return new Logger(prefix, level);
}
