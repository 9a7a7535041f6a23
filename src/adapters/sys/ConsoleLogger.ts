import type { LoggerPort, LogMeta } from "../../ports/sys/LoggerPort";

type Level = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  scope?: string;
  debug?: boolean;
}

function format(scope: string | undefined, message: string, meta?: LogMeta): string {
  const prefixed = scope ? `[${scope}] ${message}` : message;
  return meta && Object.keys(meta).length ? `${prefixed} ${safeStringify(meta)}` : prefixed;
}

function safeStringify(meta: LogMeta): string {
  try {
    return JSON.stringify(meta, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    );
  } catch {
    return "[unserializable meta]";
  }
}

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly options: ConsoleLoggerOptions = {}) {}

  /** A logger writing under a nested scope, e.g. `tool:get_weather`. */
  child(scope: string): ConsoleLogger {
    const nested = this.options.scope ? `${this.options.scope}:${scope}` : scope;
    return new ConsoleLogger({ ...this.options, scope: nested });
  }

  debug(message: string, meta?: LogMeta): void {
    if (!this.options.debug) return;
    this.log("debug", message, meta);
  }
  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }
  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }
  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  private log(level: Level, message: string, meta?: LogMeta) {
    const payload = format(this.options.scope, message, meta);
    switch (level) {
      case "debug":
        return console.debug(payload);
      case "info":
        return console.info(payload);
      case "warn":
        return console.warn(payload);
      case "error":
        return console.error(payload);
    }
  }
}
