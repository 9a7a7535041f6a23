import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores the console; resolves once the file is flushed. */
  shutdown(): Promise<void>;
}

type MirroredLevel = "log" | "info" | "warn" | "error" | "debug";

function render(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Mirrors console output into `logFile` (append mode) until `shutdown()`.
 * Without a file this is a no-op.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: async () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const original: Record<MirroredLevel, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
    debug: console.debug.bind(console),
  };

  stream.on("error", (err) => {
    original.error(`Log file ${resolvedLog} is no longer writable:`, err);
  });
  stream.write(`[${new Date().toISOString()}] --- agent session started ---\n`);

  const mirror =
    (level: MirroredLevel) =>
    (...args: unknown[]) => {
      original[level](...args);
      const timestamp = new Date().toISOString();
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${args.map(render).join(" ")}\n`);
    };

  console.log = mirror("log");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");
  console.debug = mirror("debug");

  let closing: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    if (closing) return closing;
    console.log = original.log;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    console.debug = original.debug;
    stream.write(`[${new Date().toISOString()}] --- agent session ended ---\n`);
    closing = new Promise((resolve) => {
      stream.end(() => resolve());
    });
    return closing;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
