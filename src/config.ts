import fs from "fs";
import path from "path";
import { z } from "zod";
import { DEFAULT_WEATHER_ENDPOINT } from "./adapters/weather/OpenWeatherMapClient";
import type { LoggerPort } from "./ports/sys/LoggerPort";
import { TOOL_NAMES } from "./ports/tools/ToolRegistryPort";

const DEFAULT_CONFIG_FILENAMES = ["config.json", "agent.config.json"];

export const configSchema = z.strictObject({
  agent: z
    .strictObject({
      maxIterations: z.number().int().min(1).default(6),
      maxHistoryMessages: z.number().int().min(0).default(12),
    })
    .prefault({}),
  model: z
    .strictObject({
      temperature: z.number().min(0).max(2).default(0.2),
      maxOutputTokens: z.number().int().positive().default(512),
      timeoutMs: z.number().int().positive().default(30_000),
      maxRetries: z.number().int().min(0).default(2),
    })
    .prefault({}),
  tools: z
    .strictObject({
      enabled: z.array(z.enum(TOOL_NAMES)).default([...TOOL_NAMES]),
      timeoutMs: z.number().int().positive().default(10_000),
    })
    .prefault({}),
  weather: z
    .strictObject({
      endpoint: z.url().default(DEFAULT_WEATHER_ENDPOINT),
      units: z.enum(["metric", "imperial", "standard"]).default("metric"),
    })
    .prefault({}),
  memory: z
    .strictObject({
      enabled: z.boolean().default(true),
      directory: z.string().min(1).default(".agent-memory"),
    })
    .prefault({}),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(readonly file: string, message: string) {
    super(`Invalid config in ${file}: ${message}`);
    this.name = "ConfigError";
  }
}

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function defaultConfig(): AppConfig {
  return configSchema.parse({});
}

/** Validates a parsed JSON document; throws ConfigError on any problem. */
export function parseConfig(raw: unknown, file = "<inline>"): AppConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(file, detail);
  }
  return parsed.data;
}

/**
 * Reads the first config file that exists. A missing file yields the
 * defaults; an unreadable or invalid one is logged and the defaults are used.
 */
export function loadConfig(logger: LoggerPort, configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [path.resolve(configPath)]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    if (!fs.existsSync(candidate)) continue;
    try {
      const json: unknown = JSON.parse(fs.readFileSync(candidate, "utf8"));
      return { config: parseConfig(json, candidate), path: candidate };
    } catch (err) {
      logger.warn(`Failed to load config from ${candidate}; using defaults`, { error: err });
      return { config: defaultConfig() };
    }
  }

  if (configPath) {
    logger.warn(`Config file ${configPath} not found; proceeding with defaults.`);
  }
  return { config: defaultConfig() };
}
