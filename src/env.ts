import { config } from "dotenv";

export interface Env {
  openaiApiKey?: string;
  openaiModel: string;
  openaiBaseUrl?: string;
  weatherApiKey?: string;
  userId: string;
  debugMode: boolean;
  configPath?: string;
  logFile?: string;
  examples: boolean;
}

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_USER_ID = "default-user";

/** Loads `.env` into process.env. Existing variables win. */
export function loadDotenv(): void {
  config();
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Environment first, then CLI flags; a later flag overrides an earlier one.
 * `argv` is the argument list after the script name.
 */
export function readEnv(env: NodeJS.ProcessEnv, argv: readonly string[]): Env {
  const result: Env = {
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    openaiModel: nonEmpty(env.OPENAI_MODEL) ?? DEFAULT_MODEL,
    openaiBaseUrl: nonEmpty(env.OPENAI_BASE_URL),
    weatherApiKey: nonEmpty(env.WEATHER_API_KEY),
    userId: nonEmpty(env.AGENT_USER_ID) ?? DEFAULT_USER_ID,
    debugMode: env.DEBUG_MODE === "true",
    examples: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case "--config":
        if (next) {
          result.configPath = next;
          i++;
        }
        break;
      case "--log-file":
        if (next) {
          result.logFile = next;
          i++;
        }
        break;
      case "--user":
        if (next) {
          result.userId = next;
          i++;
        }
        break;
      case "--debug-tools":
        result.debugMode = true;
        break;
      case "--no-debug-tools":
        result.debugMode = false;
        break;
      case "--examples":
        result.examples = true;
        break;
      default:
        break;
    }
  }

  return result;
}
