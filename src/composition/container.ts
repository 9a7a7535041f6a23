import { FileStorage } from "../adapters/sys/FileStorage";
import { StorageMemory } from "../adapters/memory/StorageMemory";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { NodeTime } from "../adapters/sys/NodeTime";
import { SimpleEventBus } from "../adapters/sys/SimpleEventBus";
import { defineTool, FunctionToolRegistry } from "../adapters/tools/FunctionToolRegistry";
import { OpenAiLlmAdapter } from "../adapters/tools/OpenAiLlmAdapter";
import { OpenWeatherMapClient } from "../adapters/weather/OpenWeatherMapClient";
import { AgentLoop } from "../app/AgentLoop";
import { ConversationSession } from "../app/ConversationSession";
import type { LlmPort } from "../app/LlmPort";
import { SYSTEM_PROMPT } from "../app/prompts";
import { ToolInvoker } from "../app/ToolInvoker";
import type { AppConfig } from "../config";
import type { Env } from "../env";
import { DateOffsetTool } from "../features/DateOffsetTool";
import { MathCalculatorTool } from "../features/MathCalculatorTool";
import { TextAnalysisTool } from "../features/TextAnalysisTool";
import { WeatherTool } from "../features/WeatherTool";
import { createOpenAI } from "../openai";
import type { MemoryPort } from "../ports/memory/MemoryPort";
import type { StoragePort } from "../ports/sys/StoragePort";
import type { TimePort } from "../ports/sys/TimePort";
import type { RegisteredTool, ToolName } from "../ports/tools/ToolRegistryPort";
import type { WeatherPort } from "../ports/weather/WeatherPort";

export interface ToolDependencies {
  time: TimePort;
  weather: WeatherPort;
}

export function buildTools(enabled: readonly ToolName[], deps: ToolDependencies): RegisteredTool[] {
  const factories: Record<ToolName, () => RegisteredTool> = {
    math_calculator: () => defineTool(new MathCalculatorTool()),
    analyze_text: () => defineTool(new TextAnalysisTool()),
    date_offset: () => defineTool(new DateOffsetTool(deps.time)),
    get_weather: () => defineTool(new WeatherTool(deps.weather)),
  };
  return Array.from(new Set(enabled), (name) => factories[name]());
}

/** Collaborators tests may swap; everything else is built from `env` and `config`. */
export interface Overrides {
  llm?: LlmPort;
  time?: TimePort;
  weather?: WeatherPort;
  storage?: StoragePort;
}

export interface BuildOptions {
  env: Env;
  config: AppConfig;
  logger: ConsoleLogger;
  overrides?: Overrides;
}

export interface Application {
  session: ConversationSession;
  bus: SimpleEventBus;
  tools: FunctionToolRegistry;
}

export function buildApplication({ env, config, logger, overrides = {} }: BuildOptions): Application {
  const bus = new SimpleEventBus(logger.child("bus"));
  const time = overrides.time ?? new NodeTime();
  const weather =
    overrides.weather ??
    new OpenWeatherMapClient({
      apiKey: env.weatherApiKey,
      endpoint: config.weather.endpoint,
      units: config.weather.units,
    });

  const tools = new FunctionToolRegistry(buildTools(config.tools.enabled, { time, weather }));
  const invoker = new ToolInvoker(tools, logger.child("tools"), {
    timeoutMs: config.tools.timeoutMs,
  });

  const llm =
    overrides.llm ??
    new OpenAiLlmAdapter(
      createOpenAI({
        apiKey: env.openaiApiKey,
        baseURL: env.openaiBaseUrl,
        timeoutMs: config.model.timeoutMs,
        maxRetries: config.model.maxRetries,
      }),
      {
        model: env.openaiModel,
        temperature: config.model.temperature,
        maxOutputTokens: config.model.maxOutputTokens,
      },
      logger.child("llm")
    );

  const loop = new AgentLoop(llm, invoker, bus, logger.child("agent"), {
    maxIterations: config.agent.maxIterations,
  });

  let memory: MemoryPort | null = null;
  if (config.memory.enabled) {
    const storage = overrides.storage ?? new FileStorage(config.memory.directory);
    memory = new StorageMemory(storage, logger.child("memory"));
  }

  const session = new ConversationSession(loop, memory, time, logger.child("session"), {
    systemPrompt: SYSTEM_PROMPT,
    userId: env.userId,
    maxHistoryMessages: config.agent.maxHistoryMessages,
  });

  logger.info(`Tools enabled: ${tools.names().join(", ")}`);
  return { session, bus, tools };
}
