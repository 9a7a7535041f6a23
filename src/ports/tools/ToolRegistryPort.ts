import type { z } from "zod";
import type { LoggerPort } from "../sys/LoggerPort";

export const TOOL_NAMES = ["math_calculator", "analyze_text", "date_offset", "get_weather"] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(value);
}

export type ToolErrorCode =
  | "UnknownTool"
  | "InvalidArguments"
  | "Timeout"
  | "UpstreamFailure"
  | "ExecutionFailed";

export type ToolScalar = string | number | boolean | null;
export type ToolData = { readonly [key: string]: ToolScalar };
export type ToolValue = string | ToolData;

export type ToolExecutionResult =
  | { readonly ok: true; readonly value: ToolValue }
  | { readonly ok: false; readonly code: ToolErrorCode; readonly message: string };

export function succeed(value: ToolValue): ToolExecutionResult {
  return { ok: true, value };
}

export function fail(code: ToolErrorCode, message: string): ToolExecutionResult {
  return { ok: false, code, message };
}

/** Pure tools run unbounded; network tools run under the invoker's timeout. */
export type ToolEffect = "pure" | "network";

export interface ToolContext {
  signal: AbortSignal;
  logger: LoggerPort;
}

export interface ToolSpec<S extends z.ZodType = z.ZodType> {
  name: ToolName;
  description: string;
  parameters: S;
  effect: ToolEffect;
  exec(args: z.infer<S>, ctx: ToolContext): Promise<ToolExecutionResult>;
}

// What the model is shown for each tool.
export interface ToolDefinition {
  name: ToolName;
  description: string;
  schema: Record<string, unknown>;
}

export type ArgumentCheck =
  | { ok: true; run: (ctx: ToolContext) => Promise<ToolExecutionResult> }
  | { ok: false; detail: string };

export interface RegisteredTool {
  readonly name: ToolName;
  readonly effect: ToolEffect;
  readonly definition: ToolDefinition;
  prepare(args: unknown): ArgumentCheck;
}

export interface ToolRegistryPort {
  schemas(): ToolDefinition[];
  get(name: string): RegisteredTool | undefined;
  names(): ToolName[];
}
