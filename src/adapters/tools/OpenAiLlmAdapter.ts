import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources";
import { ModelResponseError } from "../../app/LlmPort";
import type { LlmPort } from "../../app/LlmPort";
import type { ConversationEntry } from "../../domain/conversation/types";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { ToolDefinition } from "../../ports/tools/ToolRegistryPort";
import type { ModelDecision, ToolRequest } from "../../shared/contracts";

interface CompletionToolCall {
  id: string;
  type: string;
  function?: { name: string; arguments: string };
}

export interface CompletionResponse {
  choices: Array<{
    message?: {
      content?: string | null;
      tool_calls?: CompletionToolCall[];
    };
  }>;
}

/** The slice of the OpenAI client this adapter uses. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<CompletionResponse>;
    };
  };
}

export interface OpenAiLlmOptions {
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
}

function serializeArgs(args: unknown): string {
  return typeof args === "string" ? args : JSON.stringify(args ?? {});
}

function toChatMessage(entry: ConversationEntry): ChatCompletionMessageParam {
  switch (entry.role) {
    case "system":
      return { role: "system", content: entry.content };
    case "user":
      return { role: "user", content: entry.content };
    case "assistant":
      if (entry.toolRequests?.length) {
        // Tool calls must be declared on the assistant message that precedes
        // the matching "tool" messages.
        return {
          role: "assistant",
          content: entry.content || null,
          tool_calls: entry.toolRequests.map((request) => ({
            id: request.id,
            type: "function",
            function: { name: request.name, arguments: serializeArgs(request.args) },
          })),
        };
      }
      return { role: "assistant", content: entry.content };
    case "tool":
      return {
        role: "tool",
        tool_call_id: entry.callId,
        content: JSON.stringify(entry.result),
      };
  }
}

function toToolSpec(def: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: def.name,
      description: def.description,
      parameters: def.schema,
    },
  };
}

function preview(message: ChatCompletionMessageParam): string {
  const content = "content" in message && typeof message.content === "string" ? message.content : "";
  return `${message.role}:${content.slice(0, 80)}`;
}

export class OpenAiLlmAdapter implements LlmPort {
  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly options: OpenAiLlmOptions,
    private readonly logger: LoggerPort
  ) {}

  async decide(
    conversation: readonly ConversationEntry[],
    tools: readonly ToolDefinition[],
    options: { signal?: AbortSignal } = {}
  ): Promise<ModelDecision> {
    const messages = conversation.map(toChatMessage);
    this.logger.debug("[llm] request", { messages: messages.map(preview) });

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.options.model,
      messages,
      ...(this.options.temperature !== undefined ? { temperature: this.options.temperature } : {}),
      ...(this.options.maxOutputTokens !== undefined
        ? { max_tokens: this.options.maxOutputTokens }
        : {}),
      ...(tools.length ? { tools: tools.map(toToolSpec), tool_choice: "auto" as const } : {}),
    };

    const resp = await this.client.chat.completions.create(body, { signal: options.signal });

    const message = resp.choices?.[0]?.message;
    if (!message) {
      throw new ModelResponseError("Model returned no assistant message.");
    }

    const text = (message.content ?? "").trim();
    const requests: ToolRequest[] = [];
    for (const call of message.tool_calls ?? []) {
      if (call.type !== "function" || !call.function?.name) {
        this.logger.warn("[llm] ignoring non-function tool call", { id: call.id, type: call.type });
        continue;
      }
      requests.push({
        id: call.id || `call_${requests.length}`,
        name: call.function.name,
        args: this.parseArguments(call.function.arguments, call.function.name),
      });
    }

    if (requests.length) {
      return { kind: "tool_requests", text: text || undefined, requests };
    }
    if (!text) {
      throw new ModelResponseError("Model returned neither text nor tool calls.");
    }
    return { kind: "final", text };
  }

  // Unparseable JSON is handed on as the raw string so validation can report it.
  private parseArguments(raw: string, toolName: string): unknown {
    if (!raw.trim()) return {};
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (err) {
      this.logger.warn(`[llm] arguments for ${toolName} are not valid JSON`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return raw;
    }
  }
}
