import type { ConversationEntry } from "../domain/conversation/types";
import type { ToolDefinition } from "../ports/tools/ToolRegistryPort";
import type { ModelDecision } from "../shared/contracts";

/**
 * The decision-making model. Implementations throw when the model cannot be
 * reached or answers with something that is neither text nor tool calls.
 */
export interface LlmPort {
  decide(
    conversation: readonly ConversationEntry[],
    tools: readonly ToolDefinition[],
    options?: { signal?: AbortSignal }
  ): Promise<ModelDecision>;
}

export class ModelResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelResponseError";
  }
}
