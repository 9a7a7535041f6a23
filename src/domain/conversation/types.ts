import type { ToolExecutionResult } from "../../ports/tools/ToolRegistryPort";
import type { ToolRequest } from "../../shared/contracts";

export interface SystemEntry {
  readonly role: "system";
  readonly content: string;
}

export interface UserEntry {
  readonly role: "user";
  readonly content: string;
}

export interface AssistantEntry {
  readonly role: "assistant";
  readonly content: string;
  readonly toolRequests?: readonly ToolRequest[];
}

/** The observed result of one tool invocation, fed back to the model. */
export interface ToolObservationEntry {
  readonly role: "tool";
  readonly callId: string;
  readonly toolName: string;
  readonly result: ToolExecutionResult;
}

export type ConversationEntry = SystemEntry | UserEntry | AssistantEntry | ToolObservationEntry;

export type ConversationRole = ConversationEntry["role"];

export interface ConversationHistoryEntry {
  role: "user" | "assistant";
  content: string;
}
