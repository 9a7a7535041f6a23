import type { AbortReason } from "../agent/types";
import type { ToolExecutionResult } from "../../ports/tools/ToolRegistryPort";

export interface Subscription {
  unsubscribe(): void;
}

/** Payload carried by each progress topic. */
export interface AgentEvents {
  "agent.thinking": { iteration: number };
  "tool.started": { callId: string; name: string; args: unknown };
  "tool.finished": { callId: string; name: string; result: ToolExecutionResult };
  "agent.finished": { status: "done" | "aborted"; iterations: number; reason?: AbortReason };
}

export type Topic = keyof AgentEvents;

export interface EventBus {
  publish<K extends Topic>(topic: K, payload: AgentEvents[K]): void;
  subscribe<K extends Topic>(topic: K, handler: (payload: AgentEvents[K]) => void): Subscription;
}

export const Topics = {
  AgentThinking: "agent.thinking",
  ToolStarted: "tool.started",
  ToolFinished: "tool.finished",
  AgentFinished: "agent.finished",
} as const satisfies Record<string, Topic>;
