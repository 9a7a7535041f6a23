export type AbortReason = "iteration-limit" | "fatal-error" | "cancelled";

export type AgentStateValue =
  | { readonly name: "Thinking" }
  | { readonly name: "ToolExecuting" }
  | { readonly name: "Done"; readonly answer: string }
  | { readonly name: "Aborted"; readonly reason: AbortReason };

export type AgentStateName = AgentStateValue["name"];
