/** One tool invocation requested by the model. `args` is whatever the model sent. */
export interface ToolRequest {
  readonly id: string;
  readonly name: string;
  readonly args: unknown;
}

/** What the model decided after reading the conversation so far. */
export type ModelDecision =
  | { readonly kind: "final"; readonly text: string }
  | {
      readonly kind: "tool_requests";
      readonly text?: string;
      readonly requests: readonly ToolRequest[];
    };

export function isFinal(
  decision: ModelDecision
): decision is Extract<ModelDecision, { kind: "final" }> {
  return decision.kind === "final";
}
