import type { AbortReason, AgentStateName, AgentStateValue } from "./types";

export class IllegalTransitionError extends Error {
  constructor(from: AgentStateName, to: AgentStateName) {
    super(`Agent cannot move from ${from} to ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * Thinking <-> ToolExecuting until Done or Aborted. Done and Aborted are
 * terminal; any transition out of them is a programming error.
 */
export class AgentStateMachine {
  private current: AgentStateValue = { name: "Thinking" };
  private cycles = 0;

  get state(): AgentStateValue {
    return this.current;
  }

  /** Completed ToolExecuting -> Thinking round trips. */
  get toolCycles(): number {
    return this.cycles;
  }

  get isTerminal(): boolean {
    return this.current.name === "Done" || this.current.name === "Aborted";
  }

  onToolRequests() {
    this.expect("Thinking", "ToolExecuting");
    this.current = { name: "ToolExecuting" };
  }

  onToolsObserved() {
    this.expect("ToolExecuting", "Thinking");
    this.cycles++;
    this.current = { name: "Thinking" };
  }

  onFinalAnswer(answer: string) {
    this.expect("Thinking", "Done");
    this.current = { name: "Done", answer };
  }

  onAbort(reason: AbortReason) {
    if (this.isTerminal) {
      throw new IllegalTransitionError(this.current.name, "Aborted");
    }
    this.current = { name: "Aborted", reason };
  }

  private expect(from: AgentStateName, to: AgentStateName) {
    if (this.current.name !== from) {
      throw new IllegalTransitionError(this.current.name, to);
    }
  }
}
