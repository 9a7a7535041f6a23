import { AgentStateMachine } from "../domain/agent/AgentStateMachine";
import { LoopError } from "../domain/agent/LoopError";
import type { AbortReason } from "../domain/agent/types";
import { ConversationLog } from "../domain/conversation/ConversationLog";
import type { ConversationEntry } from "../domain/conversation/types";
import type { EventBus } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ModelDecision } from "../shared/contracts";
import { isFinal } from "../shared/contracts";
import type { LlmPort } from "./LlmPort";
import type { ToolInvoker } from "./ToolInvoker";

export const DEFAULT_MAX_ITERATIONS = 6;

export interface AgentLoopOptions {
  /** Tool cycles allowed before the run is aborted. */
  maxIterations?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export type LoopOutcome =
  | {
      readonly status: "done";
      readonly answer: string;
      readonly iterations: number;
      readonly conversation: readonly ConversationEntry[];
    }
  | {
      readonly status: "aborted";
      readonly reason: AbortReason;
      readonly error: LoopError;
      readonly iterations: number;
      readonly conversation: readonly ConversationEntry[];
    };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives one user request: ask the model, run whatever tools it asks for,
 * feed the results back, and repeat until it answers or a bound is hit.
 * Failures come back as an `aborted` outcome, never as a rejection.
 */
export class AgentLoop {
  private readonly maxIterations: number;

  constructor(
    private readonly llm: LlmPort,
    private readonly invoker: ToolInvoker,
    private readonly bus: EventBus,
    private readonly logger: LoggerPort,
    options: AgentLoopOptions = {}
  ) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  async run(seed: readonly ConversationEntry[], options: RunOptions = {}): Promise<LoopOutcome> {
    const { signal } = options;
    const log = new ConversationLog(seed);
    const machine = new AgentStateMachine();
    const tools = this.invoker.definitions();

    for (let iteration = 1; ; iteration++) {
      if (signal?.aborted) {
        return this.abort(machine, log, new LoopError("Cancelled", "The request was cancelled."));
      }

      this.bus.publish(Topics.AgentThinking, { iteration });
      let decision: ModelDecision;
      try {
        decision = await this.llm.decide(log.entries(), tools, { signal });
      } catch (err) {
        if (signal?.aborted) {
          return this.abort(
            machine,
            log,
            new LoopError("Cancelled", "The request was cancelled.", { cause: err })
          );
        }
        this.logger.error("[agent] model call failed", { error: err });
        return this.abort(
          machine,
          log,
          new LoopError("ModelFailure", `Model call failed: ${errorMessage(err)}`, { cause: err })
        );
      }

      if (isFinal(decision)) {
        log.append({ role: "assistant", content: decision.text });
        machine.onFinalAnswer(decision.text);
        this.logger.info("[agent] done", { toolCycles: machine.toolCycles });
        this.bus.publish(Topics.AgentFinished, {
          status: "done",
          iterations: machine.toolCycles,
        });
        return {
          status: "done",
          answer: decision.text,
          iterations: machine.toolCycles,
          conversation: log.entries(),
        };
      }

      if (machine.toolCycles >= this.maxIterations) {
        return this.abort(
          machine,
          log,
          new LoopError(
            "IterationLimitExceeded",
            `No final answer after ${this.maxIterations} tool cycles.`
          )
        );
      }

      machine.onToolRequests();
      log.append({
        role: "assistant",
        content: decision.text ?? "",
        toolRequests: decision.requests,
      });

      for (const request of decision.requests) {
        if (signal?.aborted) {
          return this.abort(machine, log, new LoopError("Cancelled", "The request was cancelled."));
        }
        this.bus.publish(Topics.ToolStarted, {
          callId: request.id,
          name: request.name,
          args: request.args,
        });
        const result = await this.invoker.invoke(request.name, request.args, { signal });
        log.append({ role: "tool", callId: request.id, toolName: request.name, result });
        this.bus.publish(Topics.ToolFinished, { callId: request.id, name: request.name, result });
      }

      machine.onToolsObserved();
    }
  }

  private abort(machine: AgentStateMachine, log: ConversationLog, error: LoopError): LoopOutcome {
    machine.onAbort(error.reason);
    this.logger.warn(`[agent] aborted: ${error.reason}`, {
      code: error.code,
      message: error.message,
      toolCycles: machine.toolCycles,
    });
    this.bus.publish(Topics.AgentFinished, {
      status: "aborted",
      iterations: machine.toolCycles,
      reason: error.reason,
    });
    return {
      status: "aborted",
      reason: error.reason,
      error,
      iterations: machine.toolCycles,
      conversation: log.entries(),
    };
  }
}
