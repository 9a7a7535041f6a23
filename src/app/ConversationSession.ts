import type { AbortReason } from "../domain/agent/types";
import type { ConversationEntry, ConversationHistoryEntry } from "../domain/conversation/types";
import type { MemoryPort } from "../ports/memory/MemoryPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";
import type { AgentLoop } from "./AgentLoop";
import { withRecalledContext } from "./prompts";

export const DEFAULT_MAX_HISTORY_MESSAGES = 12;

const EXIT_COMMANDS = new Set(["exit", "quit", "bye", "q"]);

export type SessionReply =
  | { readonly kind: "empty" }
  | { readonly kind: "exit"; readonly turns: number; readonly text: string }
  | { readonly kind: "history"; readonly turns: number; readonly text: string }
  | { readonly kind: "answer"; readonly text: string; readonly iterations: number }
  | { readonly kind: "aborted"; readonly reason: AbortReason; readonly text: string };

export interface ConversationSessionOptions {
  systemPrompt: string;
  userId: string;
  maxHistoryMessages?: number;
}

export interface HandleOptions {
  signal?: AbortSignal;
}

const ABORT_EXPLANATIONS: Record<AbortReason, string> = {
  "iteration-limit": "it needed more tool steps than allowed",
  "fatal-error": "the model service failed",
  cancelled: "it was cancelled",
};

export class ConversationSession {
  private history: ConversationHistoryEntry[] = [];
  private turns = 0;
  private readonly maxHistoryMessages: number;

  constructor(
    private readonly loop: AgentLoop,
    private readonly memory: MemoryPort | null,
    private readonly time: TimePort,
    private readonly logger: LoggerPort,
    private readonly options: ConversationSessionOptions
  ) {
    this.maxHistoryMessages = options.maxHistoryMessages ?? DEFAULT_MAX_HISTORY_MESSAGES;
  }

  get turnCount(): number {
    return this.turns;
  }

  async handle(input: string, options: HandleOptions = {}): Promise<SessionReply> {
    const text = input.trim();
    if (!text) return { kind: "empty" };

    const command = text.toLowerCase();
    if (EXIT_COMMANDS.has(command)) {
      return {
        kind: "exit",
        turns: this.turns,
        text: `Goodbye! We talked for ${this.turns} turn${this.turns === 1 ? "" : "s"}.`,
      };
    }
    if (command === "history") {
      return { kind: "history", turns: this.turns, text: this.describeHistory() };
    }

    this.turns++;
    const context = await this.recall();
    const seed: ConversationEntry[] = [
      { role: "system", content: withRecalledContext(this.options.systemPrompt, context) },
      ...this.history,
      { role: "user", content: text },
    ];

    const outcome = await this.loop.run(seed, { signal: options.signal });
    if (outcome.status === "aborted") {
      this.logger.warn("[session] turn aborted", {
        reason: outcome.reason,
        message: outcome.error.message,
      });
      return {
        kind: "aborted",
        reason: outcome.reason,
        text: `I could not complete that request because ${ABORT_EXPLANATIONS[outcome.reason]}.`,
      };
    }

    this.remember(text, outcome.answer);
    await this.persist(text, outcome.answer);
    return { kind: "answer", text: outcome.answer, iterations: outcome.iterations };
  }

  private remember(user: string, assistant: string) {
    const next: ConversationHistoryEntry[] = [
      ...this.history,
      { role: "user", content: user },
      { role: "assistant", content: assistant },
    ];
    this.history = next.slice(-this.maxHistoryMessages);
  }

  private async recall(): Promise<string | null> {
    if (!this.memory) return null;
    try {
      return await this.memory.recall(this.options.userId);
    } catch (err) {
      this.logger.warn("[session] memory recall failed; continuing without context", {
        error: err,
      });
      return null;
    }
  }

  private async persist(user: string, assistant: string) {
    if (!this.memory) return;
    try {
      await this.memory.persist(this.options.userId, {
        user,
        assistant,
        at: new Date(this.time.now()).toISOString(),
      });
    } catch (err) {
      this.logger.warn("[session] memory persist failed", { error: err });
    }
  }

  private describeHistory(): string {
    const header = `Turns so far: ${this.turns}`;
    if (!this.history.length) return `${header}\nNo exchanges yet.`;
    const lines = this.history.map(
      (entry) => `${entry.role === "user" ? "You" : "Agent"}: ${entry.content}`
    );
    return [header, ...lines].join("\n");
  }
}
