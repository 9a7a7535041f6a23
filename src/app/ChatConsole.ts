import type { EventBus, Subscription } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import type { ConversationSession, SessionReply } from "./ConversationSession";
import { EXAMPLE_QUERIES } from "./prompts";

export interface ConsoleIO {
  /** Resolves with the next line, or null once input has ended. */
  ask(prompt: string): Promise<string | null>;
  write(line: string): void;
}

export interface ChatConsoleOptions {
  debugTools?: boolean;
}

function replyText(reply: SessionReply): string | null {
  return reply.kind === "empty" ? null : reply.text;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ChatConsole {
  private inFlight: AbortController | null = null;

  constructor(
    private readonly session: ConversationSession,
    private readonly io: ConsoleIO,
    private readonly bus: EventBus,
    private readonly options: ChatConsoleOptions = {}
  ) {}

  async runInteractive(): Promise<void> {
    const subscriptions = this.watchTools();
    this.io.write("Tool agent ready. Ask me to calculate, analyze text, count days or check the weather.");
    this.io.write('Type "history" to review the conversation, or "exit" to quit.');
    try {
      for (;;) {
        const line = await this.io.ask("You: ");
        if (line === null) {
          this.io.write("Goodbye!");
          return;
        }

        let reply: SessionReply;
        try {
          reply = await this.turn(line);
        } catch (err) {
          this.io.write(`Something went wrong: ${errorMessage(err)}`);
          continue;
        }

        const text = replyText(reply);
        if (text === null) continue;
        if (reply.kind === "exit") {
          this.io.write(text);
          return;
        }
        this.io.write(`Agent: ${text}`);
      }
    } finally {
      for (const sub of subscriptions) sub.unsubscribe();
    }
  }

  /** Runs each query in turn; returns how many failed. */
  async runExamples(queries: readonly string[] = EXAMPLE_QUERIES): Promise<number> {
    const subscriptions = this.watchTools();
    let failures = 0;
    try {
      for (const [index, query] of queries.entries()) {
        this.io.write(`\nExample ${index + 1}: ${query}`);
        try {
          const reply = await this.turn(query);
          if (reply.kind === "aborted") failures++;
          this.io.write(`Agent: ${replyText(reply) ?? ""}`);
        } catch (err) {
          failures++;
          this.io.write(`Example ${index + 1} failed: ${errorMessage(err)}`);
        }
      }
    } finally {
      for (const sub of subscriptions) sub.unsubscribe();
    }
    return failures;
  }

  /** Cancels the turn in flight. Returns false when nothing was running. */
  cancel(): boolean {
    if (!this.inFlight) return false;
    this.inFlight.abort();
    return true;
  }

  private async turn(line: string): Promise<SessionReply> {
    const controller = new AbortController();
    this.inFlight = controller;
    try {
      return await this.session.handle(line, { signal: controller.signal });
    } finally {
      this.inFlight = null;
    }
  }

  private watchTools(): Subscription[] {
    if (!this.options.debugTools) return [];
    return [
      this.bus.subscribe(Topics.ToolStarted, ({ name, args }) => {
        this.io.write(`[tool] ${name} ${JSON.stringify(args)}`);
      }),
      this.bus.subscribe(Topics.ToolFinished, ({ name, result }) => {
        if (result.ok) {
          const value = typeof result.value === "string" ? result.value : JSON.stringify(result.value);
          this.io.write(`[tool] ${name} -> ${value}`);
        } else {
          this.io.write(`[tool] ${name} failed (${result.code}): ${result.message}`);
        }
      }),
    ];
  }
}
