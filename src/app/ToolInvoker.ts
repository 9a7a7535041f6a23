import type { LoggerPort } from "../ports/sys/LoggerPort";
import type {
  ToolContext,
  ToolDefinition,
  ToolExecutionResult,
  ToolRegistryPort,
} from "../ports/tools/ToolRegistryPort";
import { fail } from "../ports/tools/ToolRegistryPort";

export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;

export interface ToolInvokerOptions {
  /** Budget for tools whose effect is "network". */
  timeoutMs?: number;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

export class ToolTimeoutError extends Error {
  constructor(readonly toolName: string, readonly timeoutMs: number) {
    super(`Tool "${toolName}" timed out after ${timeoutMs} ms`);
    this.name = "ToolTimeoutError";
  }
}

export class ToolCancelledError extends Error {
  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" was cancelled`);
    this.name = "ToolCancelledError";
  }
}

type Runner = (ctx: ToolContext) => Promise<ToolExecutionResult>;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs tools on behalf of the agent. Whatever happens inside a tool, the
 * caller gets a ToolExecutionResult back; nothing is thrown past `invoke`.
 */
export class ToolInvoker {
  private readonly timeoutMs: number;

  constructor(
    private readonly tools: ToolRegistryPort,
    private readonly logger: LoggerPort,
    options: ToolInvokerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  definitions(): ToolDefinition[] {
    return this.tools.schemas();
  }

  async invoke(
    name: string,
    args: unknown,
    options: InvokeOptions = {}
  ): Promise<ToolExecutionResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      this.logger.warn(`[tool] unknown tool requested: ${name}`);
      return fail(
        "UnknownTool",
        `Unknown tool "${name}". Known tools: ${this.tools.names().join(", ")}.`
      );
    }

    const check = tool.prepare(args);
    if (!check.ok) {
      this.logger.warn(`[tool] ${name} rejected arguments`, { detail: check.detail });
      return fail("InvalidArguments", `Invalid arguments for ${name}: ${check.detail}`);
    }

    this.logger.info(`[tool] call ${name}`, { args });
    let result: ToolExecutionResult;
    try {
      result =
        tool.effect === "network"
          ? await this.runBounded(name, check.run, options.signal)
          : await check.run({
              signal: options.signal ?? new AbortController().signal,
              logger: this.logger,
            });
    } catch (err) {
      if (err instanceof ToolTimeoutError) {
        this.logger.error(`[tool] ${name} timed out`, { timeoutMs: err.timeoutMs });
        return fail("Timeout", err.message);
      }
      if (err instanceof ToolCancelledError) {
        this.logger.warn(`[tool] ${name} cancelled`);
        return fail("ExecutionFailed", err.message);
      }
      this.logger.error(`[tool] ${name} threw`, { error: errorMessage(err) });
      return fail("ExecutionFailed", `Tool "${name}" failed: ${errorMessage(err)}`);
    }

    if (result.ok) {
      this.logger.info(`[tool] ok ${name}`, { value: result.value });
    } else {
      this.logger.warn(`[tool] failed ${name}`, { code: result.code, message: result.message });
    }
    return result;
  }

  private async runBounded(
    name: string,
    run: Runner,
    outer?: AbortSignal
  ): Promise<ToolExecutionResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onOuterAbort: (() => void) | undefined;

    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // Reject first so the race settles as a timeout even if the tool
        // resolves in reaction to the abort.
        const err = new ToolTimeoutError(name, this.timeoutMs);
        reject(err);
        controller.abort(err);
      }, this.timeoutMs);

      if (outer) {
        onOuterAbort = () => {
          const err = new ToolCancelledError(name);
          reject(err);
          controller.abort(err);
        };
        if (outer.aborted) onOuterAbort();
        else outer.addEventListener("abort", onOuterAbort, { once: true });
      }
    });

    try {
      return await Promise.race([
        run({ signal: controller.signal, logger: this.logger }),
        deadline,
      ]);
    } finally {
      clearTimeout(timer);
      if (outer && onOuterAbort) outer.removeEventListener("abort", onOuterAbort);
    }
  }
}
