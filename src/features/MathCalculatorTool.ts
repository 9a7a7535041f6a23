import { z } from "zod";
import { evaluate } from "../domain/expression";
import type { ToolContext, ToolExecutionResult, ToolSpec } from "../ports/tools/ToolRegistryPort";
import { fail, succeed } from "../ports/tools/ToolRegistryPort";

const parameters = z.strictObject({
  expression: z
    .string()
    .describe('Arithmetic using numbers, parentheses and + - * / ^, e.g. "(234 * 12) + 98".'),
});

export type MathCalculatorArgs = z.infer<typeof parameters>;

export class MathCalculatorTool implements ToolSpec<typeof parameters> {
  readonly name = "math_calculator";
  readonly description =
    "Evaluate a basic arithmetic expression. Supports + - * / ^ (power) and parentheses; no names, functions or unary minus.";
  readonly parameters = parameters;
  readonly effect = "pure";

  async exec(args: MathCalculatorArgs, ctx: ToolContext): Promise<ToolExecutionResult> {
    const result = evaluate(args.expression);
    if (!result.ok) {
      ctx.logger.debug("[tool] math_calculator rejected expression", {
        kind: result.error.kind,
        position: result.error.position,
      });
      return fail("ExecutionFailed", `Error evaluating expression: ${result.error.message}`);
    }
    return succeed(`Result: ${result.value}`);
  }
}
