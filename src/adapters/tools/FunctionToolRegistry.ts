import { z } from "zod";
import type {
  ArgumentCheck,
  RegisteredTool,
  ToolDefinition,
  ToolName,
  ToolRegistryPort,
  ToolSpec,
} from "../../ports/tools/ToolRegistryPort";
import { isToolName } from "../../ports/tools/ToolRegistryPort";

function toParameterSchema(schema: z.ZodType): Record<string, unknown> {
  const { $schema, ...parameters } = z.toJSONSchema(schema);
  void $schema;
  return parameters;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length ? issue.path.map(String).join(".") : "arguments";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Erases a tool's argument type behind a validating `prepare` step, so that
 * a handler only ever receives arguments its schema accepted.
 */
export function defineTool<S extends z.ZodType>(spec: ToolSpec<S>): RegisteredTool {
  const definition: ToolDefinition = Object.freeze({
    name: spec.name,
    description: spec.description,
    schema: toParameterSchema(spec.parameters),
  });

  return Object.freeze({
    name: spec.name,
    effect: spec.effect,
    definition,
    prepare(args: unknown): ArgumentCheck {
      const parsed = spec.parameters.safeParse(args);
      if (!parsed.success) {
        return { ok: false, detail: describeIssues(parsed.error) };
      }
      const data = parsed.data;
      return { ok: true, run: (ctx) => spec.exec(data, ctx) };
    },
  });
}

export class FunctionToolRegistry implements ToolRegistryPort {
  private readonly toolsByName: ReadonlyMap<ToolName, RegisteredTool>;

  constructor(tools: RegisteredTool[]) {
    const byName = new Map<ToolName, RegisteredTool>();
    for (const tool of tools) {
      if (byName.has(tool.name)) {
        throw new Error(`Tool "${tool.name}" is registered twice.`);
      }
      byName.set(tool.name, tool);
    }
    this.toolsByName = byName;
  }

  schemas(): ToolDefinition[] {
    return Array.from(this.toolsByName.values(), (tool) => tool.definition);
  }

  names(): ToolName[] {
    return Array.from(this.toolsByName.keys());
  }

  get(name: string): RegisteredTool | undefined {
    return isToolName(name) ? this.toolsByName.get(name) : undefined;
  }
}
