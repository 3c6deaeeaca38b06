import type { z } from "zod";
import type { ToolDefinition, ToolRegistryPort } from "../../ports/tools/ToolRegistryPort";
import type { JsonObjectSchema, ToolDeclaration } from "../../shared/contracts";
import { DuplicateToolError, ToolError } from "../../shared/errors";

/** A tool with typed arguments, before it is erased into a ToolDefinition. */
export interface FunctionTool<TArgs> {
  readonly name: string;
  readonly description: string;
  readonly schema: JsonObjectSchema;
  readonly input: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  exec(args: TArgs): Promise<string>;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "input"}: ${issue.message}`)
    .join("; ");
}

export function bindTool<TArgs>(tool: FunctionTool<TArgs>): ToolDefinition {
  return {
    name: tool.name,
    description: tool.description,
    schema: tool.schema,
    async exec(args: unknown) {
      const parsed = tool.input.safeParse(args);
      if (!parsed.success) {
        throw new ToolError("InvalidArguments", formatIssues(parsed.error));
      }
      return tool.exec(parsed.data);
    },
  };
}

export class FunctionToolRegistry implements ToolRegistryPort {
  private readonly toolsByName = new Map<string, ToolDefinition>();

  constructor(tools: ToolDefinition[]) {
    for (const tool of tools) {
      if (this.toolsByName.has(tool.name)) {
        throw new DuplicateToolError(tool.name);
      }
      this.toolsByName.set(tool.name, tool);
    }
  }

  list(): ToolDeclaration[] {
    return Array.from(this.toolsByName.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      schema: tool.schema,
    }));
  }

  lookup(name: string): ToolDefinition | undefined {
    return this.toolsByName.get(name);
  }
}
