import type { ToolDeclaration } from "../../shared/contracts";

/**
 * A registered tool. `exec` receives the JSON-decoded payload and either
 * resolves with the text handed back to the model or rejects.
 */
export interface ToolDefinition extends ToolDeclaration {
  exec(args: unknown): Promise<string>;
}

export interface ToolRegistryPort {
  list(): ToolDeclaration[];
  lookup(name: string): ToolDefinition | undefined;
}
