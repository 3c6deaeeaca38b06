import type { ToolRegistryPort } from "../ports/tools/ToolRegistryPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ToolResultBlock, ToolUseBlock } from "../domain/conversation/types";
import { ToolError, errorMessage } from "../shared/errors";

export const TOOL_NOT_FOUND_MESSAGE = "tool not found";

export type ToolTrace = (name: string, rawArgs: string) => void;

export function decodeArguments(raw: string): object {
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ToolError("DecodeError", `invalid tool arguments: ${errorMessage(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ToolError("DecodeError", "invalid tool arguments: expected a JSON object");
  }
  return parsed;
}

/**
 * Resolves a tool_use block to its registered tool and runs it. Every failure
 * becomes an error tool_result so the model can react to it.
 */
export class ToolDispatcher {
  constructor(
    private readonly tools: ToolRegistryPort,
    private readonly trace: ToolTrace,
    private readonly logger: LoggerPort
  ) {}

  async dispatch(call: ToolUseBlock): Promise<ToolResultBlock> {
    const tool = this.tools.lookup(call.name);
    if (!tool) {
      this.logger.warn("Model requested an unknown tool", { tool: call.name, id: call.id });
      return this.result(call, TOOL_NOT_FOUND_MESSAGE, true);
    }

    this.trace(call.name, call.input);

    try {
      const args = decodeArguments(call.input);
      const output = await tool.exec(args);
      this.logger.debug("Tool succeeded", { tool: call.name, id: call.id });
      return this.result(call, output, false);
    } catch (err) {
      const code = err instanceof ToolError ? err.code : "Unexpected";
      this.logger.debug("Tool failed", { tool: call.name, id: call.id, code });
      return this.result(call, errorMessage(err), true);
    }
  }

  private result(call: ToolUseBlock, output: string, isError: boolean): ToolResultBlock {
    return { type: "tool_result", toolUseId: call.id, output, isError };
  }
}
