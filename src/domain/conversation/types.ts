export type ConversationStateValue =
  | "AwaitingUserInput"
  | "AwaitingModelResponse"
  | "ExecutingTools"
  | "Finished";

export type ConversationRole = "user" | "assistant";

export interface TextBlock {
  type: "text";
  text: string;
}

/** A tool call requested by the assistant. `input` is the raw JSON payload. */
export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: string;
}

/** Synthesized locally and sent back in a user turn. */
export interface ToolResultBlock {
  type: "tool_result";
  toolUseId: string;
  output: string;
  isError: boolean;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export interface ConversationTurn {
  role: ConversationRole;
  content: ContentBlock[];
}

export function textTurn(role: ConversationRole, text: string): ConversationTurn {
  return { role, content: [{ type: "text", text }] };
}

export function toolUses(turn: ConversationTurn): ToolUseBlock[] {
  return turn.content.filter((block): block is ToolUseBlock => block.type === "tool_use");
}

export function toolResults(turn: ConversationTurn): ToolResultBlock[] {
  return turn.content.filter(
    (block): block is ToolResultBlock => block.type === "tool_result"
  );
}
